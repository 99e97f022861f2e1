/**
 * @module math/linear-algebra
 * @description Lightweight dense linear algebra for the LP backend and the
 * regret learners. Plain number arrays, no external dependencies.
 */

// ==================== Vector Operations ====================

/**
 * Compute the dot product of two vectors
 */
export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Sum of all entries
 */
export function sum(v: ArrayLike<number>): number {
    let total = 0;
    for (let i = 0; i < v.length; i++) {
        total += v[i];
    }
    return total;
}

/**
 * Compute the infinity norm (max absolute value) of a vector
 */
export function infNorm(v: ArrayLike<number>): number {
    let maxVal = 0;
    for (let i = 0; i < v.length; i++) {
        const absVal = Math.abs(v[i]);
        if (absVal > maxVal) maxVal = absVal;
    }
    return maxVal;
}

/**
 * Index of the largest entry (first one on ties), -1 for an empty vector
 */
export function argmax(v: ArrayLike<number>): number {
    let best = -1;
    let bestValue = -Infinity;
    for (let i = 0; i < v.length; i++) {
        if (v[i] > bestValue) {
            bestValue = v[i];
            best = i;
        }
    }
    return best;
}

/**
 * Create a zero vector
 */
export function zeros(n: number): number[] {
    return new Array<number>(n).fill(0);
}

/**
 * Numerically stable softmax of `scale * v`
 */
export function softmax(v: ArrayLike<number>, scale = 1): number[] {
    let maxVal = -Infinity;
    for (let i = 0; i < v.length; i++) {
        if (scale * v[i] > maxVal) maxVal = scale * v[i];
    }
    const out: number[] = new Array(v.length);
    let total = 0;
    for (let i = 0; i < v.length; i++) {
        out[i] = Math.exp(scale * v[i] - maxVal);
        total += out[i];
    }
    for (let i = 0; i < v.length; i++) {
        out[i] /= total;
    }
    return out;
}

/**
 * Clip negatives to zero and rescale to sum 1.
 * Returns null when nothing positive is left.
 */
export function projectToSimplex(v: ArrayLike<number>): number[] | null {
    const out: number[] = new Array(v.length);
    let total = 0;
    for (let i = 0; i < v.length; i++) {
        out[i] = v[i] > 0 ? v[i] : 0;
        total += out[i];
    }
    if (!(total > 0)) {
        return null;
    }
    for (let i = 0; i < v.length; i++) {
        out[i] /= total;
    }
    return out;
}

// ==================== Matrix Operations ====================

/**
 * Create a rows x cols zero matrix
 */
export function zerosMatrix(rows: number, cols: number): number[][] {
    const M: number[][] = new Array(rows);
    for (let i = 0; i < rows; i++) {
        M[i] = zeros(cols);
    }
    return M;
}

/**
 * Solve A X = B for every column of B by Gaussian elimination with partial
 * pivoting. A is n x n, B is n x k; neither is modified.
 * Returns null when A is singular to working precision.
 */
export function solveLinearSystems(A: number[][], B: number[][], pivotTol = 1e-12): number[][] | null {
    const n = A.length;
    const k = n > 0 ? B[0].length : 0;
    const M = A.map((row, i) => [...row, ...B[i]]);
    const width = n + k;

    for (let col = 0; col < n; col++) {
        let pivotRow = col;
        for (let row = col + 1; row < n; row++) {
            if (Math.abs(M[row][col]) > Math.abs(M[pivotRow][col])) {
                pivotRow = row;
            }
        }
        if (Math.abs(M[pivotRow][col]) < pivotTol) {
            return null;
        }
        if (pivotRow !== col) {
            const tmp = M[col];
            M[col] = M[pivotRow];
            M[pivotRow] = tmp;
        }

        for (let row = col + 1; row < n; row++) {
            const factor = M[row][col] / M[col][col];
            if (factor === 0) continue;
            for (let j = col; j < width; j++) {
                M[row][j] -= factor * M[col][j];
            }
        }
    }

    const X = zerosMatrix(n, k);
    for (let row = n - 1; row >= 0; row--) {
        for (let c = 0; c < k; c++) {
            let acc = M[row][n + c];
            for (let j = row + 1; j < n; j++) {
                acc -= M[row][j] * X[j][c];
            }
            X[row][c] = acc / M[row][row];
        }
    }
    return X;
}

/**
 * Solve A x = b. Returns null when A is singular to working precision.
 */
export function solveLinearSystem(A: number[][], b: number[], pivotTol = 1e-12): number[] | null {
    const X = solveLinearSystems(A, b.map(v => [v]), pivotTol);
    return X === null ? null : X.map(row => row[0]);
}

/**
 * Stationary distribution p = pQ of a row-stochastic matrix.
 *
 * Solves (Q^T - I) p = 0 with the last equation replaced by sum(p) = 1.
 * Falls back to power iteration if the system is singular (reducible chain).
 */
export function stationaryDistribution(Q: number[][]): number[] {
    const n = Q.length;
    if (n === 1) {
        return [1];
    }

    const A = zerosMatrix(n, n);
    for (let i = 0; i < n - 1; i++) {
        for (let j = 0; j < n; j++) {
            A[i][j] = Q[j][i] - (i === j ? 1 : 0);
        }
    }
    A[n - 1].fill(1);
    const b = zeros(n);
    b[n - 1] = 1;

    const solved = solveLinearSystem(A, b);
    const projected = solved === null ? null : projectToSimplex(solved);
    if (projected !== null) {
        return projected;
    }

    let p = new Array<number>(n).fill(1 / n);
    for (let iter = 0; iter < 1000; iter++) {
        const next = zeros(n);
        for (let i = 0; i < n; i++) {
            for (let j = 0; j < n; j++) {
                next[j] += p[i] * Q[i][j];
            }
        }
        p = next;
    }
    return projectToSimplex(p) ?? new Array<number>(n).fill(1 / n);
}
