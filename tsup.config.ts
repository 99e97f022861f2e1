import { defineConfig } from 'tsup'

/**
 * tsup configuration for the correq library
 *
 * - splitting: true → shared code lands in chunk-*.js files
 * - Unified build → all entries share common chunks
 */
export default defineConfig({
    name: 'correq',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/game': 'src/game/index.ts',
        'src/equilibrium': 'src/equilibrium/index.ts',
        'src/models': 'src/models/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2020',

    // The library touches no Node.js built-ins
    platform: 'neutral',
})
