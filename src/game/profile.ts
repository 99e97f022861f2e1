/**
 * @module game/profile
 * @description Joint action profile indexing
 *
 * Profiles are laid out row-major: the last player's action varies fastest,
 * so for action counts [2, 3] the order is (0,0) (0,1) (0,2) (1,0) (1,1) (1,2).
 */

import type { JointActionProfile } from './types';

/**
 * Size of the joint action space
 */
export function jointActionCount(actionCounts: readonly number[]): number {
    return actionCounts.reduce((product, count) => product * count, 1);
}

/**
 * Row-major strides: stride[i] = prod(actionCounts[i+1..])
 */
export function computeStrides(actionCounts: readonly number[]): number[] {
    const strides = new Array<number>(actionCounts.length);
    let stride = 1;
    for (let i = actionCounts.length - 1; i >= 0; i--) {
        strides[i] = stride;
        stride *= actionCounts[i];
    }
    return strides;
}

/**
 * Flat index of a profile (no range checks)
 */
export function profileToIndex(profile: JointActionProfile, strides: readonly number[]): number {
    let index = 0;
    for (let i = 0; i < strides.length; i++) {
        index += profile[i] * strides[i];
    }
    return index;
}

/**
 * Profile at a flat index (no range checks)
 */
export function indexToProfile(index: number, actionCounts: readonly number[]): number[] {
    const profile = new Array<number>(actionCounts.length);
    let rest = index;
    for (let i = actionCounts.length - 1; i >= 0; i--) {
        profile[i] = rest % actionCounts[i];
        rest = Math.floor(rest / actionCounts[i]);
    }
    return profile;
}

/**
 * Enumerate every profile in flat-index order
 */
export function* enumerateProfiles(actionCounts: readonly number[]): Generator<number[]> {
    const total = jointActionCount(actionCounts);
    for (let index = 0; index < total; index++) {
        yield indexToProfile(index, actionCounts);
    }
}

/**
 * Copy of `profile` with one player's action replaced
 */
export function withAction(profile: JointActionProfile, player: number, action: number): number[] {
    const next = [...profile];
    next[player] = action;
    return next;
}

/**
 * Stable string key, e.g. "0,1,2"
 */
export function profileKey(profile: JointActionProfile): string {
    return profile.join(',');
}

/**
 * Inverse of profileKey
 */
export function parseProfileKey(key: string): number[] {
    return key === '' ? [] : key.split(',').map(Number);
}
