/**
 * @module game
 * @description Normal-form games: the immutable Game, profile indexing and
 * payoff generators
 */

export type {
    JointActionProfile,
    PayoffTensor,
    GameType,
    GameKind,
    GameConfig,
    GameSnapshot,
} from './types';

export { DEFAULT_PAYOFF_RANGE } from './types';

export { Game, createGame } from './game';

export {
    jointActionCount,
    computeStrides,
    profileToIndex,
    indexToProfile,
    enumerateProfiles,
    withAction,
    profileKey,
    parseProfileKey,
} from './profile';

export {
    randomPayoffs,
    chickenPayoffs,
    congestionPayoffs,
    explicitPayoffs,
    inferShape,
} from './generators';
