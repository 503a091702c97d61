// Session and world construction
export { GameSession, isGameOver } from './game-session';
export type { SwitchReport } from './game-session';
export { createGameSession, buildWorldGraph } from './world-builder';
export type { BuildOptions } from './world-builder';

// All TypeScript types
export type {
    Direction,
    LocationRecord,
    CreatureRecord,
    ItemRecord,
    GameRecords,
    ItemView,
    CreatureView,
    LocationView,
    PymonView,
    CommandResult
} from './types';
export { DIRECTIONS, OPPOSITE_DIRECTION, isDirection } from './types';

// World and creatures
export { WorldGraph } from './world-graph';
export type { MoveReport } from './world-graph';
export { Location } from './location';
export { Item } from './item';
export { Actor, PlayerState, createPymon, adoptCreature, isPymon } from './actor';
export type { Pymon } from './actor';
export { CreatureRoster } from './roster';

// Items
export { ITEM_EFFECTS, pickItem, useItem } from './inventory';
export type { ItemEffect, ItemUseReport, UseItemOptions, LookTarget } from './inventory';

// Battles
export { Battle, HANDS, isHand, judgeRound } from './battle';
export type { Hand, BattleState, BattleOutcome, BattleTally, RoundResult, RoundVerdict } from './battle';
export { BattleEngine, runBattle } from './battle-engine';
export type { Challenge, HandChooser } from './battle-engine';
export { BattleStats } from './battle-stats';
export type { BattleRecord, BattleTotals, PymonBattleReport } from './battle-stats';

// Errors
export {
    PymonError,
    InvalidDirectionError,
    InvalidInputFormatError,
    InvalidSelectionError,
    InvalidConfigError,
    GameOverError
} from './errors';
export type { PymonErrorKind } from './errors';

// Loading, configuration, randomness, logging
export { loadRecords, parseLocations, parseCreatures, parseItems } from './loader';
export type { DataFiles } from './loader';
export { loadConfig } from './config';
export type { GameConfig } from './config';
export { createRandom, createSeededRandom, pick } from './rng';
export type { Random } from './rng';
export { logger } from './logger';
export { ENERGY_MAX, MOVES_PER_ENERGY, WINS_TO_CAPTURE, LOSSES_TO_DEFEAT } from './constants';
