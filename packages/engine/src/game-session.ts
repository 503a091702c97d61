import { Pymon, toPymonView } from './actor';
import { Battle, RoundResult } from './battle';
import { BattleEngine, Challenge } from './battle-engine';
import { BattleStats, PymonBattleReport } from './battle-stats';
import { CreatureRoster } from './roster';
import { WorldGraph, MoveReport } from './world-graph';
import { ItemUseReport, UseItemOptions, pickItem, useItem } from './inventory';
import { GameOverError, InvalidSelectionError } from './errors';
import { CommandResult, ItemView, LocationView, PymonView, failure, success } from './types';
import { Random } from './rng';
import { logger } from './logger';

export interface SwitchReport {
    previous: string;
    current: string;
}

/**
 * One game: a world, the player's Pymons and their battle history.
 * Queries return plain views; commands return CommandResult and never print.
 */
export class GameSession {
    readonly world: WorldGraph;
    readonly roster: CreatureRoster;
    readonly stats: BattleStats;
    private readonly battles: BattleEngine;
    private activeBattle: Battle | null = null;
    private over = false;

    constructor(data: {
        world: WorldGraph;
        roster: CreatureRoster;
        random: Random;
        stats?: BattleStats;
    }) {
        this.world = data.world;
        this.roster = data.roster;
        this.stats = data.stats ?? new BattleStats();
        this.battles = new BattleEngine({
            world: this.world,
            roster: this.roster,
            stats: this.stats,
            random: data.random,
            onGameOver: (nickname: string) => {
                logger.log(`[GameSession] Game over, ${nickname} was the last Pymon`);
                this.over = true;
                this.activeBattle = null;
            }
        });
    }

    get isOver(): boolean {
        return this.over;
    }

    /**
     * The battle in progress, if any. Battles driven directly through
     * `Battle.play` are let go here once they resolve.
     */
    get battle(): Battle | null {
        if (this.activeBattle && this.activeBattle.state !== 'IN_PROGRESS') {
            this.activeBattle = null;
        }
        return this.activeBattle;
    }

    get active(): Pymon {
        return this.roster.active;
    }

    // Queries

    activePymon(): PymonView {
        return toPymonView(this.roster.active);
    }

    currentLocation(): LocationView | null {
        const location = this.roster.active.location;
        return location ? location.toView(this.roster.active) : null;
    }

    inventory(): ItemView[] {
        return this.roster.active.player.inventory.map(item => item.toView());
    }

    pets(): PymonView[] {
        return this.roster.bench().map(pet => toPymonView(pet));
    }

    battleReport(): PymonBattleReport[] {
        return this.stats.report();
    }

    // Commands

    move(direction: string): CommandResult<MoveReport> {
        const blocked = this.guard<MoveReport>();
        if (blocked) return blocked;
        return this.world.move(this.roster.active, direction);
    }

    pick(itemName: string): CommandResult<ItemView> {
        const blocked = this.guard<ItemView>();
        if (blocked) return blocked;
        const location = this.roster.active.location;
        if (!location) {
            return failure('InvalidSelection', `${itemName} is not available here.`);
        }
        return pickItem(location, this.roster.active, itemName);
    }

    useItem(itemName: string, options: UseItemOptions = {}): CommandResult<ItemUseReport> {
        const blocked = this.guard<ItemUseReport>();
        if (blocked) return blocked;
        return useItem(this.roster.active, itemName, options);
    }

    /**
     * Start a challenge. A battle that begins is kept as the session's active
     * battle until it resolves; feed it rounds with `playRound`.
     * Throws GameOverError if the challenger had no energy and no Pymon is left.
     */
    challenge(nickname: string): CommandResult<Challenge> {
        const blocked = this.guard<Challenge>();
        if (blocked) return blocked;
        const result = this.battles.challenge(this.roster.active, nickname);
        if (result.outcome === 'success' && result.data.kind === 'battle' && result.data.battle.state === 'IN_PROGRESS') {
            this.activeBattle = result.data.battle;
        }
        return result;
    }

    /**
     * Throws GameOverError when the round ends the game.
     */
    playRound(hand: string): CommandResult<RoundResult> {
        if (this.over) {
            return failure('GameOver', 'The game is over.');
        }
        const battle = this.battle;
        if (!battle) {
            return failure('InvalidSelection', 'There is no battle in progress.');
        }
        const result = battle.play(hand);
        if (battle.state === 'RESOLVED') {
            this.activeBattle = null;
        }
        return result;
    }

    /**
     * @param index zero-based position on the bench
     */
    switchActive(index: number): CommandResult<SwitchReport> {
        const blocked = this.guard<SwitchReport>();
        if (blocked) return blocked;

        const here = this.roster.active.location;
        try {
            const { previous, current } = this.roster.switchTo(index);
            this.world.remove(previous);
            const arrival = here ?? current.location;
            if (arrival) {
                this.world.place(current, arrival);
            }
            return success(`Your primary Pymon is now: ${current.nickname}.`, {
                previous: previous.nickname,
                current: current.nickname
            });
        } catch (error) {
            if (error instanceof InvalidSelectionError) {
                return failure('InvalidSelection', error.message);
            }
            throw error;
        }
    }

    private guard<T>(): CommandResult<T> | null {
        if (this.over) {
            return failure('GameOver', 'The game is over.');
        }
        const battle = this.battle;
        if (battle) {
            return failure('InvalidSelection', `Finish the battle with ${battle.opponent.nickname} first.`);
        }
        return null;
    }
}

export function isGameOver(error: unknown): error is GameOverError {
    return error instanceof GameOverError;
}
