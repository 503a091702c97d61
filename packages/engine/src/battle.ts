import { Actor, Pymon, adoptCreature } from './actor';
import { BattleStats } from './battle-stats';
import { CreatureRoster } from './roster';
import { WorldGraph } from './world-graph';
import { transferInventory } from './inventory';
import { LOSSES_TO_DEFEAT, WINS_TO_CAPTURE } from './constants';
import { GameOverError } from './errors';
import { CommandResult, failure, success } from './types';
import { Random, pick } from './rng';
import { logger } from './logger';

export type Hand = 'rock' | 'paper' | 'scissors';

export const HANDS: readonly Hand[] = ['rock', 'paper', 'scissors'];

const BEATS: Record<Hand, Hand> = {
    rock: 'scissors',
    scissors: 'paper',
    paper: 'rock'
};

export function isHand(value: string): value is Hand {
    return HANDS.some(hand => hand === value);
}

export type BattleState = 'SEARCHING_OPPONENT' | 'DIALOGUE_ONLY' | 'IN_PROGRESS' | 'RESOLVED';

export type RoundVerdict = 'win' | 'loss' | 'draw';

export interface BattleTally {
    wins: number;
    draws: number;
    losses: number;
}

export interface RoundResult {
    round: number;
    player: Hand;
    opponent: Hand;
    verdict: RoundVerdict;
    /** Immunity absorbed the energy cost of this lost round. */
    shielded: boolean;
    energy: number;
    tally: BattleTally;
    /** Set on the round that ended the battle. */
    outcome: BattleOutcome | null;
}

export type BattleOutcome =
    | { result: 'won'; opponent: string; captured: string }
    | { result: 'lost'; opponent: string; defeated: string; promoted: string | null; gameOver: boolean };

/**
 * What a battle needs from the session it runs in.
 */
export interface BattleContext {
    world: WorldGraph;
    roster: CreatureRoster;
    stats: BattleStats;
    random: Random;
    onGameOver(nickname: string): void;
}

export function judgeRound(player: Hand, opponent: Hand): RoundVerdict {
    if (player === opponent) return 'draw';
    return BEATS[player] === opponent ? 'win' : 'loss';
}

/**
 * One best-of-three match between the active Pymon and an adoptable creature.
 * The outcome is applied exactly once, when the match resolves.
 */
export class Battle {
    readonly challenger: Pymon;
    readonly opponent: Actor;
    private readonly context: BattleContext;
    private currentState: BattleState = 'IN_PROGRESS';
    private readonly counts: BattleTally = { wins: 0, draws: 0, losses: 0 };
    private rounds = 0;
    private shieldArmed = false;
    private result: BattleOutcome | null = null;

    constructor(challenger: Pymon, opponent: Actor, context: BattleContext) {
        this.challenger = challenger;
        this.opponent = opponent;
        this.context = context;

        if (challenger.player.immune) {
            challenger.player.immune = false;
            this.shieldArmed = true;
        }
    }

    get state(): BattleState {
        return this.currentState;
    }

    get tally(): BattleTally {
        return { ...this.counts };
    }

    get outcome(): BattleOutcome | null {
        return this.result;
    }

    /**
     * Resolve straight away if the challenger has no energy to fight with.
     */
    begin(): BattleOutcome | null {
        if (this.isFinished()) {
            return this.resolve();
        }
        return null;
    }

    /**
     * Play one round. An unknown hand is rejected without using up a round.
     * Throws GameOverError when the round loses the match and no Pymon is left.
     */
    play(hand: string): CommandResult<RoundResult> {
        if (this.currentState !== 'IN_PROGRESS') {
            return failure('InvalidSelection', 'This battle is already over.');
        }
        const player = hand.trim().toLowerCase();
        if (!isHand(player)) {
            return failure('InvalidSelection', 'Invalid choice. Choose rock, paper or scissors.');
        }

        const opponent = pick(this.context.random, HANDS);
        const verdict = judgeRound(player, opponent);
        let shielded = false;
        this.rounds += 1;

        if (verdict === 'draw') {
            this.counts.draws += 1;
        } else if (verdict === 'win') {
            this.counts.wins += 1;
        } else {
            this.counts.losses += 1;
            if (this.shieldArmed) {
                this.shieldArmed = false;
                shielded = true;
            } else {
                this.challenger.player.drainEnergy(1);
            }
        }

        const round: RoundResult = {
            round: this.rounds,
            player,
            opponent,
            verdict,
            shielded,
            energy: this.challenger.player.energy,
            tally: this.tally,
            outcome: null
        };
        logger.log(`[Battle] ${this.challenger.nickname} vs ${this.opponent.nickname}:`, round);

        const narrative = this.describeRound(round);
        if (this.isFinished()) {
            round.outcome = this.resolve();
        }
        return success(narrative, round);
    }

    private describeRound(round: RoundResult): string {
        const prefix = `Opponent chose ${round.opponent}.`;
        if (round.verdict === 'draw') {
            return `${prefix} Draw, no one wins this encounter.`;
        }
        if (round.verdict === 'win') {
            return `${prefix} Your Pymon ${this.challenger.nickname} won this encounter!`;
        }
        if (round.shielded) {
            return `${prefix} Your Pymon ${this.challenger.nickname} lost this encounter, but immunity kept its energy. Remaining energy: ${round.energy}.`;
        }
        return `${prefix} Your Pymon ${this.challenger.nickname} lost this encounter. Remaining energy: ${round.energy}.`;
    }

    private isFinished(): boolean {
        return this.counts.wins >= WINS_TO_CAPTURE
            || this.counts.losses >= LOSSES_TO_DEFEAT
            || this.challenger.player.energy <= 0;
    }

    private resolve(): BattleOutcome {
        const { world, roster, stats } = this.context;
        let outcome: BattleOutcome;

        if (this.counts.wins >= WINS_TO_CAPTURE) {
            const captured = adoptCreature(this.opponent);
            world.remove(this.opponent);
            roster.capture(captured);
            outcome = { result: 'won', opponent: this.opponent.nickname, captured: captured.nickname };
        } else {
            const loser = this.challenger;
            const next = roster.promoteNext();
            if (next) {
                transferInventory(loser, next);
                const arrival = next.location ?? loser.location;
                world.remove(loser);
                if (arrival) {
                    world.place(next, arrival);
                }
            }
            outcome = {
                result: 'lost',
                opponent: this.opponent.nickname,
                defeated: loser.nickname,
                promoted: next ? next.nickname : null,
                gameOver: next === null
            };
        }

        stats.record(this.challenger.nickname, this.opponent.nickname, this.counts.wins, this.counts.draws, this.counts.losses);
        this.currentState = 'RESOLVED';
        this.result = outcome;
        logger.log('[Battle] Resolved:', outcome);

        if (outcome.result === 'lost' && outcome.gameOver) {
            this.context.onGameOver(outcome.defeated);
            throw new GameOverError(outcome.defeated);
        }
        return outcome;
    }
}
