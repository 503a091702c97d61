import { Pymon } from './actor';
import { Battle, BattleContext, BattleOutcome, RoundResult } from './battle';
import { CommandResult, failure, success } from './types';
import { pick } from './rng';
import { logger } from './logger';

export type Challenge =
    | { kind: 'dialogue'; opponent: string; line: string }
    | { kind: 'battle'; battle: Battle };

const DIALOGUE_LINES: readonly ((nickname: string) => string)[] = [
    nickname => `${nickname} just ignored you.`,
    nickname => `${nickname} just laughed at you.`,
    nickname => `${nickname} ran away.`
];

/**
 * Looks up opponents and starts battles. Wild creatures only talk back.
 */
export class BattleEngine {
    constructor(private readonly context: BattleContext) {}

    challenge(challenger: Pymon, nickname: string): CommandResult<Challenge> {
        const location = challenger.location;
        const opponent = location?.findCreature(nickname);
        if (!location || !opponent) {
            return failure('InvalidSelection', `${nickname} is not available here.`);
        }
        if (opponent === challenger) {
            return failure('InvalidSelection', 'You cannot challenge your own Pymon.');
        }

        if (!opponent.adoptable) {
            const line = pick(this.context.random, DIALOGUE_LINES)(opponent.nickname);
            logger.log(`[BattleEngine] ${opponent.nickname} is wild: ${line}`);
            return success(line, { kind: 'dialogue', opponent: opponent.nickname, line });
        }

        logger.log(`[BattleEngine] ${challenger.nickname} challenges ${opponent.nickname}`);
        const battle = new Battle(challenger, opponent, this.context);
        const settled = battle.begin();
        const narrative = settled
            ? `${challenger.nickname} has no energy left to fight ${opponent.nickname}.`
            : `You started the challenge with ${opponent.nickname}!`;
        return success(narrative, { kind: 'battle', battle });
    }
}

export type HandChooser = (round: number, previous: RoundResult | null) => Promise<string>;

/**
 * Drive a battle to the end with hands from an asynchronous source such as a
 * terminal prompt. Rejected hands are reported through `onRejected` and asked again.
 */
export async function runBattle(
    battle: Battle,
    chooseHand: HandChooser,
    hooks: {
        onRound?: (round: RoundResult, narrative: string) => void;
        onRejected?: (narrative: string) => void;
    } = {}
): Promise<BattleOutcome | null> {
    let previous: RoundResult | null = null;
    while (battle.state === 'IN_PROGRESS') {
        const hand = await chooseHand((previous?.round ?? 0) + 1, previous);
        const result = battle.play(hand);
        if (result.outcome === 'failure') {
            hooks.onRejected?.(result.narrative);
            continue;
        }
        previous = result.data;
        hooks.onRound?.(result.data, result.narrative);
    }
    return battle.outcome;
}
