import { z } from 'zod';
import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { formatOutcome } from '../format';

const challengeParameters = z.object({
    creature: z.string({ required_error: 'Challenge whom?' }).trim().min(1, 'Challenge whom?')
});

/**
 * Starts a battle. The returned battle, if any, is handed back to the front
 * end, which plays its rounds before taking other commands.
 * A GameOverError from a battle lost at once is left to the caller.
 */
export class ChallengeCommand extends SchemaCommand<typeof challengeParameters> {
    getCommandId(): string {
        return 'challenge';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['challenge', 'fight', 'battle'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Challenge a creature in your location to rock, paper, scissors',
            examples: ['challenge Sheep', 'fight Cocomon']
        };
    }

    getParameterSchema(): typeof challengeParameters {
        return challengeParameters;
    }

    processProcedural(parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return {
            commandId: 'challenge',
            parameters: parsed.target ? { creature: parsed.target } : {}
        };
    }

    protected resolve(session: GameSession, parameters: z.output<typeof challengeParameters>): CommandResponse {
        const result = session.challenge(parameters.creature);
        if (result.outcome === 'failure') {
            return { outcome: 'failure', narrative: result.narrative };
        }
        if (result.data.kind === 'dialogue') {
            return { outcome: 'success', narrative: result.narrative };
        }
        const battle = result.data.battle;
        if (battle.state === 'IN_PROGRESS') {
            return { outcome: 'success', narrative: result.narrative, battle };
        }
        const settled = battle.outcome;
        return {
            outcome: 'success',
            narrative: settled ? `${result.narrative}\n${formatOutcome(settled)}` : result.narrative
        };
    }
}
