import { z } from 'zod';
import { logger } from '@pymon-world/engine';
import type { Direction, GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand } from './base-command';
import { ParsedCommand } from '../utils/input-parser';

const DIRECTION_WORDS: Record<string, Direction> = {
    'west': 'west', 'w': 'west',
    'north': 'north', 'n': 'north',
    'east': 'east', 'e': 'east',
    'south': 'south', 's': 'south'
};

export function toDirection(word: string): Direction | null {
    const key = word.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(DIRECTION_WORDS, key) ? DIRECTION_WORDS[key] : null;
}

const moveParameters = z.object({
    direction: z.string({ required_error: 'Move where? Choose west, north, east or south.' })
        .trim()
        .min(1, 'Move where? Choose west, north, east or south.')
});

export class MoveCommand extends SchemaCommand<typeof moveParameters> {
    getCommandId(): string {
        return 'move';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['move', 'go', 'walk', 'travel', 'head'],
            phrasalVerbs: ['go to']
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Move in a direction (west, north, east, south). Every second move costs 1 energy',
            examples: ['move north', 'go east', 'n', 'w']
        };
    }

    getParameterSchema(): typeof moveParameters {
        return moveParameters;
    }

    processProcedural(parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        // A bare direction needs no verb
        if (!parsed.verb) {
            const direction = parsed.target ? toDirection(parsed.target) : null;
            if (!direction) return null;
            logger.log(`[MoveCommand] Matched direct direction: ${direction}`);
            return { commandId: 'move', parameters: { direction } };
        }

        if (!parsed.target) {
            return { commandId: 'move', parameters: {} };
        }
        return {
            commandId: 'move',
            parameters: { direction: toDirection(parsed.target) ?? parsed.target }
        };
    }

    protected resolve(session: GameSession, parameters: z.output<typeof moveParameters>): CommandResponse {
        const result = session.move(parameters.direction);
        return { outcome: result.outcome, narrative: result.narrative };
    }
}
