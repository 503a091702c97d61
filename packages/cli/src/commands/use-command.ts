import { z } from 'zod';
import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { toDirection } from './move-command';
import { formatGlimpse } from '../format';

const useParameters = z.object({
    item: z.string({ required_error: 'Use what?' }).trim().min(1, 'Use what?'),
    look: z.string().optional()
});

export class UseCommand extends SchemaCommand<typeof useParameters> {
    getCommandId(): string {
        return 'use';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['use', 'eat', 'drink'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Use an item from your inventory. A binocular takes a direction or "current"',
            examples: ['use apple', 'drink magic potion', 'use binocular north', 'use binocular current']
        };
    }

    getParameterSchema(): typeof useParameters {
        return useParameters;
    }

    processProcedural(parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return {
            commandId: 'use',
            parameters: parsed.target ? { item: parsed.target } : {}
        };
    }

    /**
     * "use binocular north": when no carried item has the full name, a trailing
     * direction (or "current") is where to look.
     */
    private splitLookTarget(session: GameSession, item: string, look?: string): { item: string; look?: string } {
        if (look !== undefined) return { item, look };
        const carried = session.inventory().some(held => held.name.toLowerCase() === item.toLowerCase());
        const words = item.split(' ');
        if (carried || words.length < 2) return { item };

        const last = words[words.length - 1].toLowerCase();
        const target = last === 'current' ? 'current' : toDirection(last);
        return target ? { item: words.slice(0, -1).join(' '), look: target } : { item };
    }

    protected resolve(session: GameSession, parameters: z.output<typeof useParameters>): CommandResponse {
        const { item, look } = this.splitLookTarget(session, parameters.item, parameters.look);
        const result = session.useItem(item, { look });
        if (result.outcome === 'failure') {
            return { outcome: 'failure', narrative: result.narrative };
        }
        const inspected = result.data.inspection?.location;
        return {
            outcome: 'success',
            narrative: inspected ? `${result.narrative}\n${formatGlimpse(inspected)}` : result.narrative
        };
    }
}
