import { z } from 'zod';
import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand } from './base-command';
import { ParsedCommand } from '../utils/input-parser';

const pickupParameters = z.object({
    item: z.string({ required_error: 'Pick up what?' }).trim().min(1, 'Pick up what?')
});

export class PickupCommand extends SchemaCommand<typeof pickupParameters> {
    getCommandId(): string {
        return 'pickup';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['pickup', 'pick', 'take', 'grab', 'get'],
            phrasalVerbs: ['pick up']
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Pick up an item from the current location',
            examples: ['pick up apple', 'take magic potion', 'grab binocular']
        };
    }

    getParameterSchema(): typeof pickupParameters {
        return pickupParameters;
    }

    processProcedural(parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        const target = parsed.target?.replace(/^(the|a|an)\s+/i, '');
        return {
            commandId: 'pickup',
            parameters: target ? { item: target } : {}
        };
    }

    protected resolve(session: GameSession, parameters: z.output<typeof pickupParameters>): CommandResponse {
        const result = session.pick(parameters.item);
        return { outcome: result.outcome, narrative: result.narrative };
    }
}
