import { z } from 'zod';
import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand } from './base-command';
import { ParsedCommand } from '../utils/input-parser';

const switchParameters = z.object({
    index: z.coerce.number({ invalid_type_error: 'Choose a Pymon by its number from the pets list.' })
        .int('Choose a Pymon by its number from the pets list.')
        .min(1, 'Choose a Pymon by its number from the pets list.')
});

export class SwitchCommand extends SchemaCommand<typeof switchParameters> {
    getCommandId(): string {
        return 'switch';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['switch', 'swap'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Make a benched Pymon your primary one, by its number in the pets list',
            examples: ['switch 1', 'swap 2']
        };
    }

    getParameterSchema(): typeof switchParameters {
        return switchParameters;
    }

    processProcedural(parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return {
            commandId: 'switch',
            parameters: { index: parsed.target ?? undefined }
        };
    }

    protected resolve(session: GameSession, parameters: z.output<typeof switchParameters>): CommandResponse {
        const result = session.switchActive(parameters.index - 1);
        return { outcome: result.outcome, narrative: result.narrative };
    }
}
