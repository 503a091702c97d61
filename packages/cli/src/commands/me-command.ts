import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand, noParameters } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { formatPymon } from '../format';

export class MeCommand extends SchemaCommand<typeof noParameters> {
    getCommandId(): string {
        return 'me';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['me', 'pymon', 'status'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Inspect your current Pymon',
            examples: ['me', 'status']
        };
    }

    getParameterSchema(): typeof noParameters {
        return noParameters;
    }

    processProcedural(_parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return { commandId: 'me', parameters: {} };
    }

    protected resolve(session: GameSession): CommandResponse {
        return { outcome: 'success', narrative: formatPymon(session.activePymon()) };
    }
}
