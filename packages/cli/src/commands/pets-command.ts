import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand, noParameters } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { formatPets } from '../format';

export class PetsCommand extends SchemaCommand<typeof noParameters> {
    getCommandId(): string {
        return 'pets';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['pets', 'bench', 'team'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'List your benched Pymons',
            examples: ['pets', 'bench']
        };
    }

    getParameterSchema(): typeof noParameters {
        return noParameters;
    }

    processProcedural(_parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return { commandId: 'pets', parameters: {} };
    }

    protected resolve(session: GameSession): CommandResponse {
        return { outcome: 'success', narrative: formatPets(session.pets()) };
    }
}
