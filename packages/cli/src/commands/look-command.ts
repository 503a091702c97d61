import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand, noParameters } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { formatLocation } from '../format';

export class LookCommand extends SchemaCommand<typeof noParameters> {
    getCommandId(): string {
        return 'look';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['look', 'l', 'where'],
            phrasalVerbs: ['look around']
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Inspect the current location: doors, creatures and items',
            examples: ['look', 'look around', 'l']
        };
    }

    getParameterSchema(): typeof noParameters {
        return noParameters;
    }

    processProcedural(_parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return { commandId: 'look', parameters: {} };
    }

    protected resolve(session: GameSession): CommandResponse {
        const location = session.currentLocation();
        if (!location) {
            return { outcome: 'failure', narrative: 'Your Pymon is not anywhere.' };
        }
        return { outcome: 'success', narrative: formatLocation(location) };
    }
}
