import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand, noParameters } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { formatInventory } from '../format';

export class InventoryCommand extends SchemaCommand<typeof noParameters> {
    getCommandId(): string {
        return 'items';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['items', 'inventory', 'inv', 'i', 'bag'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'List the items your Pymon is carrying',
            examples: ['items', 'inventory', 'i']
        };
    }

    getParameterSchema(): typeof noParameters {
        return noParameters;
    }

    processProcedural(_parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return { commandId: 'items', parameters: {} };
    }

    protected resolve(session: GameSession): CommandResponse {
        return { outcome: 'success', narrative: formatInventory(session.inventory()) };
    }
}
