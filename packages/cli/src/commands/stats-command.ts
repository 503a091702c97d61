import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand, noParameters } from './base-command';
import { ParsedCommand } from '../utils/input-parser';
import { formatBattleReport } from '../format';

export class StatsCommand extends SchemaCommand<typeof noParameters> {
    getCommandId(): string {
        return 'stats';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['stats', 'report', 'history'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Show the battle history of every Pymon you have played',
            examples: ['stats', 'report']
        };
    }

    getParameterSchema(): typeof noParameters {
        return noParameters;
    }

    processProcedural(_parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return { commandId: 'stats', parameters: {} };
    }

    protected resolve(session: GameSession): CommandResponse {
        return { outcome: 'success', narrative: formatBattleReport(session.battleReport()) };
    }
}
