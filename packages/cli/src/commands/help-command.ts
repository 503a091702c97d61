import { z } from 'zod';
import type { GameSession } from '@pymon-world/engine';
import { CommandHelp, CommandResponse, NormalizedCommandInput, SchemaCommand } from './base-command';
import type { CommandRegistry } from './command-registry';
import { ParsedCommand } from '../utils/input-parser';

const helpParameters = z.object({
    command: z.string().trim().toLowerCase().optional()
});

export class HelpCommand extends SchemaCommand<typeof helpParameters> {
    constructor(private readonly registry: CommandRegistry) {
        super();
    }

    getCommandId(): string {
        return 'help';
    }

    getAliases(): { singleWords: string[]; phrasalVerbs: string[] } {
        return {
            singleWords: ['help', '?', 'commands'],
            phrasalVerbs: []
        };
    }

    getHelp(): CommandHelp {
        return {
            description: 'Show this help message with available commands',
            examples: ['help', 'help move', 'help use']
        };
    }

    getParameterSchema(): typeof helpParameters {
        return helpParameters;
    }

    processProcedural(parsed: ParsedCommand, _input: string): NormalizedCommandInput | null {
        return {
            commandId: 'help',
            parameters: parsed.target ? { command: parsed.target } : {}
        };
    }

    protected resolve(_session: GameSession, parameters: z.output<typeof helpParameters>): CommandResponse {
        const allCommandIds = this.registry.getAllCommandIds();

        // A specific command, by ID or alias
        if (parameters.command) {
            const command = this.registry.findByVerb(parameters.command);
            if (!command) {
                return {
                    outcome: 'failure',
                    narrative: `Command "${parameters.command}" not found.\n\nAvailable commands: ${allCommandIds.join(', ')}`
                };
            }
            const help = command.getHelp();
            const lines = [
                `Help for "${command.getCommandId().toUpperCase()}":`,
                '',
                help.description,
                '',
                'Examples:',
                ...help.examples.map(example => `  ${example}`)
            ];
            return { outcome: 'success', narrative: lines.join('\n') };
        }

        let narrative = 'Available Commands:\n\n';
        for (const commandId of allCommandIds) {
            const command = this.registry.getCommand(commandId);
            if (!command) continue;
            const help = command.getHelp();
            narrative += `${commandId.toUpperCase()}\n`;
            narrative += `  ${help.description}\n`;
            narrative += `  Examples: ${help.examples.join(', ')}\n\n`;
        }
        narrative += 'Type "help <command>" for detailed help on a specific command. Type "quit" to leave the game.';
        return { outcome: 'success', narrative };
    }
}
