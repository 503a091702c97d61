import { logger } from '@pymon-world/engine';
import type { GameSession } from '@pymon-world/engine';
import { CommandRegistry } from './commands/command-registry';
import { CommandResponse, NormalizedCommandInput } from './commands/base-command';
import { parseInput } from './utils/input-parser';

let commandRegistryInstance: CommandRegistry | null = null;

export function getCommandRegistry(): CommandRegistry {
    if (!commandRegistryInstance) {
        commandRegistryInstance = new CommandRegistry();
    }
    return commandRegistryInstance;
}

/**
 * Turn a line of player input into a command ID and raw parameters.
 * Input that starts with no known verb is offered to the move command, so a
 * bare direction works. Returns null when nothing understands the line.
 */
export function parseCommand(input: string, registry: CommandRegistry = getCommandRegistry()): NormalizedCommandInput | null {
    const parsed = parseInput(input, registry.getAliasTable());
    logger.log('[parseCommand] Parsed input:', parsed);

    if (!parsed.verb) {
        if (!parsed.target) return null;
        return registry.getCommand('move')?.processProcedural(parsed, input) ?? null;
    }

    const command = registry.findByVerb(parsed.verb);
    if (!command) {
        logger.log(`[parseCommand] No command for verb "${parsed.verb}"`);
        return null;
    }
    return command.processProcedural(parsed, input);
}

/**
 * Parse and run one line against the session.
 * Errors other than invalid input (GameOverError in particular) propagate.
 */
export function executeCommand(
    session: GameSession,
    input: string,
    registry: CommandRegistry = getCommandRegistry()
): CommandResponse {
    const clean = input.trim();
    if (!clean) {
        return { outcome: 'failure', narrative: 'Type a command, or "help" to see them all.' };
    }

    const normalized = parseCommand(clean, registry);
    if (!normalized) {
        return { outcome: 'failure', narrative: `I don't understand "${clean}".` };
    }

    const command = registry.getCommand(normalized.commandId);
    if (!command) {
        logger.error(`[executeCommand] Command ${normalized.commandId} not found in registry`);
        return { outcome: 'failure', narrative: `I don't understand "${clean}".` };
    }

    logger.log(`[executeCommand] Running ${normalized.commandId}:`, normalized.parameters);
    return command.run(session, normalized);
}
