import { z } from 'zod';
import type { Battle, GameSession } from '@pymon-world/engine';
import { ParsedCommand } from '../utils/input-parser';

/**
 * Command input after procedural parsing, before parameter validation.
 */
export interface NormalizedCommandInput {
    commandId: string;          // The command ID (e.g., "move", "pickup", "challenge")
    parameters: Record<string, unknown>;
}

export interface CommandResponse {
    outcome: 'success' | 'failure';
    narrative: string;
    /** A battle the front end must play to the end before taking other commands. */
    battle?: Battle;
}

export interface CommandHelp {
    description: string;
    examples: string[];
}

/**
 * A player command: how it is spelled and what it does to the session.
 */
export interface Command {
    /**
     * Get the command ID this command handles (e.g., "look", "pickup", "items").
     */
    getCommandId(): string;

    /**
     * Words that select this command when they start the input line.
     */
    getAliases(): {
        singleWords: string[];
        phrasalVerbs: string[];
    };

    getHelp(): CommandHelp;

    /**
     * Extract parameters from parsed input, or null if the input is not for this command.
     */
    processProcedural(parsed: ParsedCommand, input: string): NormalizedCommandInput | null;

    /**
     * Validate parameters and apply the command to the session.
     */
    run(session: GameSession, input: NormalizedCommandInput): CommandResponse;
}

/**
 * Base for commands whose parameters are checked against a zod schema before
 * they reach the session.
 */
export abstract class SchemaCommand<S extends z.ZodTypeAny> implements Command {
    abstract getCommandId(): string;
    abstract getAliases(): { singleWords: string[]; phrasalVerbs: string[] };
    abstract getHelp(): CommandHelp;
    abstract getParameterSchema(): S;
    abstract processProcedural(parsed: ParsedCommand, input: string): NormalizedCommandInput | null;
    protected abstract resolve(session: GameSession, parameters: z.output<S>): CommandResponse;

    run(session: GameSession, input: NormalizedCommandInput): CommandResponse {
        const parsed = this.getParameterSchema().safeParse(input.parameters);
        if (!parsed.success) {
            const [issue] = parsed.error.issues;
            return {
                outcome: 'failure',
                narrative: issue ? issue.message : `Invalid parameters for ${this.getCommandId()}.`
            };
        }
        return this.resolve(session, parsed.data);
    }
}

export const noParameters = z.object({});
