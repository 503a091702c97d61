import { Command } from './base-command';
import { LookCommand } from './look-command';
import { MeCommand } from './me-command';
import { MoveCommand } from './move-command';
import { PickupCommand } from './pickup-command';
import { InventoryCommand } from './inventory-command';
import { UseCommand } from './use-command';
import { ChallengeCommand } from './challenge-command';
import { PetsCommand } from './pets-command';
import { SwitchCommand } from './switch-command';
import { StatsCommand } from './stats-command';
import { HelpCommand } from './help-command';
import { AliasTable } from '../utils/input-parser';

/**
 * Registry that maps command IDs and their aliases to command instances.
 */
export class CommandRegistry {
    private commands: Map<string, Command> = new Map();
    private verbs: Map<string, Command> = new Map();

    constructor() {
        this.register(new LookCommand());
        this.register(new MeCommand());
        this.register(new MoveCommand());
        this.register(new PickupCommand());
        this.register(new InventoryCommand());
        this.register(new UseCommand());
        this.register(new ChallengeCommand());
        this.register(new PetsCommand());
        this.register(new SwitchCommand());
        this.register(new StatsCommand());
        this.register(new HelpCommand(this));
    }

    /**
     * Register a command instance. A later command takes over any alias it shares
     * with an earlier one.
     */
    register(command: Command): void {
        this.commands.set(command.getCommandId(), command);
        const { singleWords, phrasalVerbs } = command.getAliases();
        for (const verb of [command.getCommandId(), ...singleWords, ...phrasalVerbs]) {
            this.verbs.set(verb.toLowerCase(), command);
        }
    }

    getCommand(commandId: string): Command | null {
        return this.commands.get(commandId) || null;
    }

    /**
     * Find the command a verb (command ID, alias or phrasal verb) selects.
     */
    findByVerb(verb: string): Command | null {
        return this.verbs.get(verb.toLowerCase()) || null;
    }

    getAllCommandIds(): string[] {
        return Array.from(this.commands.keys());
    }

    getAliasTable(): AliasTable {
        const singleWords = new Set<string>();
        const phrasalVerbs = new Set<string>();
        for (const verb of this.verbs.keys()) {
            (verb.includes(' ') ? phrasalVerbs : singleWords).add(verb);
        }
        return { singleWords, phrasalVerbs };
    }
}
