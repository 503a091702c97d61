import { isGameOver, logger, runBattle } from '@pymon-world/engine';
import type { Battle, GameSession } from '@pymon-world/engine';
import { executeCommand } from './command';
import { formatLocation, formatOutcome, formatPymon } from './format';

/**
 * Where the loop reads player input and writes game text.
 * `ask` resolves to null when the player cancels (Ctrl+C, end of input).
 */
export interface GameIO {
    ask(message: string): Promise<string | null>;
    print(text: string): void;
}

const QUIT_WORDS = new Set(['quit', 'exit', 'q']);

class QuitRequested extends Error {}

async function fightBattle(battle: Battle, io: GameIO): Promise<void> {
    const outcome = await runBattle(
        battle,
        async round => {
            const hand = await io.ask(`Round ${round}: choose rock, paper or scissors`);
            if (hand === null) throw new QuitRequested();
            return hand;
        },
        {
            onRound: (_round, narrative) => io.print(narrative),
            onRejected: narrative => io.print(narrative)
        }
    );
    if (outcome) {
        io.print(formatOutcome(outcome));
    }
}

/**
 * Run commands until the player quits or the game ends.
 * Resolves to the process exit code; a game over is a normal ending.
 */
export async function runGame(session: GameSession, io: GameIO, title: string): Promise<number> {
    io.print(`Welcome to ${title}!`);
    io.print(formatPymon(session.activePymon()));
    const start = session.currentLocation();
    if (start) {
        io.print(formatLocation(start));
    }
    io.print('Type "help" to see the commands.');

    while (true) {
        const line = await io.ask('What would you like to do?');
        if (line === null || QUIT_WORDS.has(line.trim().toLowerCase())) {
            io.print('Thanks for playing. Goodbye!');
            return 0;
        }

        try {
            const response = executeCommand(session, line);
            io.print(response.narrative);
            if (response.battle) {
                await fightBattle(response.battle, io);
            }
        } catch (error) {
            if (isGameOver(error)) {
                io.print(error.message);
                return 0;
            }
            if (error instanceof QuitRequested) {
                logger.log('[runGame] Player left in the middle of a battle');
                io.print('Thanks for playing. Goodbye!');
                return 0;
            }
            throw error;
        }
    }
}
