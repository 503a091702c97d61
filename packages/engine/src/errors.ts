export type PymonErrorKind = 'InvalidDirection' | 'InvalidInputFormat' | 'InvalidSelection' | 'InvalidConfig' | 'GameOver';

/**
 * Base class for every error the engine raises or reports.
 */
export abstract class PymonError extends Error {
    abstract readonly kind: PymonErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidDirectionError extends PymonError {
    readonly kind = 'InvalidDirection' as const;

    constructor(readonly direction: string) {
        super(`Direction - ${direction} does not contain any location`);
    }
}

export class InvalidInputFormatError extends PymonError {
    readonly kind = 'InvalidInputFormat' as const;

    constructor(readonly file: string, readonly detail: string) {
        super(`${file} has invalid content or is in an incorrect format: ${detail}`);
    }
}

export class InvalidSelectionError extends PymonError {
    readonly kind = 'InvalidSelection' as const;

    constructor(message: string) {
        super(message);
    }
}

export class InvalidConfigError extends PymonError {
    readonly kind = 'InvalidConfig' as const;

    constructor(readonly detail: string) {
        super(`Invalid configuration: ${detail}`);
    }
}

/**
 * Raised when a battle is lost and no benched Pymon is left. Terminal for the
 * session, not a defect.
 */
export class GameOverError extends PymonError {
    readonly kind = 'GameOver' as const;

    constructor(readonly nickname: string) {
        super(`${nickname} ran away and you have no Pymon left. GAME OVER!`);
    }
}
