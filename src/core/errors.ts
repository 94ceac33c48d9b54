import { Logger } from './logger';

export type ErrorCode =
    | 'NOT_INITIALIZED'
    | 'NOT_FOUND'
    | 'ALREADY_COMPLETE'
    | 'ROLLUP_FAILED'
    | 'SYNC_UNAVAILABLE'
    | 'INVALID_TRANSITION'
    | 'CONFIG_ERROR'
    | 'LOCK_ERROR'
    | 'INVALID_INPUT';

export type EntityKind = 'project' | 'completion_path' | 'milestone' | 'task' | 'subtask' | 'sidequest' | 'item';

/**
 * Base error for every failure the store, checkpoint or shell reports on purpose.
 * Anything that is not a PathkeeperError is an unexpected fault.
 */
export class PathkeeperError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly hint?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PathkeeperError';
    }

    toString(): string {
        if (this.hint) {
            return `${this.message}\nHint: ${this.hint}`;
        }
        return this.message;
    }

    toJSON(): { code: ErrorCode; message: string; hint?: string } {
        return this.hint
            ? { code: this.code, message: this.message, hint: this.hint }
            : { code: this.code, message: this.message };
    }
}

export class NotInitializedError extends PathkeeperError {
    constructor(message = 'No project has been initialized in this store.') {
        super('NOT_INITIALIZED', message, 'Run: pathkeeper init <name>');
        this.name = 'NotInitializedError';
    }
}

export class NotFoundError extends PathkeeperError {
    constructor(
        public readonly entity: EntityKind,
        public readonly id: number,
        detail?: string
    ) {
        super(
            'NOT_FOUND',
            `${entity} ${id} not found${detail ? ` ${detail}` : ''}`,
            'Re-read the project status to resolve current ids.'
        );
        this.name = 'NotFoundError';
    }
}

/** Re-completion of something already done. Only strict completions throw it; otherwise it is a no-op result. */
export class AlreadyCompleteError extends PathkeeperError {
    constructor(public readonly entity: EntityKind, public readonly id: number) {
        super('ALREADY_COMPLETE', `${entity} ${id} is already completed`);
        this.name = 'AlreadyCompleteError';
    }
}

export class RollupFailedError extends PathkeeperError {
    constructor(public readonly operation: string, cause: unknown) {
        super(
            'ROLLUP_FAILED',
            `${operation} could not be committed after a retry: ${describeError(cause)}`,
            'Nothing was changed. Retry the operation later.',
            { cause }
        );
        this.name = 'RollupFailedError';
    }
}

export class SyncUnavailableError extends PathkeeperError {
    constructor(message: string, cause?: unknown) {
        super(
            'SYNC_UNAVAILABLE',
            message,
            'Work continues on the last synced revision. Check that git is installed and this is a repository.',
            { cause }
        );
        this.name = 'SyncUnavailableError';
    }
}

export class InvalidTransitionError extends PathkeeperError {
    constructor(
        public readonly entity: EntityKind,
        public readonly id: number,
        public readonly actual: string,
        public readonly attempted: string,
        detail?: string
    ) {
        super(
            'INVALID_TRANSITION',
            `Cannot ${attempted} ${entity} ${id}: it is ${actual}${detail ? `. ${detail}` : ''}`
        );
        this.name = 'InvalidTransitionError';
    }
}

export class ConfigError extends PathkeeperError {
    constructor(message: string) {
        super('CONFIG_ERROR', message, 'Fix or delete .pathkeeper/config.json');
        this.name = 'ConfigError';
    }
}

export class LockError extends PathkeeperError {
    constructor(message: string, cause?: unknown) {
        super('LOCK_ERROR', message, 'Another session is writing. Wait and try again.', { cause });
        this.name = 'LockError';
    }
}

export class InvalidInputError extends PathkeeperError {
    constructor(message: string, hint?: string) {
        super('INVALID_INPUT', message, hint);
        this.name = 'InvalidInputError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function logError(logger: Logger, error: unknown): void {
    if (error instanceof PathkeeperError) {
        logger.error(`[${error.code}] ${error.message}`);
        if (error.hint) {
            logger.info(`Hint: ${error.hint}`);
        }
        return;
    }
    logger.error(`[ERROR] ${describeError(error)}`);
}
