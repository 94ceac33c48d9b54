/**
 * SHELL: Sync Checkpoint
 * Compares the repository HEAD with the last hash the store observed.
 * Only the hash and the sync time are stored; every other git fact is re-read live.
 */

import {
    InvalidTransitionError,
    NotInitializedError,
    SyncUnavailableError,
    describeError,
} from '../core/errors';
import { Logger, SilentLogger } from '../core/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, Sleep, withRetry } from '../core/retry';
import { ChangeAnalyzer, ChangeImpact, RevisionSource } from './git';
import { ProjectStore, RevisionRecord } from './store';

export type SyncResult =
    | { kind: 'initialized'; hash: string; syncedAt: string }
    | { kind: 'unchanged'; hash: string; syncedAt: string }
    | { kind: 'changed'; oldHash: string; newHash: string; syncedAt: string; impact: ChangeImpact | null };

export type DegradedSyncResult =
    | SyncResult
    | { kind: 'unavailable'; lastKnownHash: string | null; reason: string };

export interface SyncCheckpointOptions {
    analyzer?: ChangeAnalyzer;
    logger?: Logger;
    retry?: RetryPolicy;
    sleep?: Sleep;
}

/** Errors that a second attempt cannot fix. */
function isPermanent(err: unknown): boolean {
    return err instanceof NotInitializedError || err instanceof InvalidTransitionError;
}

export class SyncCheckpoint {
    private readonly analyzer: ChangeAnalyzer | null;
    private readonly logger: Logger;
    private readonly retry: RetryPolicy;
    private readonly sleep: Sleep | undefined;

    constructor(
        private readonly store: ProjectStore,
        private readonly source: RevisionSource,
        options: SyncCheckpointOptions = {}
    ) {
        this.analyzer = options.analyzer ?? null;
        this.logger = options.logger ?? new SilentLogger();
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.sleep = options.sleep;
    }

    async sync(): Promise<SyncResult> {
        this.store.getProject();
        const hash = await this.readHead();
        const record = await this.record(hash);
        const oldHash = record.previousHash;

        if (oldHash === null) {
            this.logger.info(`Recorded baseline revision ${hash.slice(0, 12)}`);
            return { kind: 'initialized', hash, syncedAt: record.syncedAt };
        }
        if (oldHash === hash) {
            this.logger.debug(`Revision unchanged at ${hash.slice(0, 12)}`);
            return { kind: 'unchanged', hash, syncedAt: record.syncedAt };
        }

        const impact = await this.analyze(oldHash, hash);
        await this.noteExternalChange(oldHash, hash, impact);
        return { kind: 'changed', oldHash, newHash: hash, syncedAt: record.syncedAt, impact };
    }

    /** Records HEAD as the new baseline after a commit made through the tracked workflow. */
    async acknowledge(): Promise<{ hash: string; syncedAt: string }> {
        this.store.getProject();
        const hash = await this.readHead();
        const record = await this.record(hash);
        this.logger.debug(`Acknowledged revision ${hash.slice(0, 12)}`);
        return { hash, syncedAt: record.syncedAt };
    }

    /** Sync that never stops the session: an unavailable checkpoint keeps the last known hash. */
    async syncOrDegrade(): Promise<DegradedSyncResult> {
        try {
            return await this.sync();
        } catch (err) {
            if (!(err instanceof SyncUnavailableError)) throw err;
            const lastKnownHash = this.store.getProject().lastKnownGitHash;
            this.logger.warn(
                `Git sync unavailable, continuing on ${lastKnownHash ? lastKnownHash.slice(0, 12) : 'no recorded revision'}: ${err.message}`
            );
            return { kind: 'unavailable', lastKnownHash, reason: err.message };
        }
    }

    private async readHead(): Promise<string> {
        try {
            return await this.source.currentRevisionHash();
        } catch (err) {
            if (err instanceof SyncUnavailableError) throw err;
            throw new SyncUnavailableError(`Could not read the current revision: ${describeError(err)}`, err);
        }
    }

    private async record(hash: string): Promise<RevisionRecord> {
        try {
            return await withRetry(() => this.store.recordRevision(hash), this.retry, {
                shouldRetry: (err) => !isPermanent(err),
                sleep: this.sleep,
            });
        } catch (err) {
            if (isPermanent(err)) throw err;
            throw new SyncUnavailableError(
                `Could not record revision after ${this.retry.maxAttempts} attempt(s): ${describeError(err)}`,
                err
            );
        }
    }

    private async analyze(oldHash: string, newHash: string): Promise<ChangeImpact | null> {
        if (!this.analyzer) return null;
        try {
            return await this.analyzer.analyze(oldHash, newHash);
        } catch (err) {
            this.logger.warn(`Change analysis failed for ${oldHash.slice(0, 7)}..${newHash.slice(0, 7)}: ${describeError(err)}`);
            return null;
        }
    }

    private async noteExternalChange(oldHash: string, newHash: string, impact: ChangeImpact | null): Promise<void> {
        const message = impact
            ? `External change detected: ${impact.summary}`
            : `External change detected: ${oldHash} -> ${newHash}`;
        try {
            await this.store.logNote('external', message, { table: 'project', id: 1 });
        } catch (err) {
            this.logger.warn(`Could not log external change note: ${describeError(err)}`);
        }
    }
}

export function describeSync(result: DegradedSyncResult): string {
    switch (result.kind) {
        case 'initialized':
            return `Baseline revision recorded: ${result.hash.slice(0, 12)}`;
        case 'unchanged':
            return `No external changes since ${result.hash.slice(0, 12)}`;
        case 'changed':
            return result.impact
                ? `External change detected: ${result.impact.summary}`
                : `External change detected: ${result.oldHash.slice(0, 12)} -> ${result.newHash.slice(0, 12)}`;
        case 'unavailable':
            return `Git sync unavailable (${result.reason}); last known revision: ${result.lastKnownHash ? result.lastKnownHash.slice(0, 12) : 'none'}`;
    }
}
