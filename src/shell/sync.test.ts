/**
 * SHELL: Sync Checkpoint Tests
 * In-process revision source; no git binary involved.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { NotInitializedError, RollupFailedError, SyncUnavailableError } from '../core/errors';
import { Logger } from '../core/logger';
import { ChangeAnalyzer, ChangeImpact, RevisionSource } from './git';
import { ProjectStore, RevisionRecord } from './store';
import { SyncCheckpoint, describeSync } from './sync';

class FakeRevisionSource implements RevisionSource {
    constructor(public hash: string | Error) {}

    async currentRevisionHash(): Promise<string> {
        if (this.hash instanceof Error) throw this.hash;
        return this.hash;
    }
}

class RecordingLogger implements Logger {
    readonly warnings: string[] = [];
    debug(): void {}
    info(): void {}
    success(): void {}
    warn(msg: string): void {
        this.warnings.push(msg);
    }
    error(): void {}
}

/** Second connection to the same store whose revision write always fails. */
class FlakyStore extends ProjectStore {
    attempts = 0;

    async recordRevision(): Promise<RevisionRecord> {
        this.attempts++;
        throw new RollupFailedError('record revision', new Error('database is locked'));
    }
}

const noSleep = async (): Promise<void> => {};

describe('SyncCheckpoint', () => {
    let root: string;
    let store: ProjectStore;
    let logger: RecordingLogger;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'pathkeeper-sync-'));
        logger = new RecordingLogger();
        store = new ProjectStore(root, { now: () => new Date('2026-02-02T12:00:00.000Z') });
    });

    afterEach(async () => {
        store.close();
        await fs.remove(root);
    });

    it('fails with NotInitialized before the project exists', async () => {
        const checkpoint = new SyncCheckpoint(store, new FakeRevisionSource('abc123'));
        await assert.rejects(checkpoint.sync(), NotInitializedError);
    });

    it('records a baseline, then reports unchanged, then changed', async () => {
        await store.initProject({ name: 'Demo' });
        const source = new FakeRevisionSource('abc123');
        const checkpoint = new SyncCheckpoint(store, source, { logger });

        assert.deepStrictEqual(await checkpoint.sync(), {
            kind: 'initialized',
            hash: 'abc123',
            syncedAt: '2026-02-02T12:00:00.000Z',
        });
        assert.strictEqual(store.getProject().lastKnownGitHash, 'abc123');

        for (let i = 0; i < 2; i++) {
            const again = await checkpoint.sync();
            assert.strictEqual(again.kind, 'unchanged');
            assert.strictEqual(store.getProject().lastKnownGitHash, 'abc123');
        }

        source.hash = 'def456';
        assert.deepStrictEqual(await checkpoint.sync(), {
            kind: 'changed',
            oldHash: 'abc123',
            newHash: 'def456',
            syncedAt: '2026-02-02T12:00:00.000Z',
            impact: null,
        });
        assert.strictEqual(store.getProject().lastKnownGitHash, 'def456');
        assert.strictEqual(store.getProject().lastGitSync, '2026-02-02T12:00:00.000Z');

        const [note] = store.listNotes({ noteType: 'external' });
        assert.strictEqual(note.message, 'External change detected: abc123 -> def456');
    });

    it('hands a detected change to the analyzer', async () => {
        await store.initProject({ name: 'Demo' });
        const source = new FakeRevisionSource('abc123');
        const calls: Array<[string, string]> = [];
        const analyzer: ChangeAnalyzer = {
            async analyze(oldHash, newHash): Promise<ChangeImpact> {
                calls.push([oldHash, newHash]);
                return { oldHash, newHash, changedFiles: ['src/a.ts'], summary: '1 file changed' };
            },
        };
        const checkpoint = new SyncCheckpoint(store, source, { analyzer });
        await checkpoint.sync();
        source.hash = 'def456';

        const result = await checkpoint.sync();
        assert.deepStrictEqual(calls, [['abc123', 'def456']]);
        assert.strictEqual(result.kind === 'changed' ? result.impact?.summary : null, '1 file changed');
        assert.strictEqual(store.listNotes({ noteType: 'external' })[0].message, 'External change detected: 1 file changed');
    });

    it('does not fail the sync when the analyzer fails', async () => {
        await store.initProject({ name: 'Demo' });
        const source = new FakeRevisionSource('abc123');
        const analyzer: ChangeAnalyzer = {
            async analyze(): Promise<ChangeImpact> {
                throw new Error('diff exploded');
            },
        };
        const checkpoint = new SyncCheckpoint(store, source, { analyzer, logger });
        await checkpoint.sync();
        source.hash = 'def456';

        const result = await checkpoint.sync();
        assert.strictEqual(result.kind, 'changed');
        assert.strictEqual(store.getProject().lastKnownGitHash, 'def456');
        assert.deepStrictEqual(logger.warnings, ['Change analysis failed for abc123..def456: diff exploded']);
    });

    it('fails with SyncUnavailable and keeps the stored hash when git is unavailable', async () => {
        await store.initProject({ name: 'Demo' });
        const source = new FakeRevisionSource('abc123');
        const checkpoint = new SyncCheckpoint(store, source, { logger });
        await checkpoint.sync();

        source.hash = new Error('spawn git ENOENT');
        await assert.rejects(checkpoint.sync(), (err: unknown) => {
            return err instanceof SyncUnavailableError && err.message === 'Could not read the current revision: spawn git ENOENT';
        });
        assert.strictEqual(store.getProject().lastKnownGitHash, 'abc123');

        const degraded = await checkpoint.syncOrDegrade();
        assert.deepStrictEqual(degraded, {
            kind: 'unavailable',
            lastKnownHash: 'abc123',
            reason: 'Could not read the current revision: spawn git ENOENT',
        });
        assert.strictEqual(logger.warnings.length, 1);
        assert.strictEqual(
            describeSync(degraded),
            'Git sync unavailable (Could not read the current revision: spawn git ENOENT); last known revision: abc123'
        );
    });

    it('retries the store write with backoff, then degrades', async () => {
        await store.initProject({ name: 'Demo' });
        const flaky = new FlakyStore(root);
        const delays: number[] = [];
        const checkpoint = new SyncCheckpoint(flaky, new FakeRevisionSource('abc123'), {
            retry: { maxAttempts: 3, baseDelayMs: 10 },
            sleep: async (ms) => void delays.push(ms),
        });

        await assert.rejects(checkpoint.sync(), /Could not record revision after 3 attempt\(s\)/);
        flaky.close();
        assert.strictEqual(flaky.attempts, 3);
        assert.deepStrictEqual(delays, [10, 20]);
        assert.strictEqual(store.getProject().lastKnownGitHash, null);
    });

    it('acknowledges HEAD without reporting a change', async () => {
        await store.initProject({ name: 'Demo' });
        const source = new FakeRevisionSource('abc123');
        const checkpoint = new SyncCheckpoint(store, source, { sleep: noSleep });
        await checkpoint.sync();

        source.hash = 'fedcba9';
        assert.deepStrictEqual(await checkpoint.acknowledge(), { hash: 'fedcba9', syncedAt: '2026-02-02T12:00:00.000Z' });
        assert.strictEqual((await checkpoint.sync()).kind, 'unchanged');
        assert.deepStrictEqual(store.listNotes({ noteType: 'external' }), []);
    });
});
