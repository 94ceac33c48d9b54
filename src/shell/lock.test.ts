/**
 * SHELL: Lock Manager Tests
 * Normal flow, contention timeout, fail-fast on fatal errors.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { LockError } from '../core/errors';
import { LockManager } from './lock';

describe('LockManager', () => {
    it('should acquire and release lock, creating the target if missing', async () => {
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pathkeeper-lock-'));
        const lock = new LockManager(path.join(tmpDir, '.pathkeeper', 'project.db'));

        const release = await lock.acquire(1000);
        assert.strictEqual(await lock.isLocked(), true);
        await release();
        assert.strictEqual(await lock.isLocked(), false);

        const release2 = await lock.acquire(1000);
        await release2();

        await fs.remove(tmpDir);
    });

    it('should time out with LockError while another owner holds the lock', async () => {
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pathkeeper-lock-busy-'));
        const target = path.join(tmpDir, 'project.db');
        const holder = new LockManager(target);
        const contender = new LockManager(target);

        const release = await holder.acquire(1000);
        try {
            await assert.rejects(contender.acquire(150), (err: unknown) => {
                return err instanceof LockError && err.message === 'Could not acquire lock after 150ms. The store is busy.';
            });
        } finally {
            await release();
            await fs.remove(tmpDir);
        }
    });

    it('should fail fast on EACCES (unrecoverable)', async (t) => {
        if (process.platform === 'win32' || process.getuid?.() === 0) {
            t.skip('permissions are not enforced here');
            return;
        }
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pathkeeper-lock-eacces-'));
        const dataDir = path.join(tmpDir, '.pathkeeper');
        await fs.ensureDir(dataDir);
        await fs.writeFile(path.join(dataDir, 'project.db'), '');

        try {
            await fs.chmod(dataDir, 0o500);
            const lock = new LockManager(path.join(dataDir, 'project.db'));
            await assert.rejects(lock.acquire(500), /Cannot acquire lock on .*: EACCES/);
        } finally {
            await fs.chmod(dataDir, 0o755);
            await fs.remove(tmpDir);
        }
    });
});
