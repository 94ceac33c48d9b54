/**
 * SHELL: Lock Manager
 * Uses proper-lockfile for PID-based ownership and stale lock handling.
 * One writer at a time per store file: SQLite serializes statements, the lock
 * serializes whole operations across processes.
 * Lock mtime is refreshed every 5s. Blocking the event loop for 30+ seconds
 * inside a lock scope lets another process treat the lock as stale.
 */

import lockfile from 'proper-lockfile';
import fs from 'fs-extra';
import path from 'path';
import { LockError } from '../core/errors';

/** Retry backoff base (ms). */
const DEFAULT_LOCK_BASE_MS = 50;
/** Max delay between retries (ms). */
const DEFAULT_LOCK_MAX_DELAY_MS = 2000;
/** Unrecoverable errors: fail fast instead of retrying. */
const FATAL_LOCK_CODES = ['EACCES', 'EPERM', 'EROFS', 'ENOTDIR', 'ENAMETOOLONG'];

export type ReleaseFn = () => Promise<void>;

function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

export class LockManager {
    constructor(private readonly filePath: string) {}

    /**
     * Acquire lock with retries. Returns release function as closure.
     * Caller must call release() in a finally block.
     */
    async acquire(timeoutMs = 5000): Promise<ReleaseFn> {
        await fs.ensureDir(path.dirname(this.filePath));
        // proper-lockfile requires the target to exist.
        await fs.ensureFile(this.filePath);

        const start = Date.now();

        for (let i = 0; ; i++) {
            try {
                return await lockfile.lock(this.filePath, {
                    stale: 30 * 1000,
                    update: 5 * 1000,
                    retries: { retries: 0 },
                });
            } catch (err) {
                const code = errorCode(err);
                if (code && FATAL_LOCK_CODES.includes(code)) {
                    throw new LockError(`Cannot acquire lock on ${this.filePath}: ${code}`, err);
                }
                const remaining = timeoutMs - (Date.now() - start);
                if (remaining <= 0) {
                    throw new LockError(`Could not acquire lock after ${timeoutMs}ms. The store is busy.`, err);
                }
                const delay = Math.min(
                    remaining,
                    DEFAULT_LOCK_BASE_MS * Math.pow(2, i) + Math.random() * DEFAULT_LOCK_BASE_MS,
                    DEFAULT_LOCK_MAX_DELAY_MS
                );
                await new Promise((r) => setTimeout(r, delay));
            }
        }
    }

    async isLocked(): Promise<boolean> {
        if (!(await fs.pathExists(this.filePath))) {
            return false;
        }
        return lockfile.check(this.filePath, { stale: 30 * 1000 });
    }
}
