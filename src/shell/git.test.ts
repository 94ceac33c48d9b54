import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { SyncUnavailableError } from '../core/errors';
import { GitClient, GitDiffAnalyzer, summarizeChange } from './git';

describe('GitClient', () => {
    it('rejects with SyncUnavailable outside a repository', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pathkeeper-git-'));
        const previous = process.env.GIT_CEILING_DIRECTORIES;
        process.env.GIT_CEILING_DIRECTORIES = path.dirname(dir);
        try {
            const git = new GitClient(dir, 2000);
            await assert.rejects(git.currentRevisionHash(), SyncUnavailableError);
            await assert.rejects(new GitDiffAnalyzer(git).analyze('abc1234', 'def5678'), SyncUnavailableError);
        } finally {
            if (previous === undefined) {
                delete process.env.GIT_CEILING_DIRECTORIES;
            } else {
                process.env.GIT_CEILING_DIRECTORIES = previous;
            }
            await fs.remove(dir);
        }
    });
});

describe('summarizeChange', () => {
    it('reports an empty diff', () => {
        assert.strictEqual(summarizeChange('abc1234ffff', 'def5678ffff', []), 'abc1234..def5678: no file changes');
    });

    it('lists up to five files and counts the rest', () => {
        const files = ['a.ts', 'b.ts', 'c.ts', 'd.ts', 'e.ts', 'f.ts', 'g.ts'];
        assert.strictEqual(
            summarizeChange('abc1234', 'def5678', files),
            'abc1234..def5678: 7 file(s) changed: a.ts, b.ts, c.ts, d.ts, e.ts (+2 more)'
        );
    });
});
