/**
 * SHELL: Git Adapter
 * Time-boxed local git queries. Nothing here is cached: branch and
 * working-tree state are re-read on every call.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { SyncUnavailableError, describeError } from '../core/errors';

const execFileAsync = promisify(execFile);

const HASH_REGEX = /^[0-9a-f]{7,64}$/;

/** Version-control query consumed by the sync checkpoint. */
export interface RevisionSource {
    currentRevisionHash(): Promise<string>;
}

export interface ChangeImpact {
    oldHash: string;
    newHash: string;
    changedFiles: string[];
    summary: string;
}

/** Downstream collaborator handed (old, new) on a detected change. Its verdict never gates the core. */
export interface ChangeAnalyzer {
    analyze(oldHash: string, newHash: string): Promise<ChangeImpact>;
}

export class GitClient implements RevisionSource {
    constructor(
        private readonly cwd: string,
        private readonly timeoutMs = 500
    ) {}

    private async git(args: string[]): Promise<string> {
        try {
            const { stdout } = await execFileAsync('git', args, {
                cwd: this.cwd,
                timeout: this.timeoutMs,
                encoding: 'utf-8',
                maxBuffer: 4 * 1024 * 1024,
            });
            return stdout;
        } catch (err) {
            throw new SyncUnavailableError(`git ${args.join(' ')} failed: ${describeError(err)}`, err);
        }
    }

    async currentRevisionHash(): Promise<string> {
        const hash = (await this.git(['rev-parse', 'HEAD'])).trim();
        if (!HASH_REGEX.test(hash)) {
            throw new SyncUnavailableError(`git rev-parse HEAD returned an unexpected value: '${hash}'`);
        }
        return hash;
    }

    /** Null on a detached HEAD. */
    async currentBranch(): Promise<string | null> {
        const branch = (await this.git(['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
        return branch === 'HEAD' ? null : branch;
    }

    async isClean(): Promise<boolean> {
        return (await this.git(['status', '--porcelain'])).trim() === '';
    }

    async changedFiles(oldHash: string, newHash: string): Promise<string[]> {
        const out = await this.git(['diff', '--name-only', `${oldHash}...${newHash}`]);
        return out
            .split('\n')
            .map((line) => line.trim())
            .filter((line) => line.length > 0);
    }
}

export class GitDiffAnalyzer implements ChangeAnalyzer {
    constructor(private readonly git: GitClient) {}

    async analyze(oldHash: string, newHash: string): Promise<ChangeImpact> {
        const changedFiles = await this.git.changedFiles(oldHash, newHash);
        return {
            oldHash,
            newHash,
            changedFiles,
            summary: summarizeChange(oldHash, newHash, changedFiles),
        };
    }
}

export function summarizeChange(oldHash: string, newHash: string, changedFiles: readonly string[]): string {
    const range = `${oldHash.slice(0, 7)}..${newHash.slice(0, 7)}`;
    if (changedFiles.length === 0) {
        return `${range}: no file changes`;
    }
    const shown = changedFiles.slice(0, 5).join(', ');
    const more = changedFiles.length > 5 ? ` (+${changedFiles.length - 5} more)` : '';
    return `${range}: ${changedFiles.length} file(s) changed: ${shown}${more}`;
}
