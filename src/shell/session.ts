/**
 * SHELL: Workspace & Session
 * Wires config, store, git and checkpoint for one root directory.
 */

import path from 'path';
import fs from 'fs-extra';
import { ConfigLoader, PathkeeperConfig } from '../core/config';
import { SyncUnavailableError } from '../core/errors';
import { Logger, SilentLogger } from '../core/logger';
import { getDataDir } from '../core/paths';
import { LiveGitFacts, StatusSnapshot } from '../core/status';
import { Project } from '../core/types';
import { ChangeAnalyzer, GitClient, GitDiffAnalyzer, RevisionSource } from './git';
import { ProjectStore } from './store';
import { DegradedSyncResult, SyncCheckpoint } from './sync';

export interface Workspace {
    root: string;
    config: PathkeeperConfig;
    store: ProjectStore;
    git: GitClient;
    checkpoint: SyncCheckpoint;
    logger: Logger;
    close(): void;
}

export interface WorkspaceOptions {
    /** A logger, or a factory that receives the loaded config. */
    logger?: Logger | ((config: PathkeeperConfig) => Logger);
    /** Replaces the git client as the checkpoint's revision source. */
    revisionSource?: RevisionSource;
    analyzer?: ChangeAnalyzer;
    now?: () => Date;
}

export async function openWorkspace(root: string, options: WorkspaceOptions = {}): Promise<Workspace> {
    const config = await new ConfigLoader(root).load();
    const logger = typeof options.logger === 'function' ? options.logger(config) : options.logger ?? new SilentLogger();

    const store = new ProjectStore(root, {
        database: config.database,
        logger,
        lockTimeoutMs: config.lock.timeoutMs,
        now: options.now,
    });
    const git = new GitClient(root, config.git.timeoutMs);
    const checkpoint = new SyncCheckpoint(store, options.revisionSource ?? git, {
        analyzer: options.analyzer ?? new GitDiffAnalyzer(git),
        logger,
        retry: { maxAttempts: config.sync.maxAttempts, baseDelayMs: config.sync.baseDelayMs, maxDelayMs: 2000 },
    });

    return {
        root,
        config,
        store,
        git,
        checkpoint,
        logger,
        close: () => store.close(),
    };
}

export interface InitResult {
    project: Project;
    configWritten: boolean;
    gitignoreWritten: boolean;
    sync: DegradedSyncResult;
}

/** Keeps the SQLite side files and the lock out of commits; the database itself stays tracked. */
export async function writeDataGitignore(root: string, database: string): Promise<boolean> {
    const file = path.join(getDataDir(root), '.gitignore');
    if (await fs.pathExists(file)) {
        return false;
    }
    await fs.outputFile(file, [`${database}-wal`, `${database}-shm`, `${database}.lock`, ''].join('\n'), 'utf-8');
    return true;
}

/** Creates .pathkeeper/ with its default config and .gitignore, the project row and the first git baseline. */
export async function initWorkspace(
    workspace: Workspace,
    input: { name: string; purpose?: string }
): Promise<InitResult> {
    const configWritten = await new ConfigLoader(workspace.root).writeDefaults();
    const project = await workspace.store.initProject(input);
    const gitignoreWritten = await writeDataGitignore(workspace.root, workspace.config.database);
    workspace.logger.success(`Initialized project '${project.name}'`);
    const sync = await workspace.checkpoint.syncOrDegrade();
    return { project: workspace.store.getProject(), configWritten, gitignoreWritten, sync };
}

export interface SessionStart {
    sync: DegradedSyncResult;
    status: StatusSnapshot;
    git: LiveGitFacts | null;
}

/** Session start: sync (degrading on failure), then a fresh status snapshot. */
export async function startSession(workspace: Workspace): Promise<SessionStart> {
    const sync = await workspace.checkpoint.syncOrDegrade();
    const status = workspace.store.getStatus();
    const git = sync.kind === 'unavailable' ? null : await readLiveGitFacts(workspace);
    return { sync, status, git };
}

/** Branch and cleanliness, re-derived per call. Null when git cannot answer. */
export async function readLiveGitFacts(workspace: Workspace): Promise<LiveGitFacts | null> {
    try {
        const [branch, clean] = await Promise.all([workspace.git.currentBranch(), workspace.git.isClean()]);
        return { branch, clean };
    } catch (err) {
        if (!(err instanceof SyncUnavailableError)) throw err;
        workspace.logger.debug(`Live git facts unavailable: ${err.message}`);
        return null;
    }
}
