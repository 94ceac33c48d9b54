/**
 * SHELL: Project Store
 * SQLite persistence of the project tree.
 * Every mutation: Lock -> BEGIN IMMEDIATE -> read -> validate -> write -> COMMIT -> Unlock.
 * Readers never observe a half-applied rollup.
 */

import Database from 'better-sqlite3';
import fs from 'fs-extra';
import { z } from 'zod';
import {
    AlreadyCompleteError,
    InvalidTransitionError,
    NotFoundError,
    NotInitializedError,
    PathkeeperError,
    RollupFailedError,
    describeError,
} from '../core/errors';
import { Logger, SilentLogger } from '../core/logger';
import { getDataDir, getDatabasePath } from '../core/paths';
import { RollupDecision, RollupStep, planRollup, pickNext } from '../core/rollup';
import {
    activated,
    OpenSubwork,
    assertArchivable,
    assertMilestoneOpen,
    assertNoOpenSubwork,
    assertPathOpen,
    assertProjectActive,
    assertSidequestCompletable,
    assertSubtaskCompletable,
    assertTaskCompletable,
    assertTaskOpen,
    canStartTask,
} from '../core/rules';
import { ProgressCount, StatusSnapshot, TaskProgress, resolveNeedsInput } from '../core/status';
import {
    CompletionOptions,
    CompletionPath,
    DefinedSubtask,
    DefinedTask,
    Item,
    ItemCompletion,
    Milestone,
    NewCompletionPath,
    NewMilestone,
    NewSidequest,
    NewSubtask,
    Note,
    NoteRef,
    NoteType,
    OpenedSidequest,
    ParentRef,
    Priority,
    Project,
    RollupOutcome,
    Sidequest,
    Subtask,
    SubworkCompletion,
    SubworkItemCompletion,
    SubworkRef,
    Task,
    TaskCompletion,
    TaskDefinition,
} from '../core/types';
import { LockManager } from './lock';
import {
    CompletionPathRow,
    CountRow,
    ItemRow,
    MaxOrderRow,
    MilestoneOrderRowSchema,
    MilestoneRow,
    NoteRow,
    OpenCountRow,
    OrderedRowSchema,
    ProjectRow,
    SidequestRow,
    SubtaskRow,
    TaskCountRow,
    TaskRow,
} from './rows';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema';

export interface ProjectStoreOptions {
    /** Database file name under .pathkeeper/. */
    database?: string;
    logger?: Logger;
    lockTimeoutMs?: number;
    now?: () => Date;
}

export interface NewProject {
    name: string;
    purpose?: string;
}

export interface NoteFilter {
    noteType?: NoteType;
    limit?: number;
}

export interface SidequestFilter {
    taskId?: number;
    openOnly?: boolean;
}

export interface RevisionRecord {
    previousHash: string | null;
    hash: string;
    syncedAt: string;
}

type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface ItemOwner {
    taskId: number;
    subtaskId?: number;
    sidequestId?: number;
}

/** Items that belong to the task itself rather than to one of its subtasks or sidequests. */
const OWN_ITEMS = 'task_id = ? AND subtask_id IS NULL AND sidequest_id IS NULL';

/** Attempts per transaction before RollupFailed. */
const MUTATION_ATTEMPTS = 2;

export class ProjectStore {
    private readonly db: Database.Database;
    private readonly lock: LockManager;
    private readonly logger: Logger;
    private readonly lockTimeoutMs: number;
    private readonly now: () => Date;
    readonly dbPath: string;

    constructor(rootDir: string, options: ProjectStoreOptions = {}) {
        this.dbPath = getDatabasePath(rootDir, options.database ?? 'project.db');
        this.logger = options.logger ?? new SilentLogger();
        this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
        this.now = options.now ?? (() => new Date());

        fs.ensureDirSync(getDataDir(rootDir));
        this.db = new Database(this.dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.db.pragma(`busy_timeout = ${this.lockTimeoutMs}`);
        this.db.exec(SCHEMA_SQL);
        this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
        this.lock = new LockManager(this.dbPath);
    }

    close(): void {
        this.db.close();
    }

    // ---------------------------------------------------------------
    // Transactions
    // ---------------------------------------------------------------

    /**
     * Runs `work` in one immediate transaction while holding the store lock.
     * Domain errors surface as-is. Anything else rolls back and is retried once,
     * then becomes RollupFailed with the store left as it was.
     */
    private async mutate<T>(label: string, work: () => T, attempts = MUTATION_ATTEMPTS): Promise<T> {
        const release = await this.lock.acquire(this.lockTimeoutMs);
        try {
            const txn = this.db.transaction(work);
            for (let attempt = 1; ; attempt++) {
                try {
                    return txn.immediate();
                } catch (err) {
                    if (err instanceof PathkeeperError) throw err;
                    if (attempt >= attempts) {
                        throw new RollupFailedError(label, err);
                    }
                    this.logger.warn(`${label} failed (attempt ${attempt}/${attempts}), retrying: ${describeError(err)}`);
                }
            }
        } finally {
            await release();
        }
    }

    private timestamp(): string {
        return this.now().toISOString();
    }

    private one<T>(schema: RowSchema<T>, sql: string, ...params: unknown[]): T | null {
        const row = this.db.prepare(sql).get(...params);
        return row === undefined ? null : schema.parse(row);
    }

    private many<T>(schema: RowSchema<T>, sql: string, ...params: unknown[]): T[] {
        return this.db
            .prepare(sql)
            .all(...params)
            .map((row) => schema.parse(row));
    }

    private insert(sql: string, ...params: unknown[]): number {
        return Number(this.db.prepare(sql).run(...params).lastInsertRowid);
    }

    private run(sql: string, ...params: unknown[]): number {
        return this.db.prepare(sql).run(...params).changes;
    }

    // ---------------------------------------------------------------
    // Project
    // ---------------------------------------------------------------

    isInitialized(): boolean {
        return this.one(ProjectRow, 'SELECT * FROM project WHERE id = 1') !== null;
    }

    getProject(): Project {
        const project = this.one(ProjectRow, 'SELECT * FROM project WHERE id = 1');
        if (!project) {
            throw new NotInitializedError();
        }
        return project;
    }

    async initProject(input: NewProject): Promise<Project> {
        return this.mutate('initialize project', () => {
            const existing = this.one(ProjectRow, 'SELECT * FROM project WHERE id = 1');
            if (existing) {
                throw new InvalidTransitionError(
                    'project',
                    existing.id,
                    existing.status,
                    'initialize',
                    `Project '${existing.name}' already exists in this store`
                );
            }
            const at = this.timestamp();
            this.run(
                'INSERT INTO project (id, name, purpose, status, created_at, updated_at) VALUES (1, ?, ?, ?, ?, ?)',
                input.name,
                input.purpose ?? '',
                'active',
                at,
                at
            );
            return this.getProject();
        });
    }

    async archiveProject(): Promise<Project> {
        return this.mutate('archive project', () => {
            const project = this.getProject();
            assertArchivable(project);
            this.run("UPDATE project SET status = 'archived', updated_at = ? WHERE id = 1", this.timestamp());
            return this.getProject();
        });
    }

    /**
     * Single write path for the sync fields. One attempt only: the checkpoint
     * owns the backoff policy for this write.
     */
    async recordRevision(hash: string): Promise<RevisionRecord> {
        return this.mutate(
            'record revision',
            (): RevisionRecord => {
                const project = this.getProject();
                if (project.status === 'archived') {
                    throw new InvalidTransitionError('project', project.id, 'archived', 'record a revision for');
                }
                const syncedAt = this.timestamp();
                this.run(
                    'UPDATE project SET last_known_git_hash = ?, last_git_sync = ?, updated_at = ? WHERE id = 1',
                    hash,
                    syncedAt,
                    syncedAt
                );
                return { previousHash: project.lastKnownGitHash, hash, syncedAt };
            },
            1
        );
    }

    // ---------------------------------------------------------------
    // Planning inputs
    // ---------------------------------------------------------------

    private nextOrder(table: 'completion_paths' | 'milestones' | 'tasks' | 'subtasks', where = '', ...params: unknown[]): number {
        const row = this.one(MaxOrderRow, `SELECT MAX(order_index) AS max_order FROM ${table} ${where}`, ...params);
        return (row?.max_order ?? 0) + 1;
    }

    async addCompletionPath(input: NewCompletionPath): Promise<CompletionPath> {
        return this.mutate('add completion path', () => {
            assertProjectActive(this.getProject(), 'add a completion path to');
            const at = this.timestamp();
            const id = this.insert(
                'INSERT INTO completion_paths (name, description, status, order_index, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)',
                input.name,
                input.description ?? '',
                'pending',
                input.orderIndex ?? this.nextOrder('completion_paths'),
                at,
                at
            );
            return this.requirePath(id);
        });
    }

    async addMilestone(pathId: number, input: NewMilestone): Promise<Milestone> {
        return this.mutate('add milestone', () => {
            assertProjectActive(this.getProject(), 'add a milestone to');
            assertPathOpen(this.requirePath(pathId), 'add a milestone to');
            const at = this.timestamp();
            const id = this.insert(
                `INSERT INTO milestones (completion_path_id, name, description, status, order_index, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?)`,
                pathId,
                input.name,
                input.description ?? '',
                'pending',
                input.orderIndex ?? this.nextOrder('milestones', 'WHERE completion_path_id = ?', pathId),
                at,
                at
            );
            return this.requireMilestone(id);
        });
    }

    /** The external task definition: a named task and its ordered checklist. */
    async defineTask(milestoneId: number, definition: TaskDefinition): Promise<DefinedTask> {
        return this.mutate('define task', () => {
            assertProjectActive(this.getProject(), 'define a task in');
            assertMilestoneOpen(this.requireMilestone(milestoneId), 'define a task in');
            const at = this.timestamp();
            const taskId = this.insert(
                `INSERT INTO tasks (milestone_id, name, description, status, priority, order_index, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
                milestoneId,
                definition.name,
                definition.description ?? '',
                'pending',
                definition.priority ?? 'medium',
                definition.orderIndex ?? this.nextOrder('tasks', 'WHERE milestone_id = ?', milestoneId),
                at,
                at
            );
            this.insertItems({ taskId }, definition.items ?? [], at);
            return { task: this.requireTask(taskId), items: this.listItems(taskId) };
        });
    }

    async setTaskPriority(taskId: number, priority: Priority): Promise<Task> {
        return this.mutate('set task priority', () => {
            assertProjectActive(this.getProject(), 'reprioritize a task in');
            assertTaskOpen(this.requireTask(taskId), 'reprioritize');
            this.run('UPDATE tasks SET priority = ?, updated_at = ? WHERE id = ?', priority, this.timestamp(), taskId);
            return this.requireTask(taskId);
        });
    }

    async addSubtask(taskId: number, input: NewSubtask): Promise<DefinedSubtask> {
        return this.mutate('add subtask', () => {
            assertProjectActive(this.getProject(), 'add a subtask in');
            assertTaskOpen(this.requireTask(taskId), 'add a subtask to');
            const at = this.timestamp();
            const subtaskId = this.insert(
                `INSERT INTO subtasks (parent_task_id, name, description, status, priority, order_index, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
                taskId,
                input.name,
                input.description ?? '',
                'pending',
                input.priority ?? 'high',
                input.orderIndex ?? this.nextOrder('subtasks', 'WHERE parent_task_id = ?', taskId),
                at,
                at
            );
            this.insertItems({ taskId, subtaskId }, input.items ?? [], at);
            return {
                subtask: this.requireSubtask(subtaskId),
                items: this.listSubworkItems({ kind: 'subtask', id: subtaskId }),
            };
        });
    }

    /** Pauses the task (and optionally one of its subtasks) until the sidequest closes. */
    async openSidequest(taskId: number, input: NewSidequest): Promise<OpenedSidequest> {
        return this.mutate('open sidequest', () => {
            assertProjectActive(this.getProject(), 'open a sidequest in');
            assertTaskOpen(this.requireTask(taskId), 'open a sidequest on');
            if (input.subtaskId !== undefined) {
                const subtask = this.requireSubtask(input.subtaskId);
                if (subtask.taskId !== taskId) {
                    throw new NotFoundError('subtask', subtask.id, `in task ${taskId}`);
                }
                if (subtask.status === 'completed') {
                    throw new InvalidTransitionError('subtask', subtask.id, 'completed', 'pause');
                }
            }
            const at = this.timestamp();
            const sidequestId = this.insert(
                `INSERT INTO sidequests (paused_task_id, paused_subtask_id, name, description, status, priority, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
                taskId,
                input.subtaskId ?? null,
                input.name,
                input.description ?? '',
                'pending',
                input.priority ?? 'critical',
                at,
                at
            );
            this.insertItems({ taskId, sidequestId }, input.items ?? [], at);
            this.appendNote(
                'task_context',
                `Task #${taskId} paused by sidequest #${sidequestId}: ${input.name}`,
                { table: 'sidequests', id: sidequestId },
                at
            );
            return {
                sidequest: this.requireSidequest(sidequestId),
                items: this.listSubworkItems({ kind: 'sidequest', id: sidequestId }),
            };
        });
    }

    private insertItems(owner: ItemOwner, descriptions: string[], at: string): void {
        descriptions.forEach((description, index) => {
            this.insert(
                `INSERT INTO items (task_id, subtask_id, sidequest_id, description, done, order_index, created_at, updated_at)
                 VALUES (?, ?, ?, ?, 0, ?, ?, ?)`,
                owner.taskId,
                owner.subtaskId ?? null,
                owner.sidequestId ?? null,
                description,
                index + 1,
                at,
                at
            );
        });
    }

    // ---------------------------------------------------------------
    // Task completion engine
    // ---------------------------------------------------------------

    async startTask(taskId: number): Promise<Task> {
        return this.mutate('start task', () => {
            assertProjectActive(this.getProject(), 'start a task in');
            const task = this.requireTask(taskId);
            if (!canStartTask(task)) {
                return task;
            }
            this.activateAncestors(task, this.timestamp());
            return this.requireTask(taskId);
        });
    }

    async completeItem(taskId: number, itemId: number, options: CompletionOptions = {}): Promise<ItemCompletion> {
        return this.mutate('complete item', (): ItemCompletion => {
            const project = this.getProject();
            const task = this.requireTask(taskId);
            const item = this.requireItem(itemId);
            if (item.taskId !== taskId || item.subtaskId !== null || item.sidequestId !== null) {
                throw new NotFoundError('item', itemId, `in task ${taskId}`);
            }
            if (task.status === 'completed') {
                if (options.strict) throw new AlreadyCompleteError('task', taskId);
                return { task, item, alreadyComplete: true, rollup: null };
            }
            if (options.strict && item.done) {
                throw new AlreadyCompleteError('item', itemId);
            }
            assertProjectActive(project, 'complete an item in');

            const at = this.timestamp();
            if (!item.done) {
                this.run('UPDATE items SET done = 1, completed_at = ?, updated_at = ? WHERE id = ?', at, at, itemId);
            }
            this.activateAncestors(task, at);

            const rollup = this.settleTask(taskId, at);
            return { task: this.requireTask(taskId), item: this.requireItem(itemId), alreadyComplete: false, rollup };
        });
    }

    async completeTask(taskId: number, options: CompletionOptions = {}): Promise<TaskCompletion> {
        return this.mutate('complete task', (): TaskCompletion => {
            const project = this.getProject();
            const task = this.requireTask(taskId);
            if (task.status === 'completed') {
                if (options.strict) throw new AlreadyCompleteError('task', taskId);
                return { task, milestoneCompleted: false, rollup: { kind: 'already_complete' } };
            }
            assertProjectActive(project, 'complete a task in');
            assertTaskCompletable(task, this.countOpenItems(taskId));
            assertNoOpenSubwork(task, this.openSubwork(taskId));

            const at = this.timestamp();
            this.activateAncestors(task, at);
            const rollup = this.finishTask(taskId, false, at);
            return { task: this.requireTask(taskId), milestoneCompleted: rollup.kind !== 'task_completed', rollup };
        });
    }

    /** Policy exception: completes a task with open items and records why. */
    async forceCompleteTask(taskId: number, reason: string): Promise<TaskCompletion> {
        return this.mutate('force-complete task', (): TaskCompletion => {
            const project = this.getProject();
            const task = this.requireTask(taskId);
            if (task.status === 'completed') {
                return { task, milestoneCompleted: false, rollup: { kind: 'already_complete' } };
            }
            assertProjectActive(project, 'complete a task in');

            const at = this.timestamp();
            const waived = [`${this.countOpenItems(taskId)} open item(s)`];
            const subwork = this.openSubwork(taskId);
            if (subwork.subtasks > 0) waived.push(`${subwork.subtasks} open subtask(s)`);
            if (subwork.sidequests > 0) waived.push(`${subwork.sidequests} open sidequest(s)`);
            this.activateAncestors(task, at);
            const rollup = this.finishTask(taskId, true, at);
            this.appendNote(
                'task_context',
                `Force-completed with ${waived.join(', ')}: ${reason}`,
                { table: 'tasks', id: taskId },
                at
            );
            return { task: this.requireTask(taskId), milestoneCompleted: rollup.kind !== 'task_completed', rollup };
        });
    }

    async completeSubtask(subtaskId: number, options: CompletionOptions = {}): Promise<SubworkCompletion> {
        return this.mutate('complete subtask', (): SubworkCompletion => {
            const project = this.getProject();
            const subtask = this.requireSubtask(subtaskId);
            const ref: SubworkRef = { kind: 'subtask', id: subtaskId };
            if (subtask.status === 'completed') {
                return this.alreadyClosed(ref, subtask, options);
            }
            assertProjectActive(project, 'complete a subtask in');
            assertSubtaskCompletable(subtask, this.countOpenSubworkItems(ref), this.countPausingSidequests(subtaskId));
            return this.closeAndSettle(ref, subtask.taskId);
        });
    }

    async completeSidequest(sidequestId: number, options: CompletionOptions = {}): Promise<SubworkCompletion> {
        return this.mutate('complete sidequest', (): SubworkCompletion => {
            const project = this.getProject();
            const sidequest = this.requireSidequest(sidequestId);
            const ref: SubworkRef = { kind: 'sidequest', id: sidequestId };
            if (sidequest.status === 'completed') {
                return this.alreadyClosed(ref, sidequest, options);
            }
            assertProjectActive(project, 'complete a sidequest in');
            assertSidequestCompletable(sidequest, this.countOpenSubworkItems(ref));
            return this.closeAndSettle(ref, sidequest.taskId);
        });
    }

    /** Marks one item of a subtask or sidequest done; its last open item closes the owner. */
    async completeSubworkItem(ref: SubworkRef, itemId: number, options: CompletionOptions = {}): Promise<SubworkItemCompletion> {
        return this.mutate(`complete ${ref.kind} item`, (): SubworkItemCompletion => {
            const project = this.getProject();
            const work = this.requireSubwork(ref);
            const item = this.requireItem(itemId);
            if ((ref.kind === 'subtask' ? item.subtaskId : item.sidequestId) !== ref.id) {
                throw new NotFoundError('item', itemId, `in ${ref.kind} ${ref.id}`);
            }
            if (work.status === 'completed') {
                return { ...this.alreadyClosed(ref, work, options), item, closed: false };
            }
            if (options.strict && item.done) {
                throw new AlreadyCompleteError('item', itemId);
            }
            assertProjectActive(project, 'complete an item in');

            const at = this.timestamp();
            if (!item.done) {
                this.run('UPDATE items SET done = 1, completed_at = ?, updated_at = ? WHERE id = ?', at, at, itemId);
            }
            if (activated(work.status) !== work.status) {
                this.run(`UPDATE ${this.subworkTable(ref)} SET status = 'in_progress', updated_at = ? WHERE id = ?`, at, ref.id);
            }
            this.activateAncestors(this.requireTask(work.taskId), at);

            const closed = this.settleSubwork(ref, at);
            const taskRollup = closed ? this.settleTask(work.taskId, at) : null;
            return { work: this.requireSubwork(ref), item: this.requireItem(itemId), alreadyComplete: false, closed, taskRollup };
        });
    }

    private alreadyClosed(ref: SubworkRef, work: Subtask | Sidequest, options: CompletionOptions): SubworkCompletion {
        if (options.strict) throw new AlreadyCompleteError(ref.kind, ref.id);
        return { work, alreadyComplete: true, taskRollup: null };
    }

    private closeAndSettle(ref: SubworkRef, taskId: number): SubworkCompletion {
        const at = this.timestamp();
        this.activateAncestors(this.requireTask(taskId), at);
        this.closeSubwork(ref, at);
        return { work: this.requireSubwork(ref), alreadyComplete: false, taskRollup: this.settleTask(taskId, at) };
    }

    /** A closed sidequest resumes what it paused; a subtask it held may close in turn. */
    private closeSubwork(ref: SubworkRef, at: string): void {
        this.run(
            `UPDATE ${this.subworkTable(ref)} SET status = 'completed', completed_at = ?, updated_at = ? WHERE id = ?`,
            at,
            at,
            ref.id
        );
        if (ref.kind === 'sidequest') {
            const sidequest = this.requireSidequest(ref.id);
            this.appendNote(
                'task_context',
                `Sidequest #${sidequest.id} closed; task #${sidequest.taskId} resumes`,
                { table: 'sidequests', id: sidequest.id },
                at
            );
            if (sidequest.subtaskId !== null) {
                this.settleSubwork({ kind: 'subtask', id: sidequest.subtaskId }, at);
            }
        }
    }

    /** Closes a subtask or sidequest whose checklist is done and that nothing pauses. Item-less work closes only explicitly. */
    private settleSubwork(ref: SubworkRef, at: string): boolean {
        const work = this.requireSubwork(ref);
        if (work.status === 'completed') return false;
        const items = this.one(
            CountRow,
            `SELECT COUNT(*) AS total, SUM(done) AS completed FROM items WHERE ${this.subworkItemColumn(ref)} = ?`,
            ref.id
        );
        const total = items?.total ?? 0;
        if (total === 0 || (items?.completed ?? 0) < total) return false;
        if (ref.kind === 'subtask' && this.countPausingSidequests(ref.id) > 0) return false;
        this.closeSubwork(ref, at);
        return true;
    }

    /** Completes a task whose own checklist is done once no subtask or sidequest holds it open. */
    private settleTask(taskId: number, at: string): RollupOutcome | null {
        const task = this.requireTask(taskId);
        if (task.status === 'completed') return null;
        const items = this.one(CountRow, `SELECT COUNT(*) AS total, SUM(done) AS completed FROM items WHERE ${OWN_ITEMS}`, taskId);
        const total = items?.total ?? 0;
        if (total === 0 || (items?.completed ?? 0) < total) return null;
        const subwork = this.openSubwork(taskId);
        if (subwork.subtasks > 0 || subwork.sidequests > 0) return null;
        return this.finishTask(taskId, false, at);
    }

    private countOpenItems(taskId: number): number {
        const row = this.one(OpenCountRow, `SELECT COUNT(*) AS open FROM items WHERE ${OWN_ITEMS} AND done = 0`, taskId);
        return row?.open ?? 0;
    }

    private countOpenSubworkItems(ref: SubworkRef): number {
        const row = this.one(
            OpenCountRow,
            `SELECT COUNT(*) AS open FROM items WHERE ${this.subworkItemColumn(ref)} = ? AND done = 0`,
            ref.id
        );
        return row?.open ?? 0;
    }

    private countPausingSidequests(subtaskId: number): number {
        const row = this.one(
            OpenCountRow,
            "SELECT COUNT(*) AS open FROM sidequests WHERE paused_subtask_id = ? AND status != 'completed'",
            subtaskId
        );
        return row?.open ?? 0;
    }

    private openSubwork(taskId: number): OpenSubwork {
        const subtasks = this.one(
            OpenCountRow,
            "SELECT COUNT(*) AS open FROM subtasks WHERE parent_task_id = ? AND status != 'completed'",
            taskId
        );
        const sidequests = this.one(
            OpenCountRow,
            "SELECT COUNT(*) AS open FROM sidequests WHERE paused_task_id = ? AND status != 'completed'",
            taskId
        );
        return { subtasks: subtasks?.open ?? 0, sidequests: sidequests?.open ?? 0 };
    }

    private subworkTable(ref: SubworkRef): 'subtasks' | 'sidequests' {
        return ref.kind === 'subtask' ? 'subtasks' : 'sidequests';
    }

    private subworkItemColumn(ref: SubworkRef): 'subtask_id' | 'sidequest_id' {
        return ref.kind === 'subtask' ? 'subtask_id' : 'sidequest_id';
    }

    /** Work has started under this task: pending ancestors move to in_progress. */
    private activateAncestors(task: Task, at: string): void {
        if (activated(task.status) !== task.status) {
            this.run("UPDATE tasks SET status = 'in_progress', updated_at = ? WHERE id = ?", at, task.id);
        }
        const milestone = this.requireMilestone(task.milestoneId);
        if (activated(milestone.status) !== milestone.status) {
            this.run("UPDATE milestones SET status = 'in_progress', updated_at = ? WHERE id = ?", at, milestone.id);
        }
        const path = this.requirePath(milestone.completionPathId);
        if (activated(path.status) !== path.status) {
            this.run("UPDATE completion_paths SET status = 'in_progress', updated_at = ? WHERE id = ?", at, path.id);
        }
    }

    /** Marks the task completed, then plans and applies the rollup. Runs inside the caller's transaction. */
    private finishTask(taskId: number, forced: boolean, at: string): RollupOutcome {
        this.run(
            "UPDATE tasks SET status = 'completed', forced = ?, completed_at = ?, updated_at = ? WHERE id = ?",
            forced ? 1 : 0,
            at,
            at,
            taskId
        );
        const task = this.requireTask(taskId);

        const plan = planRollup({
            milestoneId: task.milestoneId,
            tasks: this.many(OrderedRowSchema, 'SELECT id, status, order_index FROM tasks WHERE milestone_id = ?', task.milestoneId),
            milestones: this.many(MilestoneOrderRowSchema, 'SELECT id, completion_path_id, status, order_index FROM milestones'),
            paths: this.many(OrderedRowSchema, 'SELECT id, status, order_index FROM completion_paths'),
            taskCounts: new Map(
                this.many(TaskCountRow, 'SELECT milestone_id, COUNT(*) AS total FROM tasks GROUP BY milestone_id').map(
                    (r): [number, number] => [r.milestone_id, r.total]
                )
            ),
        });

        for (const step of plan.steps) {
            this.applyStep(step, at);
        }
        this.logger.debug(`Rollup for task ${taskId}: ${plan.decision.kind}`);
        return this.hydrate(plan.decision);
    }

    private applyStep(step: RollupStep, at: string): void {
        switch (step.op) {
            case 'complete_milestone':
                this.run(
                    "UPDATE milestones SET status = 'completed', completed_at = ?, updated_at = ? WHERE id = ?",
                    at,
                    at,
                    step.milestoneId
                );
                return;
            case 'complete_path':
                this.run("UPDATE completion_paths SET status = 'completed', updated_at = ? WHERE id = ?", at, step.pathId);
                return;
            case 'activate_path':
                this.run(
                    "UPDATE completion_paths SET status = 'in_progress', updated_at = ? WHERE id = ? AND status = 'pending'",
                    at,
                    step.pathId
                );
                return;
            case 'activate_milestone':
                this.run(
                    "UPDATE milestones SET status = 'in_progress', updated_at = ? WHERE id = ? AND status = 'pending'",
                    at,
                    step.milestoneId
                );
                return;
            case 'complete_project':
                this.run("UPDATE project SET status = 'complete', updated_at = ? WHERE id = 1", at);
                return;
        }
    }

    private hydrate(decision: RollupDecision): RollupOutcome {
        switch (decision.kind) {
            case 'task_completed':
                return {
                    kind: 'task_completed',
                    upNext: decision.upNextTaskId === null ? null : this.requireTask(decision.upNextTaskId),
                };
            case 'milestone_completed':
                return {
                    kind: 'milestone_completed',
                    milestone: this.requireMilestone(decision.milestoneId),
                    upNext: decision.upNextMilestoneId === null ? null : this.requireMilestone(decision.upNextMilestoneId),
                };
            case 'path_completed':
                return {
                    kind: 'path_completed',
                    milestone: this.requireMilestone(decision.milestoneId),
                    path: this.requirePath(decision.pathId),
                    next: {
                        path: this.requirePath(decision.nextPathId),
                        milestone: decision.nextMilestoneId === null ? null : this.requireMilestone(decision.nextMilestoneId),
                        needsInput: decision.needsInput,
                    },
                };
            case 'project_completed':
                return {
                    kind: 'project_completed',
                    milestone: this.requireMilestone(decision.milestoneId),
                    path: this.requirePath(decision.pathId),
                    project: this.getProject(),
                };
        }
    }

    // ---------------------------------------------------------------
    // Reads
    // ---------------------------------------------------------------

    getCompletionPath(id: number): CompletionPath | null {
        return this.one(CompletionPathRow, 'SELECT * FROM completion_paths WHERE id = ?', id);
    }

    getMilestone(id: number): Milestone | null {
        return this.one(MilestoneRow, 'SELECT * FROM milestones WHERE id = ?', id);
    }

    getTask(id: number): Task | null {
        return this.one(TaskRow, 'SELECT * FROM tasks WHERE id = ?', id);
    }

    getSubtask(id: number): Subtask | null {
        return this.one(SubtaskRow, 'SELECT * FROM subtasks WHERE id = ?', id);
    }

    getSidequest(id: number): Sidequest | null {
        return this.one(SidequestRow, 'SELECT * FROM sidequests WHERE id = ?', id);
    }

    getItem(id: number): Item | null {
        return this.one(ItemRow, 'SELECT * FROM items WHERE id = ?', id);
    }

    listCompletionPaths(): CompletionPath[] {
        return this.many(CompletionPathRow, 'SELECT * FROM completion_paths ORDER BY order_index, id');
    }

    listMilestones(pathId: number): Milestone[] {
        return this.many(MilestoneRow, 'SELECT * FROM milestones WHERE completion_path_id = ? ORDER BY order_index, id', pathId);
    }

    listTasks(milestoneId: number): Task[] {
        return this.many(TaskRow, 'SELECT * FROM tasks WHERE milestone_id = ? ORDER BY order_index, id', milestoneId);
    }

    /** The task's own checklist, without its subtasks' and sidequests' items. */
    listItems(taskId: number): Item[] {
        return this.many(ItemRow, `SELECT * FROM items WHERE ${OWN_ITEMS} ORDER BY order_index, id`, taskId);
    }

    listSubtasks(taskId: number): Subtask[] {
        return this.many(SubtaskRow, 'SELECT * FROM subtasks WHERE parent_task_id = ? ORDER BY order_index, id', taskId);
    }

    /** Most urgent first, then oldest. */
    listSidequests(filter: SidequestFilter = {}): Sidequest[] {
        const where: string[] = [];
        const params: unknown[] = [];
        if (filter.taskId !== undefined) {
            where.push('paused_task_id = ?');
            params.push(filter.taskId);
        }
        if (filter.openOnly) {
            where.push("status != 'completed'");
        }
        return this.many(
            SidequestRow,
            `SELECT * FROM sidequests ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
             ORDER BY CASE priority WHEN 'critical' THEN 0 WHEN 'high' THEN 1 WHEN 'medium' THEN 2 ELSE 3 END, id`,
            ...params
        );
    }

    listSubworkItems(ref: SubworkRef): Item[] {
        return this.many(
            ItemRow,
            `SELECT * FROM items WHERE ${this.subworkItemColumn(ref)} = ? ORDER BY order_index, id`,
            ref.id
        );
    }

    private requirePath(id: number): CompletionPath {
        const path = this.getCompletionPath(id);
        if (!path) throw new NotFoundError('completion_path', id);
        return path;
    }

    private requireMilestone(id: number): Milestone {
        const milestone = this.getMilestone(id);
        if (!milestone) throw new NotFoundError('milestone', id);
        return milestone;
    }

    private requireTask(id: number): Task {
        const task = this.getTask(id);
        if (!task) throw new NotFoundError('task', id);
        return task;
    }

    private requireSubtask(id: number): Subtask {
        const subtask = this.getSubtask(id);
        if (!subtask) throw new NotFoundError('subtask', id);
        return subtask;
    }

    private requireSidequest(id: number): Sidequest {
        const sidequest = this.getSidequest(id);
        if (!sidequest) throw new NotFoundError('sidequest', id);
        return sidequest;
    }

    private requireSubwork(ref: SubworkRef): Subtask | Sidequest {
        return ref.kind === 'subtask' ? this.requireSubtask(ref.id) : this.requireSidequest(ref.id);
    }

    private requireItem(id: number): Item {
        const item = this.getItem(id);
        if (!item) throw new NotFoundError('item', id);
        return item;
    }

    /** Lowest order_index among the parent's pending children, ties to the lowest id. */
    getNextPending(parent: { kind: 'project' }): CompletionPath | null;
    getNextPending(parent: { kind: 'path'; id: number }): Milestone | null;
    getNextPending(parent: { kind: 'milestone'; id: number }): Task | null;
    getNextPending(parent: { kind: 'task'; id: number }): Item | null;
    getNextPending(parent: SubworkRef): Item | null;
    getNextPending(parent: ParentRef): CompletionPath | Milestone | Task | Item | null;
    getNextPending(parent: ParentRef): CompletionPath | Milestone | Task | Item | null {
        this.getProject();
        switch (parent.kind) {
            case 'project':
                return this.one(
                    CompletionPathRow,
                    "SELECT * FROM completion_paths WHERE status = 'pending' ORDER BY order_index, id LIMIT 1"
                );
            case 'path':
                this.requirePath(parent.id);
                return this.one(
                    MilestoneRow,
                    "SELECT * FROM milestones WHERE completion_path_id = ? AND status = 'pending' ORDER BY order_index, id LIMIT 1",
                    parent.id
                );
            case 'milestone':
                this.requireMilestone(parent.id);
                return this.one(
                    TaskRow,
                    "SELECT * FROM tasks WHERE milestone_id = ? AND status = 'pending' ORDER BY order_index, id LIMIT 1",
                    parent.id
                );
            case 'task':
                this.requireTask(parent.id);
                return this.one(
                    ItemRow,
                    `SELECT * FROM items WHERE ${OWN_ITEMS} AND done = 0 ORDER BY order_index, id LIMIT 1`,
                    parent.id
                );
            case 'subtask':
            case 'sidequest':
                this.requireSubwork(parent);
                return this.one(
                    ItemRow,
                    `SELECT * FROM items WHERE ${this.subworkItemColumn(parent)} = ? AND done = 0 ORDER BY order_index, id LIMIT 1`,
                    parent.id
                );
        }
    }

    // ---------------------------------------------------------------
    // Notes (append-only)
    // ---------------------------------------------------------------

    private appendNote(noteType: NoteType, message: string, ref: NoteRef | undefined, at: string): number {
        return this.insert(
            'INSERT INTO notes (note_type, message, reference_table, reference_id, created_at) VALUES (?, ?, ?, ?, ?)',
            noteType,
            message,
            ref?.table ?? null,
            ref?.id ?? null,
            at
        );
    }

    async logNote(noteType: NoteType, message: string, ref?: NoteRef): Promise<Note> {
        return this.mutate('log note', () => {
            this.getProject();
            const id = this.appendNote(noteType, message, ref, this.timestamp());
            const note = this.one(NoteRow, 'SELECT * FROM notes WHERE id = ?', id);
            if (!note) {
                throw new Error(`Note ${id} vanished after insert`);
            }
            return note;
        });
    }

    /** Newest first. */
    listNotes(filter: NoteFilter = {}): Note[] {
        const limit = filter.limit ?? 50;
        if (filter.noteType) {
            return this.many(
                NoteRow,
                'SELECT * FROM notes WHERE note_type = ? ORDER BY id DESC LIMIT ?',
                filter.noteType,
                limit
            );
        }
        return this.many(NoteRow, 'SELECT * FROM notes ORDER BY id DESC LIMIT ?', limit);
    }

    // ---------------------------------------------------------------
    // Status
    // ---------------------------------------------------------------

    private progress(sql: string): ProgressCount {
        const row = this.one(CountRow, sql);
        return { completed: row?.completed ?? 0, total: row?.total ?? 0 };
    }

    /** One read transaction, so a concurrent commit cannot split the snapshot. */
    getStatus(): StatusSnapshot {
        return this.db.transaction((): StatusSnapshot => this.readStatus())();
    }

    private readStatus(): StatusSnapshot {
        const project = this.getProject();
        const paths = this.listCompletionPaths();

        const activePath =
            pickNext(paths.filter((p) => p.status === 'in_progress')) ?? pickNext(paths.filter((p) => p.status === 'pending'));
        const milestones = activePath ? this.listMilestones(activePath.id) : [];
        const activeMilestone =
            pickNext(milestones.filter((m) => m.status === 'in_progress')) ??
            pickNext(milestones.filter((m) => m.status === 'pending'));

        const tasks: TaskProgress[] = activeMilestone
            ? this.listTasks(activeMilestone.id).map((task) => {
                  const items = this.listItems(task.id);
                  const subwork = this.openSubwork(task.id);
                  return {
                      task,
                      itemsDone: items.filter((i) => i.done).length,
                      itemsTotal: items.length,
                      openSubtasks: subwork.subtasks,
                      openSidequests: subwork.sidequests,
                  };
              })
            : [];

        return {
            project,
            progress: {
                paths: this.progress(
                    "SELECT COUNT(*) AS total, SUM(status = 'completed') AS completed FROM completion_paths"
                ),
                milestones: this.progress("SELECT COUNT(*) AS total, SUM(status = 'completed') AS completed FROM milestones"),
                tasks: this.progress("SELECT COUNT(*) AS total, SUM(status = 'completed') AS completed FROM tasks"),
                items: this.progress('SELECT COUNT(*) AS total, SUM(done) AS completed FROM items'),
            },
            activePath,
            activeMilestone,
            tasks,
            needsInput: resolveNeedsInput(project, paths.length, activePath, activeMilestone, tasks.length),
        };
    }
}
