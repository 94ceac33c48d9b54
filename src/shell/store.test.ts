/**
 * SHELL: Store Tests
 * Completion, rollup, subwork, idempotence, ordering and atomicity against a real SQLite file.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import Database from 'better-sqlite3';
import {
    AlreadyCompleteError,
    InvalidTransitionError,
    NotFoundError,
    NotInitializedError,
    RollupFailedError,
} from '../core/errors';
import { Logger } from '../core/logger';
import { ProjectStore } from './store';

const AT = '2026-05-04T09:30:00.000Z';

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

describe('ProjectStore', () => {
    let root: string;
    let store: ProjectStore;
    let logger: RecordingLogger;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'pathkeeper-store-'));
        logger = new RecordingLogger();
        store = new ProjectStore(root, { logger, now: () => new Date(AT) });
    });

    afterEach(async () => {
        store.close();
        await fs.remove(root);
    });

    /** One path "Foundation": M1 with two tasks, M2 with one. */
    async function foundation() {
        await store.initProject({ name: 'Demo', purpose: 'Exercise the rollup' });
        const path = await store.addCompletionPath({ name: 'Foundation' });
        const m1 = await store.addMilestone(path.id, { name: 'M1' });
        const m2 = await store.addMilestone(path.id, { name: 'M2' });
        const t1 = (await store.defineTask(m1.id, { name: 'T1' })).task;
        const t2 = (await store.defineTask(m1.id, { name: 'T2' })).task;
        const t3 = (await store.defineTask(m2.id, { name: 'T3' })).task;
        return { path, m1, m2, t1, t2, t3 };
    }

    describe('project', () => {
        it('fails with NotInitialized before init', () => {
            assert.throws(() => store.getProject(), NotInitializedError);
            assert.strictEqual(store.isInitialized(), false);
        });

        it('creates the singleton project once', async () => {
            const project = await store.initProject({ name: 'Demo' });
            assert.strictEqual(project.id, 1);
            assert.strictEqual(project.status, 'active');
            assert.strictEqual(project.lastKnownGitHash, null);
            assert.strictEqual(project.createdAt, AT);
            await assert.rejects(store.initProject({ name: 'Again' }), InvalidTransitionError);
        });

        it('archives once and then refuses mutations', async () => {
            const { t1 } = await foundation();
            const archived = await store.archiveProject();
            assert.strictEqual(archived.status, 'archived');
            await assert.rejects(store.archiveProject(), /Cannot archive project 1: it is archived/);
            await assert.rejects(store.completeTask(t1.id), /Cannot complete a task in project 1: it is archived/);
            await assert.rejects(store.addCompletionPath({ name: 'Later' }), InvalidTransitionError);
        });
    });

    describe('planning', () => {
        it('appends siblings after the current maximum order', async () => {
            const { path, m1, m2 } = await foundation();
            assert.strictEqual(path.orderIndex, 1);
            assert.strictEqual(m1.orderIndex, 1);
            assert.strictEqual(m2.orderIndex, 2);
            assert.strictEqual(path.status, 'pending');
        });

        it('stores a task definition with its ordered items', async () => {
            const { m1 } = await foundation();
            const { task, items } = await store.defineTask(m1.id, {
                name: 'Parser',
                description: 'Tokenizer and grammar',
                items: ['tokenizer', 'grammar', 'errors'],
            });
            assert.strictEqual(task.orderIndex, 3);
            assert.deepStrictEqual(
                items.map((i) => [i.description, i.orderIndex, i.done]),
                [
                    ['tokenizer', 1, false],
                    ['grammar', 2, false],
                    ['errors', 3, false],
                ]
            );
        });

        it('rejects unknown parents with NotFound', async () => {
            await store.initProject({ name: 'Demo' });
            await assert.rejects(store.addMilestone(99, { name: 'Nowhere' }), (err: unknown) => {
                return err instanceof NotFoundError && err.message === 'completion_path 99 not found';
            });
            await assert.rejects(store.defineTask(42, { name: 'Nowhere' }), NotFoundError);
        });
    });

    describe('completion rollup', () => {
        it('completes M1 and keeps Foundation in progress while M2 is pending', async () => {
            const { path, m1, m2, t1, t2 } = await foundation();

            const first = await store.completeTask(t1.id);
            assert.strictEqual(first.milestoneCompleted, false);
            assert.strictEqual(first.rollup.kind, 'task_completed');
            if (first.rollup.kind === 'task_completed') {
                assert.strictEqual(first.rollup.upNext?.id, t2.id);
            }

            const second = await store.completeTask(t2.id);
            assert.strictEqual(second.milestoneCompleted, true);
            assert.strictEqual(second.rollup.kind, 'milestone_completed');
            if (second.rollup.kind === 'milestone_completed') {
                assert.strictEqual(second.rollup.milestone.id, m1.id);
                assert.strictEqual(second.rollup.upNext?.id, m2.id);
            }

            assert.strictEqual(store.getMilestone(m1.id)?.status, 'completed');
            assert.strictEqual(store.getMilestone(m1.id)?.completedAt, AT);
            assert.strictEqual(store.getMilestone(m2.id)?.status, 'pending');
            assert.strictEqual(store.getCompletionPath(path.id)?.status, 'in_progress');
            assert.strictEqual(store.getProject().status, 'active');
        });

        it('completes the project when the last path completes', async () => {
            const { path, m2, t1, t2, t3 } = await foundation();
            await store.completeTask(t1.id);
            await store.completeTask(t2.id);

            const last = await store.completeTask(t3.id);
            assert.strictEqual(last.rollup.kind, 'project_completed');
            assert.strictEqual(store.getMilestone(m2.id)?.status, 'completed');
            assert.strictEqual(store.getCompletionPath(path.id)?.status, 'completed');
            assert.strictEqual(store.getProject().status, 'complete');

            await assert.rejects(store.addCompletionPath({ name: 'Pivot' }), /it is complete/);
        });

        it('moves focus to the next path and asks for a task definition', async () => {
            await store.initProject({ name: 'Demo' });
            const a = await store.addCompletionPath({ name: 'A' });
            const b = await store.addCompletionPath({ name: 'B' });
            const ma = await store.addMilestone(a.id, { name: 'MA' });
            const mb1 = await store.addMilestone(b.id, { name: 'MB1' });
            await store.addMilestone(b.id, { name: 'MB2' });
            const { task } = await store.defineTask(ma.id, { name: 'Only task' });

            const result = await store.completeTask(task.id);
            assert.strictEqual(result.rollup.kind, 'path_completed');
            if (result.rollup.kind === 'path_completed') {
                assert.strictEqual(result.rollup.path.status, 'completed');
                assert.strictEqual(result.rollup.next.path.id, b.id);
                assert.strictEqual(result.rollup.next.path.status, 'in_progress');
                assert.strictEqual(result.rollup.next.milestone?.id, mb1.id);
                assert.strictEqual(result.rollup.next.milestone?.status, 'in_progress');
                assert.deepStrictEqual(result.rollup.next.needsInput, { kind: 'task_definition', milestoneId: mb1.id });
            }
            assert.strictEqual(store.getProject().status, 'active');
            assert.deepStrictEqual(store.getStatus().needsInput, { kind: 'task_definition', milestoneId: mb1.id });
        });

        it('rejects completing a task with open items and changes nothing', async () => {
            const { m1, path } = await foundation();
            const { task } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one', 'two'] });

            await assert.rejects(store.completeTask(task.id), (err: unknown) => {
                return (
                    err instanceof InvalidTransitionError &&
                    err.message ===
                        `Cannot complete task ${task.id}: it is pending. 2 item(s) are still open; complete them first or use the force-complete override`
                );
            });
            assert.strictEqual(store.getTask(task.id)?.status, 'pending');
            assert.strictEqual(store.getMilestone(m1.id)?.status, 'pending');
            assert.strictEqual(store.getCompletionPath(path.id)?.status, 'pending');
        });

        it('treats a second completion as a no-op', async () => {
            const { t1 } = await foundation();
            await store.completeTask(t1.id);
            const before = store.getStatus();

            const again = await store.completeTask(t1.id);
            assert.deepStrictEqual(again.rollup, { kind: 'already_complete' });
            assert.strictEqual(again.milestoneCompleted, false);
            assert.deepStrictEqual(store.getStatus(), before);
        });

        it('completes a task through its last item', async () => {
            const { m1 } = await foundation();
            const { task, items } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one', 'two'] });

            const first = await store.completeItem(task.id, items[0].id);
            assert.strictEqual(first.alreadyComplete, false);
            assert.strictEqual(first.rollup, null);
            assert.strictEqual(first.item.done, true);
            assert.strictEqual(first.task.status, 'in_progress');
            assert.strictEqual(store.getMilestone(m1.id)?.status, 'in_progress');

            const second = await store.completeItem(task.id, items[1].id);
            assert.strictEqual(second.task.status, 'completed');
            assert.strictEqual(second.task.forced, false);
            assert.strictEqual(second.rollup?.kind, 'task_completed');

            const again = await store.completeItem(task.id, items[1].id);
            assert.strictEqual(again.alreadyComplete, true);
            assert.strictEqual(again.rollup, null);
        });

        it('rejects an item that belongs to another task', async () => {
            const { m1, t1 } = await foundation();
            const { items } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one'] });
            await assert.rejects(store.completeItem(t1.id, items[0].id), (err: unknown) => {
                return err instanceof NotFoundError && err.message === `item ${items[0].id} not found in task ${t1.id}`;
            });
            await assert.rejects(store.completeItem(t1.id, 999), NotFoundError);
            await assert.rejects(store.completeTask(999), /task 999 not found/);
        });

        it('force-completes with open items and records the reason', async () => {
            const { m1 } = await foundation();
            const { task } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one', 'two'] });

            const result = await store.forceCompleteTask(task.id, 'waived by reviewer');
            assert.strictEqual(result.task.status, 'completed');
            assert.strictEqual(result.task.forced, true);
            assert.strictEqual(result.rollup.kind, 'task_completed');

            const [note] = store.listNotes({ noteType: 'task_context' });
            assert.strictEqual(note.message, 'Force-completed with 2 open item(s): waived by reviewer');
            assert.strictEqual(note.referenceTable, 'tasks');
            assert.strictEqual(note.referenceId, task.id);
        });

        it('throws AlreadyComplete on re-completion when strict', async () => {
            const { m1, t1 } = await foundation();
            await store.completeTask(t1.id);
            await assert.rejects(store.completeTask(t1.id, { strict: true }), (err: unknown) => {
                return err instanceof AlreadyCompleteError && err.message === `task ${t1.id} is already completed`;
            });

            const { task, items } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one', 'two'] });
            await store.completeItem(task.id, items[0].id);
            await assert.rejects(store.completeItem(task.id, items[0].id, { strict: true }), (err: unknown) => {
                return err instanceof AlreadyCompleteError && err.message === `item ${items[0].id} is already completed`;
            });
            assert.strictEqual((await store.completeItem(task.id, items[0].id)).alreadyComplete, false);
        });

        it('settles concurrent completions from two stores on one root', async () => {
            const { m1, t1, t2 } = await foundation();
            const other = new ProjectStore(root, { now: () => new Date(AT) });
            try {
                const results = await Promise.all([store.completeTask(t1.id), other.completeTask(t2.id)]);
                assert.deepStrictEqual(results.map((r) => r.rollup.kind).sort(), ['milestone_completed', 'task_completed']);
                assert.strictEqual(store.getMilestone(m1.id)?.status, 'completed');
                assert.strictEqual(other.getMilestone(m1.id)?.status, 'completed');
            } finally {
                other.close();
            }
        });

        it('starts a task and its ancestors', async () => {
            const { path, m1, t1 } = await foundation();
            const started = await store.startTask(t1.id);
            assert.strictEqual(started.status, 'in_progress');
            assert.strictEqual(store.getMilestone(m1.id)?.status, 'in_progress');
            assert.strictEqual(store.getCompletionPath(path.id)?.status, 'in_progress');

            assert.strictEqual((await store.startTask(t1.id)).status, 'in_progress');
            await store.completeTask(t1.id);
            await assert.rejects(store.startTask(t1.id), /Cannot start task/);
        });
    });

    describe('subtasks and sidequests', () => {
        it('holds the task open until its subtask closes', async () => {
            const { m1 } = await foundation();
            const { task, items } = await store.defineTask(m1.id, { name: 'Parser', items: ['grammar'] });
            const { subtask, items: subItems } = await store.addSubtask(task.id, {
                name: 'Lexer',
                items: ['tokens', 'comments'],
            });
            assert.strictEqual(subtask.taskId, task.id);
            assert.strictEqual(subtask.priority, 'high');
            assert.strictEqual(subtask.orderIndex, 1);
            assert.deepStrictEqual(
                store.listItems(task.id).map((i) => i.description),
                ['grammar']
            );
            assert.strictEqual(store.getNextPending({ kind: 'subtask', id: subtask.id })?.description, 'tokens');

            const own = await store.completeItem(task.id, items[0].id);
            assert.strictEqual(own.rollup, null);
            assert.strictEqual(own.task.status, 'in_progress');
            await assert.rejects(store.completeTask(task.id), (err: unknown) => {
                return (
                    err instanceof InvalidTransitionError &&
                    err.message ===
                        `Cannot complete task ${task.id}: it is in_progress. 1 subtask(s) still open; close them first or use the force-complete override`
                );
            });
            await assert.rejects(store.completeItem(task.id, subItems[0].id), (err: unknown) => {
                return err instanceof NotFoundError && err.message === `item ${subItems[0].id} not found in task ${task.id}`;
            });

            const ref = { kind: 'subtask', id: subtask.id } as const;
            const first = await store.completeSubworkItem(ref, subItems[0].id);
            assert.strictEqual(first.closed, false);
            assert.strictEqual(first.taskRollup, null);
            assert.strictEqual(first.work.status, 'in_progress');

            const last = await store.completeSubworkItem(ref, subItems[1].id);
            assert.strictEqual(last.closed, true);
            assert.strictEqual(last.work.status, 'completed');
            assert.strictEqual(last.work.completedAt, AT);
            assert.strictEqual(last.taskRollup?.kind, 'task_completed');
            assert.strictEqual(store.getTask(task.id)?.status, 'completed');

            await assert.rejects(store.completeSubtask(subtask.id, { strict: true }), (err: unknown) => {
                return err instanceof AlreadyCompleteError && err.message === `subtask ${subtask.id} is already completed`;
            });
            assert.strictEqual((await store.completeSubtask(subtask.id)).alreadyComplete, true);
        });

        it('pauses a task and subtask until the sidequest closes', async () => {
            const { m1 } = await foundation();
            const { task } = await store.defineTask(m1.id, { name: 'Parser' });
            const { subtask, items: subItems } = await store.addSubtask(task.id, { name: 'Lexer', items: ['tokens'] });
            const { sidequest, items: sideItems } = await store.openSidequest(task.id, {
                name: 'Fix CI',
                subtaskId: subtask.id,
                items: ['pin toolchain'],
            });
            assert.strictEqual(sidequest.taskId, task.id);
            assert.strictEqual(sidequest.subtaskId, subtask.id);
            assert.strictEqual(sidequest.priority, 'critical');
            assert.strictEqual(sidequest.status, 'pending');

            const [paused] = store.listNotes({ noteType: 'task_context' });
            assert.strictEqual(paused.message, `Task #${task.id} paused by sidequest #${sidequest.id}: Fix CI`);
            assert.strictEqual(paused.referenceTable, 'sidequests');
            assert.strictEqual(paused.referenceId, sidequest.id);

            const tokens = await store.completeSubworkItem({ kind: 'subtask', id: subtask.id }, subItems[0].id);
            assert.strictEqual(tokens.closed, false);
            await assert.rejects(store.completeSubtask(subtask.id), /paused by 1 open sidequest\(s\)/);
            await assert.rejects(store.completeSidequest(sidequest.id), (err: unknown) => {
                return (
                    err instanceof InvalidTransitionError &&
                    err.message === `Cannot complete sidequest ${sidequest.id}: it is pending. 1 item(s) are still open`
                );
            });

            const closing = await store.completeSubworkItem({ kind: 'sidequest', id: sidequest.id }, sideItems[0].id);
            assert.strictEqual(closing.closed, true);
            assert.strictEqual(closing.taskRollup, null);
            assert.strictEqual(store.getSubtask(subtask.id)?.status, 'completed');
            assert.deepStrictEqual(store.listSidequests({ openOnly: true }), []);
            assert.strictEqual(
                store.listNotes({ noteType: 'task_context', limit: 1 })[0].message,
                `Sidequest #${sidequest.id} closed; task #${task.id} resumes`
            );

            // an item-less task still completes explicitly
            const done = await store.completeTask(task.id);
            assert.strictEqual(done.rollup.kind, 'task_completed');
        });

        it('rejects a subtask from another task and subwork on a completed task', async () => {
            const { t1, t2 } = await foundation();
            const { subtask } = await store.addSubtask(t1.id, { name: 'Elsewhere' });
            await assert.rejects(store.openSidequest(t2.id, { name: 'Detour', subtaskId: subtask.id }), (err: unknown) => {
                return err instanceof NotFoundError && err.message === `subtask ${subtask.id} not found in task ${t2.id}`;
            });

            await store.completeTask(t2.id);
            await assert.rejects(store.addSubtask(t2.id, { name: 'Late' }), /Cannot add a subtask to task \d+: it is completed/);
            await assert.rejects(store.openSidequest(t2.id, { name: 'Late' }), /Cannot open a sidequest on task \d+: it is completed/);
        });

        it('force-completes past open subwork, which may still close afterwards', async () => {
            const { m1 } = await foundation();
            const { task } = await store.defineTask(m1.id, { name: 'Release', items: ['tag'] });
            const { subtask } = await store.addSubtask(task.id, { name: 'Changelog' });
            await store.openSidequest(task.id, { name: 'Hotfix' });

            const forced = await store.forceCompleteTask(task.id, 'shipped as is');
            assert.strictEqual(forced.task.forced, true);
            const [note] = store.listNotes({ noteType: 'task_context' });
            assert.strictEqual(
                note.message,
                'Force-completed with 1 open item(s), 1 open subtask(s), 1 open sidequest(s): shipped as is'
            );

            const late = await store.completeSubtask(subtask.id);
            assert.strictEqual(late.alreadyComplete, false);
            assert.strictEqual(late.taskRollup, null);
            assert.strictEqual(late.work.status, 'completed');
        });

        it('orders sidequests by urgency and reports open subwork in status', async () => {
            const { m1, t1, t2 } = await foundation();
            const minor = await store.openSidequest(t1.id, { name: 'Typo', priority: 'low' });
            const urgent = await store.openSidequest(t2.id, { name: 'Outage' });
            await store.addSubtask(t1.id, { name: 'Docs' });

            assert.deepStrictEqual(
                store.listSidequests().map((q) => q.id),
                [urgent.sidequest.id, minor.sidequest.id]
            );
            assert.deepStrictEqual(
                store.listSidequests({ taskId: t1.id }).map((q) => q.name),
                ['Typo']
            );

            const status = store.getStatus();
            assert.strictEqual(status.activeMilestone?.id, m1.id);
            assert.deepStrictEqual(
                status.tasks.map((t) => [t.task.name, t.openSubtasks, t.openSidequests]),
                [
                    ['T1', 1, 1],
                    ['T2', 0, 1],
                ]
            );
        });
    });

    describe('priority', () => {
        it('defaults to medium and changes only on open tasks', async () => {
            const { m1, t1 } = await foundation();
            assert.strictEqual(t1.priority, 'medium');
            const { task } = await store.defineTask(m1.id, { name: 'Urgent', priority: 'critical' });
            assert.strictEqual(task.priority, 'critical');

            assert.strictEqual((await store.setTaskPriority(t1.id, 'low')).priority, 'low');
            await store.completeTask(t1.id);
            await assert.rejects(store.setTaskPriority(t1.id, 'high'), (err: unknown) => {
                return err instanceof InvalidTransitionError && err.message === `Cannot reprioritize task ${t1.id}: it is completed`;
            });
        });
    });

    describe('getNextPending', () => {
        it('returns the lowest order, ties to the lowest id, every time', async () => {
            await store.initProject({ name: 'Demo' });
            await store.addCompletionPath({ name: 'Late', orderIndex: 2 });
            const b = await store.addCompletionPath({ name: 'Early B', orderIndex: 1 });
            await store.addCompletionPath({ name: 'Early C', orderIndex: 1 });

            const picks = [1, 2, 3].map(() => store.getNextPending({ kind: 'project' })?.id);
            assert.deepStrictEqual(picks, [b.id, b.id, b.id]);
        });

        it('skips started and completed children', async () => {
            const { path, m1, t1, t2 } = await foundation();
            await store.startTask(t1.id);
            assert.strictEqual(store.getNextPending({ kind: 'milestone', id: m1.id })?.id, t2.id);
            assert.strictEqual(store.getNextPending({ kind: 'path', id: path.id })?.name, 'M2');
            assert.strictEqual(store.getNextPending({ kind: 'project' }), null);
        });

        it('walks open items in order', async () => {
            const { m1 } = await foundation();
            const { task, items } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one', 'two'] });
            await store.completeItem(task.id, items[0].id);
            assert.strictEqual(store.getNextPending({ kind: 'task', id: task.id })?.description, 'two');
        });

        it('fails with NotFound for an unknown parent', async () => {
            await store.initProject({ name: 'Demo' });
            assert.throws(() => store.getNextPending({ kind: 'milestone', id: 5 }), /milestone 5 not found/);
        });
    });

    describe('atomicity', () => {
        it('rolls back a failed rollup, retries once, then reports RollupFailed', async () => {
            await store.initProject({ name: 'Demo' });
            const path = await store.addCompletionPath({ name: 'Only' });
            const milestone = await store.addMilestone(path.id, { name: 'M' });
            const { task } = await store.defineTask(milestone.id, { name: 'T' });
            await store.startTask(task.id);

            const saboteur = new Database(store.dbPath);
            saboteur.exec(`CREATE TRIGGER fail_milestone BEFORE UPDATE ON milestones
                BEGIN SELECT RAISE(ABORT, 'injected failure'); END;`);

            await assert.rejects(store.completeTask(task.id), (err: unknown) => {
                return err instanceof RollupFailedError && /injected failure/.test(err.message);
            });
            assert.strictEqual(logger.warnings.length, 1);
            assert.strictEqual(store.getTask(task.id)?.status, 'in_progress');
            assert.strictEqual(store.getMilestone(milestone.id)?.status, 'in_progress');
            assert.strictEqual(store.getCompletionPath(path.id)?.status, 'in_progress');
            assert.strictEqual(store.getProject().status, 'active');

            saboteur.exec('DROP TRIGGER fail_milestone');
            saboteur.close();

            const retried = await store.completeTask(task.id);
            assert.strictEqual(retried.rollup.kind, 'project_completed');
        });
    });

    describe('persisted layout', () => {
        it('exposes plain tables to outside readers', async () => {
            const { t1 } = await foundation();
            await store.completeTask(t1.id);

            const reader = new Database(store.dbPath, { readonly: true });
            try {
                assert.deepStrictEqual(reader.prepare('SELECT name, status FROM tasks ORDER BY id').all(), [
                    { name: 'T1', status: 'completed' },
                    { name: 'T2', status: 'pending' },
                    { name: 'T3', status: 'pending' },
                ]);
                assert.deepStrictEqual(reader.prepare('SELECT name, status FROM completion_paths').all(), [
                    { name: 'Foundation', status: 'in_progress' },
                ]);
            } finally {
                reader.close();
            }
        });

        it('keeps notes append-only and parents undeletable', async () => {
            const { m1, t1 } = await foundation();
            await store.logNote('decision', 'Use SQLite', { table: 'project', id: 1 });
            const { task } = await store.defineTask(m1.id, { name: 'Checklist', items: ['one'] });
            await store.addSubtask(task.id, { name: 'Part' });
            await store.openSidequest(task.id, { name: 'Detour' });

            const writer = new Database(store.dbPath);
            try {
                assert.throws(() => writer.prepare("UPDATE notes SET message = 'edited'").run(), /append-only/);
                assert.throws(() => writer.prepare('DELETE FROM notes').run(), /append-only/);
                assert.throws(() => writer.prepare('DELETE FROM tasks WHERE id = ?').run(t1.id), /never deleted/);
                assert.throws(() => writer.prepare('DELETE FROM items').run(), /items are never deleted/);
                assert.throws(() => writer.prepare('DELETE FROM subtasks').run(), /never deleted/);
                assert.throws(() => writer.prepare('DELETE FROM sidequests').run(), /never deleted/);
            } finally {
                writer.close();
            }
        });
    });

    describe('notes and status', () => {
        it('lists notes newest first and filters by type', async () => {
            await store.initProject({ name: 'Demo' });
            await store.logNote('info', 'first');
            await store.logNote('decision', 'second');
            await store.logNote('info', 'third');

            assert.deepStrictEqual(
                store.listNotes().map((n) => n.message),
                ['third', 'second', 'first']
            );
            assert.deepStrictEqual(
                store.listNotes({ noteType: 'info', limit: 1 }).map((n) => n.message),
                ['third']
            );
        });

        it('counts progress and picks the active path and milestone', async () => {
            const { path, m1, t1 } = await foundation();
            await store.defineTask(m1.id, { name: 'Checklist', items: ['one', 'two'] });
            await store.completeTask(t1.id);

            const status = store.getStatus();
            assert.deepStrictEqual(status.progress, {
                paths: { completed: 0, total: 1 },
                milestones: { completed: 0, total: 2 },
                tasks: { completed: 1, total: 4 },
                items: { completed: 0, total: 2 },
            });
            assert.strictEqual(status.activePath?.id, path.id);
            assert.strictEqual(status.activeMilestone?.id, m1.id);
            assert.deepStrictEqual(
                status.tasks.map((t) => [t.task.name, t.task.status, t.itemsDone, t.itemsTotal]),
                [
                    ['T1', 'completed', 0, 0],
                    ['T2', 'pending', 0, 0],
                    ['Checklist', 'pending', 0, 2],
                ]
            );
            assert.strictEqual(status.needsInput, null);
        });

        it('reads status from one snapshot while another connection commits', async () => {
            class InterleavedStore extends ProjectStore {
                private interleaved = false;

                listMilestones(pathId: number) {
                    if (!this.interleaved) {
                        this.interleaved = true;
                        const writer = new Database(this.dbPath);
                        try {
                            writer.prepare("UPDATE tasks SET status = 'completed'").run();
                        } finally {
                            writer.close();
                        }
                    }
                    return super.listMilestones(pathId);
                }
            }

            await store.initProject({ name: 'Demo' });
            const path = await store.addCompletionPath({ name: 'Only' });
            const milestone = await store.addMilestone(path.id, { name: 'M' });
            const { task } = await store.defineTask(milestone.id, { name: 'T' });

            const reader = new InterleavedStore(root);
            try {
                const status = reader.getStatus();
                assert.deepStrictEqual(status.progress.tasks, { completed: 0, total: 1 });
                assert.deepStrictEqual(
                    status.tasks.map((t) => t.task.status),
                    ['pending']
                );
            } finally {
                reader.close();
            }
            assert.strictEqual(store.getTask(task.id)?.status, 'completed');
        });

        it('asks for a first path on a fresh project', async () => {
            await store.initProject({ name: 'Demo' });
            assert.deepStrictEqual(store.getStatus().needsInput, { kind: 'path_definition' });
        });
    });
});
