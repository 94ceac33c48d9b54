/**
 * CORE: Transition Rules
 * Pure validation logic. Every rule throws InvalidTransitionError naming the
 * entity, its actual state and the attempted transition; nothing is "fixed" silently.
 */

import { InvalidTransitionError } from './errors';
import { CompletionPath, Milestone, Project, Sidequest, Subtask, Task, WorkStatus } from './types';

export function assertProjectActive(project: Project, attempted: string): void {
    if (project.status !== 'active') {
        throw new InvalidTransitionError(
            'project',
            project.id,
            project.status,
            attempted,
            project.status === 'complete'
                ? 'A completed project only accepts read-only reporting or archival.'
                : 'An archived project is read-only.'
        );
    }
}

export function assertPathOpen(path: CompletionPath, attempted: string): void {
    if (path.status === 'completed') {
        throw new InvalidTransitionError('completion_path', path.id, 'completed', attempted);
    }
}

export function assertMilestoneOpen(milestone: Milestone, attempted: string): void {
    if (milestone.status === 'completed') {
        throw new InvalidTransitionError('milestone', milestone.id, 'completed', attempted);
    }
}

/** Returns false when the task is already running (no-op). */
export function canStartTask(task: Task): boolean {
    switch (task.status) {
        case 'pending':
            return true;
        case 'in_progress':
            return false;
        case 'completed':
            throw new InvalidTransitionError('task', task.id, 'completed', 'start');
    }
}

export function assertTaskCompletable(task: Task, openItems: number): void {
    if (openItems > 0) {
        throw new InvalidTransitionError(
            'task',
            task.id,
            task.status,
            'complete',
            `${openItems} item(s) are still open; complete them first or use the force-complete override`
        );
    }
}

export interface OpenSubwork {
    subtasks: number;
    sidequests: number;
}

/** A task with an open subtask or an unfinished sidequest pausing it cannot complete. */
export function assertNoOpenSubwork(task: Task, open: OpenSubwork): void {
    if (open.subtasks === 0 && open.sidequests === 0) return;
    const parts: string[] = [];
    if (open.subtasks > 0) parts.push(`${open.subtasks} subtask(s)`);
    if (open.sidequests > 0) parts.push(`${open.sidequests} sidequest(s)`);
    throw new InvalidTransitionError(
        'task',
        task.id,
        task.status,
        'complete',
        `${parts.join(' and ')} still open; close them first or use the force-complete override`
    );
}

export function assertTaskOpen(task: Task, attempted: string): void {
    if (task.status === 'completed') {
        throw new InvalidTransitionError('task', task.id, 'completed', attempted);
    }
}

export function assertSubtaskCompletable(subtask: Subtask, openItems: number, pausingSidequests: number): void {
    if (openItems > 0) {
        throw new InvalidTransitionError(
            'subtask',
            subtask.id,
            subtask.status,
            'complete',
            `${openItems} item(s) are still open`
        );
    }
    if (pausingSidequests > 0) {
        throw new InvalidTransitionError(
            'subtask',
            subtask.id,
            subtask.status,
            'complete',
            `it is paused by ${pausingSidequests} open sidequest(s)`
        );
    }
}

export function assertSidequestCompletable(sidequest: Sidequest, openItems: number): void {
    if (openItems > 0) {
        throw new InvalidTransitionError(
            'sidequest',
            sidequest.id,
            sidequest.status,
            'complete',
            `${openItems} item(s) are still open`
        );
    }
}

export function assertArchivable(project: Project): void {
    if (project.status === 'archived') {
        throw new InvalidTransitionError('project', project.id, 'archived', 'archive');
    }
}

/** pending -> in_progress once work starts underneath; other states stay. */
export function activated(status: WorkStatus): WorkStatus {
    return status === 'pending' ? 'in_progress' : status;
}
