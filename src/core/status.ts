/**
 * CORE: Status Report
 * Pure assembly and rendering of the read-only progress snapshot.
 */

import { CompletionPath, Milestone, NeedsInput, Project, RollupOutcome, Task } from './types';

export interface ProgressCount {
    completed: number;
    total: number;
}

export interface TaskProgress {
    task: Task;
    itemsDone: number;
    itemsTotal: number;
    openSubtasks: number;
    /** Open sidequests pausing the task. */
    openSidequests: number;
}

export interface StatusSnapshot {
    project: Project;
    progress: {
        paths: ProgressCount;
        milestones: ProgressCount;
        tasks: ProgressCount;
        items: ProgressCount;
    };
    activePath: CompletionPath | null;
    activeMilestone: Milestone | null;
    tasks: TaskProgress[];
    needsInput: NeedsInput | null;
}

/** Re-derived from git on every call, never stored. */
export interface LiveGitFacts {
    branch: string | null;
    clean: boolean;
}

export function resolveNeedsInput(
    project: Project,
    pathCount: number,
    activePath: CompletionPath | null,
    activeMilestone: Milestone | null,
    taskCount: number
): NeedsInput | null {
    if (project.status !== 'active') return null;
    if (pathCount === 0) return { kind: 'path_definition' };
    if (activePath && !activeMilestone) return { kind: 'milestone_definition', pathId: activePath.id };
    if (activeMilestone && taskCount === 0) return { kind: 'task_definition', milestoneId: activeMilestone.id };
    return null;
}

export function describeNeedsInput(needsInput: NeedsInput): string {
    switch (needsInput.kind) {
        case 'path_definition':
            return 'Define the first completion path.';
        case 'milestone_definition':
            return `Define a milestone for completion path ${needsInput.pathId}.`;
        case 'task_definition':
            return `Define tasks for milestone ${needsInput.milestoneId}.`;
    }
}

function ratio(count: ProgressCount): string {
    return `${count.completed}/${count.total}`;
}

function statusMark(status: Task['status']): string {
    switch (status) {
        case 'completed':
            return '[x]';
        case 'in_progress':
            return '[/]';
        case 'pending':
            return '[ ]';
    }
}

export function formatStatus(status: StatusSnapshot, git: LiveGitFacts | null = null): string {
    const { project, progress } = status;
    const lines: string[] = [];

    lines.push(`Project: ${project.name} (${project.status})`);
    lines.push(
        `Progress: paths ${ratio(progress.paths)}, milestones ${ratio(progress.milestones)}, ` +
            `tasks ${ratio(progress.tasks)}, items ${ratio(progress.items)}`
    );

    if (git) {
        lines.push(`Git: ${git.branch ?? '(detached)'}, ${git.clean ? 'clean' : 'uncommitted changes'}`);
    }
    if (project.lastKnownGitHash) {
        lines.push(`Last synced revision: ${project.lastKnownGitHash.slice(0, 12)}`);
    }

    if (status.activePath) {
        lines.push(`Path: ${status.activePath.name} (${status.activePath.status})`);
    }
    if (status.activeMilestone) {
        lines.push(`Milestone: ${status.activeMilestone.name} (${status.activeMilestone.status})`);
    }
    for (const { task, itemsDone, itemsTotal, openSubtasks, openSidequests } of status.tasks) {
        const items = itemsTotal > 0 ? ` ${itemsDone}/${itemsTotal}` : '';
        const extras: string[] = [];
        if (task.priority !== 'medium') extras.push(`priority ${task.priority}`);
        if (openSubtasks > 0) extras.push(`${openSubtasks} open subtask(s)`);
        if (openSidequests > 0) extras.push(`paused by ${openSidequests} sidequest(s)`);
        const suffix = extras.length > 0 ? ` (${extras.join(', ')})` : '';
        lines.push(`  ${statusMark(task.status)} #${task.id} ${task.name}${items}${suffix}`);
    }

    if (status.needsInput) {
        lines.push(`Needs input: ${describeNeedsInput(status.needsInput)}`);
    }

    return lines.join('\n');
}

/** One-line summary of what a completion did above the task. */
export function describeRollup(outcome: RollupOutcome): string {
    switch (outcome.kind) {
        case 'already_complete':
            return 'Already completed; nothing changed.';
        case 'task_completed':
            return outcome.upNext
                ? `Task completed. Up next: task #${outcome.upNext.id} ${outcome.upNext.name}`
                : 'Task completed. Remaining tasks in this milestone are in progress.';
        case 'milestone_completed': {
            const upNext = outcome.upNext ? ` Up next: milestone #${outcome.upNext.id} ${outcome.upNext.name}` : '';
            return `Milestone '${outcome.milestone.name}' completed.${upNext}`;
        }
        case 'path_completed': {
            const { next } = outcome;
            const milestone = next.milestone ? `, milestone '${next.milestone.name}'` : '';
            const needs = next.needsInput ? ` Needs input: ${describeNeedsInput(next.needsInput)}` : '';
            return `Completion path '${outcome.path.name}' completed. Now active: path '${next.path.name}'${milestone}.${needs}`;
        }
        case 'project_completed':
            return `Project '${outcome.project.name}' is complete.`;
    }
}
