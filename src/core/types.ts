/**
 * CORE: Domain Types
 * Project 1-* CompletionPath 1-* Milestone 1-* Task 1-* Item.
 * A Task may also carry Subtasks and Sidequests, each with their own Items.
 * Ids are store-assigned positive integers; timestamps are ISO-8601 strings.
 */

export type ProjectStatus = 'active' | 'complete' | 'archived';
export type WorkStatus = 'pending' | 'in_progress' | 'completed';

export const NOTE_TYPES = [
    'clarification',
    'decision',
    'analysis',
    'task_context',
    'external',
    'warning',
    'error',
    'info',
    'summary',
] as const;
export type NoteType = (typeof NOTE_TYPES)[number];

export const PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const ENTITY_TABLES = ['project', 'completion_paths', 'milestones', 'tasks', 'subtasks', 'sidequests', 'items'] as const;
export type EntityTable = (typeof ENTITY_TABLES)[number];

export interface Project {
    id: number;
    name: string;
    purpose: string;
    status: ProjectStatus;
    lastKnownGitHash: string | null;
    lastGitSync: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface CompletionPath {
    id: number;
    name: string;
    description: string;
    status: WorkStatus;
    orderIndex: number;
    createdAt: string;
    updatedAt: string;
}

export interface Milestone {
    id: number;
    completionPathId: number;
    name: string;
    description: string;
    status: WorkStatus;
    orderIndex: number;
    completedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface Task {
    id: number;
    milestoneId: number;
    name: string;
    description: string;
    status: WorkStatus;
    priority: Priority;
    orderIndex: number;
    /** Completed through the override, with items still open. */
    forced: boolean;
    completedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

/** A breakdown of a task. Open subtasks keep their task from completing. */
export interface Subtask {
    id: number;
    taskId: number;
    name: string;
    description: string;
    status: WorkStatus;
    priority: Priority;
    orderIndex: number;
    completedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

/** A priority deviation that pauses a task (and optionally one of its subtasks) until it closes. */
export interface Sidequest {
    id: number;
    /** The paused task. */
    taskId: number;
    subtaskId: number | null;
    name: string;
    description: string;
    status: WorkStatus;
    priority: Priority;
    completedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

export type SubworkRef = { kind: 'subtask'; id: number } | { kind: 'sidequest'; id: number };

/**
 * Checklist entry. `taskId` is the task it rolls up to; an item owned by a
 * subtask or sidequest also carries that owner's id.
 */
export interface Item {
    id: number;
    taskId: number;
    subtaskId: number | null;
    sidequestId: number | null;
    description: string;
    done: boolean;
    orderIndex: number;
    completedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface Note {
    id: number;
    noteType: NoteType;
    message: string;
    referenceTable: EntityTable | null;
    referenceId: number | null;
    createdAt: string;
}

export interface NoteRef {
    table: EntityTable;
    id: number;
}

/** Parent whose next pending child get_next_pending selects. */
export type ParentRef =
    | { kind: 'project' }
    | { kind: 'path'; id: number }
    | { kind: 'milestone'; id: number }
    | { kind: 'task'; id: number }
    | SubworkRef;

/** Progress stops here until an outside decision supplies the missing definition. */
export type NeedsInput =
    | { kind: 'path_definition' }
    | { kind: 'milestone_definition'; pathId: number }
    | { kind: 'task_definition'; milestoneId: number };

export interface NextFocus {
    path: CompletionPath;
    milestone: Milestone | null;
    needsInput: NeedsInput | null;
}

export type RollupOutcome =
    | { kind: 'already_complete' }
    | { kind: 'task_completed'; upNext: Task | null }
    | { kind: 'milestone_completed'; milestone: Milestone; upNext: Milestone | null }
    | { kind: 'path_completed'; milestone: Milestone; path: CompletionPath; next: NextFocus }
    | { kind: 'project_completed'; milestone: Milestone; path: CompletionPath; project: Project };

export interface TaskCompletion {
    task: Task;
    milestoneCompleted: boolean;
    rollup: RollupOutcome;
}

export interface ItemCompletion {
    task: Task;
    item: Item;
    alreadyComplete: boolean;
    /** Set when this item closed the task's last open work. */
    rollup: RollupOutcome | null;
}

export interface SubworkCompletion {
    work: Subtask | Sidequest;
    alreadyComplete: boolean;
    /** Set when closing this work completed its task. */
    taskRollup: RollupOutcome | null;
}

export interface SubworkItemCompletion extends SubworkCompletion {
    item: Item;
    /** The item was its owner's last open one and the owner closed. */
    closed: boolean;
}

/** Re-completion is a no-op unless the caller asks for AlreadyComplete instead. */
export interface CompletionOptions {
    strict?: boolean;
}

export interface NewCompletionPath {
    name: string;
    description?: string;
    orderIndex?: number;
}

export interface NewMilestone {
    name: string;
    description?: string;
    orderIndex?: number;
}

/** Task definition supplied from outside once a milestone becomes active. */
export interface TaskDefinition {
    name: string;
    description?: string;
    priority?: Priority;
    items?: string[];
    orderIndex?: number;
}

export interface DefinedTask {
    task: Task;
    items: Item[];
}

export interface NewSubtask {
    name: string;
    description?: string;
    priority?: Priority;
    items?: string[];
    orderIndex?: number;
}

export interface DefinedSubtask {
    subtask: Subtask;
    items: Item[];
}

export interface NewSidequest {
    name: string;
    description?: string;
    priority?: Priority;
    items?: string[];
    /** Pause one subtask of the task as well. */
    subtaskId?: number;
}

export interface OpenedSidequest {
    sidequest: Sidequest;
    items: Item[];
}
