/**
 * SHELL: Tool Definitions
 * Zod schemas for MCP tools.
 */

import { z } from 'zod';
import { InvalidInputError } from '../core/errors';
import { ENTITY_TABLES, NOTE_TYPES, PRIORITIES, ParentRef } from '../core/types';

const Id = z.number().int().positive();
const OrderIndex = z.number().int().describe('Position among siblings; defaults to after the last one');
const Priority = z.enum(PRIORITIES);
const Items = z.array(z.string().min(1)).describe('Ordered checklist entries');
const Strict = z.boolean().optional().describe('Fail with ALREADY_COMPLETE instead of returning a no-op result');

export const TOOLS = {
    get_project: {
        name: 'get_project',
        description: 'Returns the project record, including the last synced git revision.',
        schema: z.object({}),
    },
    get_status: {
        name: 'get_status',
        description: 'Progress snapshot: counts, active path and milestone, its tasks, and what input is needed next.',
        schema: z.object({}),
    },
    add_completion_path: {
        name: 'add_completion_path',
        description: 'Adds a top-level phase of work to the project.',
        schema: z.object({
            name: z.string().min(1).describe('Name of the completion path'),
            description: z.string().optional(),
            orderIndex: OrderIndex.optional(),
        }),
    },
    add_milestone: {
        name: 'add_milestone',
        description: 'Adds a milestone to an open completion path.',
        schema: z.object({
            pathId: Id.describe('Completion path id'),
            name: z.string().min(1),
            description: z.string().optional(),
            orderIndex: OrderIndex.optional(),
        }),
    },
    define_task: {
        name: 'define_task',
        description: 'Defines a task and its ordered checklist items under an open milestone.',
        schema: z.object({
            milestoneId: Id.describe('Milestone id'),
            name: z.string().min(1),
            description: z.string().optional(),
            priority: Priority.optional().describe('Defaults to medium'),
            items: Items.optional(),
            orderIndex: OrderIndex.optional(),
        }),
    },
    set_task_priority: {
        name: 'set_task_priority',
        description: 'Changes the priority of an open task.',
        schema: z.object({ taskId: Id, priority: Priority }),
    },
    start_task: {
        name: 'start_task',
        description: 'Moves a pending task to in_progress, along with its milestone and path.',
        schema: z.object({ taskId: Id }),
    },
    complete_item: {
        name: 'complete_item',
        description: 'Marks one checklist item done. Completing the last open item completes the task and runs the rollup.',
        schema: z.object({ taskId: Id, itemId: Id, strict: Strict }),
    },
    complete_task: {
        name: 'complete_task',
        description:
            'Completes a task whose items, subtasks and sidequests are all done, then rolls completion up to milestone, path and project.',
        schema: z.object({ taskId: Id, strict: Strict }),
    },
    force_complete_task: {
        name: 'force_complete_task',
        description:
            'Override: completes a task with open items, subtasks or sidequests. The reason is recorded as a task_context note.',
        schema: z.object({
            taskId: Id,
            reason: z.string().min(1).describe('Why the open items are being waived'),
        }),
    },
    add_subtask: {
        name: 'add_subtask',
        description: 'Breaks an open task down further. The task cannot complete until the subtask does.',
        schema: z.object({
            taskId: Id,
            name: z.string().min(1),
            description: z.string().optional(),
            priority: Priority.optional().describe('Defaults to high'),
            items: Items.optional(),
            orderIndex: OrderIndex.optional(),
        }),
    },
    complete_subtask: {
        name: 'complete_subtask',
        description: 'Closes a subtask whose items are done and that no sidequest pauses; may complete the parent task.',
        schema: z.object({ subtaskId: Id, strict: Strict }),
    },
    open_sidequest: {
        name: 'open_sidequest',
        description: 'Pauses an open task, and optionally one of its subtasks, for unplanned work that must land first.',
        schema: z.object({
            taskId: Id.describe('Task to pause'),
            subtaskId: Id.optional().describe('Subtask of that task to pause as well'),
            name: z.string().min(1),
            description: z.string().optional(),
            priority: Priority.optional().describe('Defaults to critical'),
            items: Items.optional(),
        }),
    },
    complete_sidequest: {
        name: 'complete_sidequest',
        description: 'Closes a sidequest whose items are done and resumes what it paused.',
        schema: z.object({ sidequestId: Id, strict: Strict }),
    },
    complete_subwork_item: {
        name: 'complete_subwork_item',
        description: 'Marks one item of a subtask or sidequest done. Its last open item closes the owner.',
        schema: z.object({
            kind: z.enum(['subtask', 'sidequest']),
            id: Id.describe('Subtask or sidequest id'),
            itemId: Id,
            strict: Strict,
        }),
    },
    list_subwork: {
        name: 'list_subwork',
        description: "Lists a task's subtasks and the sidequests that pause it, with their items.",
        schema: z.object({ taskId: Id }),
    },
    get_next_pending: {
        name: 'get_next_pending',
        description: 'Returns the lowest-ordered pending child of a parent, or null.',
        schema: z.object({
            parent: z.enum(['project', 'path', 'milestone', 'task', 'subtask', 'sidequest']).describe('Kind of parent'),
            id: Id.optional().describe('Parent id; required unless parent is project'),
        }),
    },
    git_sync: {
        name: 'git_sync',
        description: 'Compares git HEAD with the last recorded revision. Reports initialized, unchanged, changed or unavailable.',
        schema: z.object({}),
    },
    git_acknowledge: {
        name: 'git_acknowledge',
        description: 'Records HEAD as the baseline after a commit made through the tracked workflow.',
        schema: z.object({}),
    },
    log_note: {
        name: 'log_note',
        description: 'Appends a note to the audit log.',
        schema: z.object({
            noteType: z.enum(NOTE_TYPES),
            message: z.string().min(1),
            table: z.enum(ENTITY_TABLES).optional(),
            id: Id.optional(),
        }),
    },
    list_notes: {
        name: 'list_notes',
        description: 'Lists notes, newest first.',
        schema: z.object({
            noteType: z.enum(NOTE_TYPES).optional(),
            limit: z.number().int().min(1).max(500).optional(),
        }),
    },
    archive_project: {
        name: 'archive_project',
        description: 'Archives the project. Archived projects are read-only.',
        schema: z.object({}),
    },
};

export function toParentRef(parent: ParentRef['kind'], id: number | undefined): ParentRef {
    if (parent === 'project') {
        return { kind: 'project' };
    }
    if (id === undefined) {
        throw new InvalidInputError(`An id is required for parent '${parent}'`);
    }
    return { kind: parent, id };
}
