/**
 * SHELL: Row Mapping
 * SQLite rows are validated on the way out, then mapped to domain objects.
 */

import { z } from 'zod';
import {
    CompletionPath,
    ENTITY_TABLES,
    Item,
    Milestone,
    NOTE_TYPES,
    Note,
    PRIORITIES,
    Project,
    Sidequest,
    Subtask,
    Task,
} from '../core/types';

const WorkStatusSchema = z.enum(['pending', 'in_progress', 'completed']);
const Flag = z.union([z.literal(0), z.literal(1)]);
const PrioritySchema = z.enum(PRIORITIES);

export const ProjectRow = z
    .object({
        id: z.number().int(),
        name: z.string(),
        purpose: z.string(),
        status: z.enum(['active', 'complete', 'archived']),
        last_known_git_hash: z.string().nullable(),
        last_git_sync: z.string().nullable(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): Project => ({
            id: r.id,
            name: r.name,
            purpose: r.purpose,
            status: r.status,
            lastKnownGitHash: r.last_known_git_hash,
            lastGitSync: r.last_git_sync,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const CompletionPathRow = z
    .object({
        id: z.number().int(),
        name: z.string(),
        description: z.string(),
        status: WorkStatusSchema,
        order_index: z.number().int(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): CompletionPath => ({
            id: r.id,
            name: r.name,
            description: r.description,
            status: r.status,
            orderIndex: r.order_index,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const MilestoneRow = z
    .object({
        id: z.number().int(),
        completion_path_id: z.number().int(),
        name: z.string(),
        description: z.string(),
        status: WorkStatusSchema,
        order_index: z.number().int(),
        completed_at: z.string().nullable(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): Milestone => ({
            id: r.id,
            completionPathId: r.completion_path_id,
            name: r.name,
            description: r.description,
            status: r.status,
            orderIndex: r.order_index,
            completedAt: r.completed_at,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const TaskRow = z
    .object({
        id: z.number().int(),
        milestone_id: z.number().int(),
        name: z.string(),
        description: z.string(),
        status: WorkStatusSchema,
        priority: PrioritySchema,
        order_index: z.number().int(),
        forced: Flag,
        completed_at: z.string().nullable(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): Task => ({
            id: r.id,
            milestoneId: r.milestone_id,
            name: r.name,
            description: r.description,
            status: r.status,
            priority: r.priority,
            orderIndex: r.order_index,
            forced: r.forced === 1,
            completedAt: r.completed_at,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const SubtaskRow = z
    .object({
        id: z.number().int(),
        parent_task_id: z.number().int(),
        name: z.string(),
        description: z.string(),
        status: WorkStatusSchema,
        priority: PrioritySchema,
        order_index: z.number().int(),
        completed_at: z.string().nullable(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): Subtask => ({
            id: r.id,
            taskId: r.parent_task_id,
            name: r.name,
            description: r.description,
            status: r.status,
            priority: r.priority,
            orderIndex: r.order_index,
            completedAt: r.completed_at,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const SidequestRow = z
    .object({
        id: z.number().int(),
        paused_task_id: z.number().int(),
        paused_subtask_id: z.number().int().nullable(),
        name: z.string(),
        description: z.string(),
        status: WorkStatusSchema,
        priority: PrioritySchema,
        completed_at: z.string().nullable(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): Sidequest => ({
            id: r.id,
            taskId: r.paused_task_id,
            subtaskId: r.paused_subtask_id,
            name: r.name,
            description: r.description,
            status: r.status,
            priority: r.priority,
            completedAt: r.completed_at,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const ItemRow = z
    .object({
        id: z.number().int(),
        task_id: z.number().int(),
        subtask_id: z.number().int().nullable(),
        sidequest_id: z.number().int().nullable(),
        description: z.string(),
        done: Flag,
        order_index: z.number().int(),
        completed_at: z.string().nullable(),
        created_at: z.string(),
        updated_at: z.string(),
    })
    .transform(
        (r): Item => ({
            id: r.id,
            taskId: r.task_id,
            subtaskId: r.subtask_id,
            sidequestId: r.sidequest_id,
            description: r.description,
            done: r.done === 1,
            orderIndex: r.order_index,
            completedAt: r.completed_at,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        })
    );

export const NoteRow = z
    .object({
        id: z.number().int(),
        note_type: z.enum(NOTE_TYPES),
        message: z.string(),
        reference_table: z.enum(ENTITY_TABLES).nullable(),
        reference_id: z.number().int().nullable(),
        created_at: z.string(),
    })
    .transform(
        (r): Note => ({
            id: r.id,
            noteType: r.note_type,
            message: r.message,
            referenceTable: r.reference_table,
            referenceId: r.reference_id,
            createdAt: r.created_at,
        })
    );

export const CountRow = z.object({ total: z.number().int(), completed: z.number().int().nullable() });
export const MaxOrderRow = z.object({ max_order: z.number().int().nullable() });
export const OpenCountRow = z.object({ open: z.number().int() });
export const TaskCountRow = z.object({ milestone_id: z.number().int(), total: z.number().int() });

/** Rollup inputs: just enough of each sibling to plan the transition. */
export const OrderedRowSchema = z
    .object({ id: z.number().int(), status: WorkStatusSchema, order_index: z.number().int() })
    .transform((r) => ({ id: r.id, status: r.status, orderIndex: r.order_index }));

export const MilestoneOrderRowSchema = z
    .object({
        id: z.number().int(),
        completion_path_id: z.number().int(),
        status: WorkStatusSchema,
        order_index: z.number().int(),
    })
    .transform((r) => ({
        id: r.id,
        completionPathId: r.completion_path_id,
        status: r.status,
        orderIndex: r.order_index,
    }));
