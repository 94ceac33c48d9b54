/**
 * CORE: Rollup Planner
 * Pure function: (RollupSnapshot) -> RollupPlan
 * Decides what a task completion does to its milestone, path and project.
 * The store reads the snapshot and applies the steps inside one transaction.
 */

import { NeedsInput, WorkStatus } from './types';

export interface OrderedRow {
    id: number;
    status: WorkStatus;
    orderIndex: number;
}

export interface MilestoneRow extends OrderedRow {
    completionPathId: number;
}

export interface RollupSnapshot {
    /** Milestone owning the task that was just completed. */
    milestoneId: number;
    /** Every task of that milestone, including the completed one. */
    tasks: OrderedRow[];
    /** Every milestone in the project. */
    milestones: MilestoneRow[];
    /** Every completion path in the project. */
    paths: OrderedRow[];
    /** milestoneId -> number of defined tasks. */
    taskCounts: Map<number, number>;
}

export type RollupStep =
    | { op: 'complete_milestone'; milestoneId: number }
    | { op: 'complete_path'; pathId: number }
    | { op: 'activate_path'; pathId: number }
    | { op: 'activate_milestone'; milestoneId: number }
    | { op: 'complete_project' };

export type RollupDecision =
    | { kind: 'task_completed'; upNextTaskId: number | null }
    | { kind: 'milestone_completed'; milestoneId: number; upNextMilestoneId: number | null }
    | {
          kind: 'path_completed';
          milestoneId: number;
          pathId: number;
          nextPathId: number;
          nextMilestoneId: number | null;
          needsInput: NeedsInput | null;
      }
    | { kind: 'project_completed'; milestoneId: number; pathId: number };

export interface RollupPlan {
    steps: RollupStep[];
    decision: RollupDecision;
}

/** Lowest orderIndex wins; ties go to the lowest id. */
export function pickNext<T extends OrderedRow>(rows: readonly T[]): T | null {
    let best: T | null = null;
    for (const row of rows) {
        if (
            best === null ||
            row.orderIndex < best.orderIndex ||
            (row.orderIndex === best.orderIndex && row.id < best.id)
        ) {
            best = row;
        }
    }
    return best;
}

export function planRollup(snapshot: RollupSnapshot): RollupPlan {
    const { milestoneId, tasks } = snapshot;

    // 1. Milestone still has open tasks: nothing above it moves.
    if (tasks.some((t) => t.status !== 'completed')) {
        const upNext = pickNext(tasks.filter((t) => t.status === 'pending'));
        return {
            steps: [],
            decision: { kind: 'task_completed', upNextTaskId: upNext?.id ?? null },
        };
    }

    const milestone = snapshot.milestones.find((m) => m.id === milestoneId);
    if (!milestone) {
        throw new Error(`Rollup snapshot is missing milestone ${milestoneId}`);
    }
    const pathId = milestone.completionPathId;
    const steps: RollupStep[] = [{ op: 'complete_milestone', milestoneId }];

    const milestones = snapshot.milestones.map((m) =>
        m.id === milestoneId ? { ...m, status: 'completed' as const } : m
    );

    // 2. Path still has open milestones: stop. upNext is reported, not activated.
    const siblings = milestones.filter((m) => m.completionPathId === pathId);
    if (siblings.some((m) => m.status !== 'completed')) {
        const upNext = pickNext(siblings.filter((m) => m.status === 'pending'));
        return {
            steps,
            decision: { kind: 'milestone_completed', milestoneId, upNextMilestoneId: upNext?.id ?? null },
        };
    }

    // 3. Path done.
    steps.push({ op: 'complete_path', pathId });
    const paths = snapshot.paths.map((p) => (p.id === pathId ? { ...p, status: 'completed' as const } : p));
    const openPaths = paths.filter((p) => p.status !== 'completed');

    // 5. Every path done: the project is complete.
    if (openPaths.length === 0) {
        steps.push({ op: 'complete_project' });
        return { steps, decision: { kind: 'project_completed', milestoneId, pathId } };
    }

    // 4. Move focus to the next open path and its next pending milestone.
    const nextPath = pickNext(openPaths);
    if (!nextPath) {
        throw new Error('Unreachable: open paths without a next path');
    }
    if (nextPath.status === 'pending') {
        steps.push({ op: 'activate_path', pathId: nextPath.id });
    }

    // A milestone already running there keeps the focus; otherwise the next pending one starts.
    const candidates = milestones.filter((m) => m.completionPathId === nextPath.id);
    const running = pickNext(candidates.filter((m) => m.status === 'in_progress'));
    const pending = pickNext(candidates.filter((m) => m.status === 'pending'));
    const nextMilestone = running ?? pending;
    if (!running && pending) {
        steps.push({ op: 'activate_milestone', milestoneId: pending.id });
    }

    let needsInput: NeedsInput | null = null;
    if (!nextMilestone) {
        needsInput = { kind: 'milestone_definition', pathId: nextPath.id };
    } else if ((snapshot.taskCounts.get(nextMilestone.id) ?? 0) === 0) {
        needsInput = { kind: 'task_definition', milestoneId: nextMilestone.id };
    }

    return {
        steps,
        decision: {
            kind: 'path_completed',
            milestoneId,
            pathId,
            nextPathId: nextPath.id,
            nextMilestoneId: nextMilestone?.id ?? null,
            needsInput,
        },
    };
}
