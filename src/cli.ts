#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { PathkeeperConfig } from './core/config';
import { NotInitializedError, logError } from './core/errors';
import { ConsoleLogger, Logger } from './core/logger';
import { findRoot } from './core/paths';
import { describeRollup, formatStatus } from './core/status';
import { NOTE_TYPES, NoteType, PRIORITIES, ParentRef, Priority, SubworkCompletion, SubworkRef } from './core/types';
import { serveStdio } from './shell/mcp';
import { Workspace, initWorkspace, openWorkspace, readLiveGitFacts, startSession } from './shell/session';
import { describeSync } from './shell/sync';
import { toParentRef } from './shell/tools';
import { readPackageInfo } from './version';

export interface ProgramOptions {
    cwd?: string;
    logger?: Logger;
}

/** Options shared by the commands that plan a task, subtask or sidequest. */
interface PlanOptions {
    description: string;
    item: string[];
    priority?: Priority;
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function parseId(value: string): number {
    const id = Number(value);
    if (!Number.isInteger(id) || id <= 0) {
        throw new InvalidArgumentError('Expected a positive integer id.');
    }
    return id;
}

function parseOrder(value: string): number {
    const order = Number(value);
    if (!Number.isInteger(order)) {
        throw new InvalidArgumentError('Expected an integer.');
    }
    return order;
}

function parseNoteType(value: string): NoteType {
    const match = NOTE_TYPES.find((t) => t === value);
    if (!match) {
        throw new InvalidArgumentError(`Expected one of: ${NOTE_TYPES.join(', ')}`);
    }
    return match;
}

function parsePriority(value: string): Priority {
    const match = PRIORITIES.find((p) => p === value);
    if (!match) {
        throw new InvalidArgumentError(`Expected one of: ${PRIORITIES.join(', ')}`);
    }
    return match;
}

function parseParentKind(value: string): ParentRef['kind'] {
    switch (value) {
        case 'project':
        case 'path':
        case 'milestone':
        case 'task':
        case 'subtask':
        case 'sidequest':
            return value;
        default:
            throw new InvalidArgumentError('Expected one of: project, path, milestone, task, subtask, sidequest');
    }
}

function labelOf(ref: SubworkRef): string {
    return `${ref.kind === 'subtask' ? 'Subtask' : 'Sidequest'} #${ref.id}`;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

export function createProgram(options: ProgramOptions = {}): Command {
    const cwd = options.cwd ?? process.cwd();
    const loggerFor = (config: PathkeeperConfig): Logger => options.logger ?? new ConsoleLogger({ level: config.logLevel });

    function reportClosed(ws: Workspace, ref: SubworkRef, result: SubworkCompletion): void {
        if (result.alreadyComplete) {
            ws.logger.info(`${labelOf(ref)} is already completed; nothing changed.`);
            return;
        }
        ws.logger.success(`${labelOf(ref)} closed`);
        if (result.taskRollup) {
            ws.logger.success(describeRollup(result.taskRollup));
        }
    }

    /** Opens the workspace found above cwd, runs fn, always closes the store. */
    async function withWorkspace<T>(fn: (ws: Workspace) => Promise<T> | T): Promise<T> {
        const root = findRoot(cwd);
        if (!root) {
            throw new NotInitializedError(`No .pathkeeper directory found in ${cwd} or its parents.`);
        }
        const ws = await openWorkspace(root, { logger: loggerFor });
        try {
            return await fn(ws);
        } finally {
            ws.close();
        }
    }

    const program = new Command();

    program
        .name('pathkeeper')
        .description('Project state machine: completion paths, milestones, tasks and git sync checkpoints')
        .version(readPackageInfo().version);

    // ═══════════════════════════════════════════════════════════════════════
    // PROJECT
    // ═══════════════════════════════════════════════════════════════════════

    program
        .command('init <name>')
        .description('Initialize .pathkeeper/ and the project in the current directory')
        .option('-p, --purpose <text>', 'One-line project purpose', '')
        .action(async (name: string, opts: { purpose: string }) => {
            const ws = await openWorkspace(cwd, { logger: loggerFor });
            try {
                const result = await initWorkspace(ws, { name, purpose: opts.purpose });
                if (result.configWritten) {
                    ws.logger.info('Created .pathkeeper/config.json');
                }
                ws.logger.info(describeSync(result.sync));
                ws.logger.info('Next: pathkeeper path add <name>');
            } finally {
                ws.close();
            }
        });

    program
        .command('status')
        .description('Show progress, the active path and milestone, and what input is needed')
        .action(() =>
            withWorkspace(async (ws) => {
                const git = await readLiveGitFacts(ws);
                ws.logger.info(formatStatus(ws.store.getStatus(), git));
            })
        );

    program
        .command('start')
        .description('Start a session: sync with git, then show status')
        .action(() =>
            withWorkspace(async (ws) => {
                const session = await startSession(ws);
                ws.logger.info(describeSync(session.sync));
                ws.logger.info(formatStatus(session.status, session.git));
            })
        );

    program
        .command('sync')
        .description('Compare git HEAD with the last recorded revision')
        .option('--ack', 'Record HEAD as the baseline without reporting an external change')
        .action((opts: { ack?: boolean }) =>
            withWorkspace(async (ws) => {
                if (opts.ack) {
                    const { hash } = await ws.checkpoint.acknowledge();
                    ws.logger.success(`Acknowledged revision ${hash.slice(0, 12)}`);
                    return;
                }
                ws.logger.info(describeSync(await ws.checkpoint.syncOrDegrade()));
            })
        );

    program
        .command('archive')
        .description('Archive the project (read-only afterwards)')
        .action(() =>
            withWorkspace(async (ws) => {
                const project = await ws.store.archiveProject();
                ws.logger.success(`Archived project '${project.name}'`);
            })
        );

    // ═══════════════════════════════════════════════════════════════════════
    // PLANNING
    // ═══════════════════════════════════════════════════════════════════════

    const pathCmd = program.command('path').description('Manage completion paths');

    pathCmd
        .command('add <name>')
        .option('-d, --description <text>', 'Description', '')
        .option('--order <n>', 'Order index', parseOrder)
        .action((name: string, opts: { description: string; order?: number }) =>
            withWorkspace(async (ws) => {
                const path = await ws.store.addCompletionPath({ name, description: opts.description, orderIndex: opts.order });
                ws.logger.success(`Added completion path #${path.id} ${path.name}`);
            })
        );

    pathCmd
        .command('list')
        .action(() =>
            withWorkspace((ws) => {
                for (const path of ws.store.listCompletionPaths()) {
                    ws.logger.info(`#${path.id} ${path.name} (${path.status})`);
                    for (const milestone of ws.store.listMilestones(path.id)) {
                        ws.logger.info(`  #${milestone.id} ${milestone.name} (${milestone.status})`);
                    }
                }
            })
        );

    program
        .command('milestone')
        .description('Manage milestones')
        .command('add <pathId> <name>')
        .option('-d, --description <text>', 'Description', '')
        .option('--order <n>', 'Order index', parseOrder)
        .action((pathId: string, name: string, opts: { description: string; order?: number }) =>
            withWorkspace(async (ws) => {
                const milestone = await ws.store.addMilestone(parseId(pathId), {
                    name,
                    description: opts.description,
                    orderIndex: opts.order,
                });
                ws.logger.success(`Added milestone #${milestone.id} ${milestone.name}`);
            })
        );

    // ═══════════════════════════════════════════════════════════════════════
    // TASKS & ITEMS
    // ═══════════════════════════════════════════════════════════════════════

    const taskCmd = program.command('task').description('Define, start and complete tasks');

    taskCmd
        .command('define <milestoneId> <name>')
        .option('-d, --description <text>', 'Description', '')
        .option('-i, --item <text>', 'Checklist item (repeatable, kept in order)', collect, [])
        .option('--priority <level>', 'low, medium, high or critical', parsePriority)
        .option('--order <n>', 'Order index', parseOrder)
        .action((milestoneId: string, name: string, opts: PlanOptions & { order?: number }) =>
            withWorkspace(async (ws) => {
                const { task, items } = await ws.store.defineTask(parseId(milestoneId), {
                    name,
                    description: opts.description,
                    priority: opts.priority,
                    items: opts.item,
                    orderIndex: opts.order,
                });
                ws.logger.success(`Defined task #${task.id} ${task.name} with ${items.length} item(s)`);
            })
        );

    taskCmd
        .command('start <taskId>')
        .action((taskId: string) =>
            withWorkspace(async (ws) => {
                const task = await ws.store.startTask(parseId(taskId));
                ws.logger.success(`Task #${task.id} is ${task.status}`);
            })
        );

    taskCmd
        .command('priority <taskId> <level>')
        .description('Change the priority of an open task')
        .action((taskId: string, level: string) =>
            withWorkspace(async (ws) => {
                const task = await ws.store.setTaskPriority(parseId(taskId), parsePriority(level));
                ws.logger.success(`Task #${task.id} priority is ${task.priority}`);
            })
        );

    taskCmd
        .command('complete <taskId>')
        .option('--strict', 'Fail if the task is already completed')
        .action((taskId: string, opts: { strict?: boolean }) =>
            withWorkspace(async (ws) => {
                const { rollup } = await ws.store.completeTask(parseId(taskId), { strict: opts.strict });
                ws.logger.success(describeRollup(rollup));
            })
        );

    taskCmd
        .command('force <taskId>')
        .description('Complete a task with open items (recorded as an override)')
        .requiredOption('-r, --reason <text>', 'Why the open items are waived')
        .action((taskId: string, opts: { reason: string }) =>
            withWorkspace(async (ws) => {
                const { rollup } = await ws.store.forceCompleteTask(parseId(taskId), opts.reason);
                if (rollup.kind !== 'already_complete') {
                    ws.logger.warn(`Task #${taskId} force-completed: ${opts.reason}`);
                }
                ws.logger.success(describeRollup(rollup));
            })
        );

    program
        .command('item')
        .description('Checklist items')
        .command('complete <taskId> <itemId>')
        .option('--strict', 'Fail if the task or item is already completed')
        .action((taskId: string, itemId: string, opts: { strict?: boolean }) =>
            withWorkspace(async (ws) => {
                const result = await ws.store.completeItem(parseId(taskId), parseId(itemId), { strict: opts.strict });
                if (result.alreadyComplete) {
                    ws.logger.info(`Task #${result.task.id} is already completed; nothing changed.`);
                    return;
                }
                ws.logger.success(`Item #${result.item.id} done`);
                if (result.rollup) {
                    ws.logger.success(describeRollup(result.rollup));
                }
            })
        );

    // ═══════════════════════════════════════════════════════════════════════
    // SUBTASKS & SIDEQUESTS
    // ═══════════════════════════════════════════════════════════════════════

    const subtaskCmd = program.command('subtask').description('Break a task down; the task waits for its subtasks');

    subtaskCmd
        .command('add <taskId> <name>')
        .option('-d, --description <text>', 'Description', '')
        .option('-i, --item <text>', 'Checklist item (repeatable, kept in order)', collect, [])
        .option('--priority <level>', 'low, medium, high or critical', parsePriority)
        .action((taskId: string, name: string, opts: PlanOptions) =>
            withWorkspace(async (ws) => {
                const { subtask, items } = await ws.store.addSubtask(parseId(taskId), {
                    name,
                    description: opts.description,
                    priority: opts.priority,
                    items: opts.item,
                });
                ws.logger.success(`Added subtask #${subtask.id} ${subtask.name} to task #${subtask.taskId} with ${items.length} item(s)`);
            })
        );

    subtaskCmd
        .command('complete <subtaskId>')
        .action((subtaskId: string) =>
            withWorkspace(async (ws) => {
                const id = parseId(subtaskId);
                reportClosed(ws, { kind: 'subtask', id }, await ws.store.completeSubtask(id));
            })
        );

    const sidequestCmd = program.command('sidequest').description('Pause a task for unplanned work that must land first');

    sidequestCmd
        .command('open <taskId> <name>')
        .option('-d, --description <text>', 'Description', '')
        .option('-i, --item <text>', 'Checklist item (repeatable, kept in order)', collect, [])
        .option('-s, --subtask <id>', 'Also pause this subtask of the task', parseId)
        .option('--priority <level>', 'low, medium, high or critical', parsePriority)
        .action((taskId: string, name: string, opts: PlanOptions & { subtask?: number }) =>
            withWorkspace(async (ws) => {
                const { sidequest } = await ws.store.openSidequest(parseId(taskId), {
                    name,
                    description: opts.description,
                    priority: opts.priority,
                    items: opts.item,
                    subtaskId: opts.subtask,
                });
                ws.logger.warn(`Task #${sidequest.taskId} paused by sidequest #${sidequest.id} ${sidequest.name}`);
            })
        );

    sidequestCmd
        .command('complete <sidequestId>')
        .action((sidequestId: string) =>
            withWorkspace(async (ws) => {
                const id = parseId(sidequestId);
                reportClosed(ws, { kind: 'sidequest', id }, await ws.store.completeSidequest(id));
            })
        );

    sidequestCmd
        .command('list')
        .option('--open', 'Only sidequests that are not completed')
        .option('-t, --task <id>', 'Only sidequests pausing this task', parseId)
        .action((opts: { open?: boolean; task?: number }) =>
            withWorkspace((ws) => {
                for (const sidequest of ws.store.listSidequests({ taskId: opts.task, openOnly: opts.open })) {
                    const subtask = sidequest.subtaskId === null ? '' : `, subtask #${sidequest.subtaskId}`;
                    ws.logger.info(
                        `#${sidequest.id} ${sidequest.name} (${sidequest.status}, ${sidequest.priority}) pauses task #${sidequest.taskId}${subtask}`
                    );
                }
            })
        );

    for (const [cmd, kind] of [
        [subtaskCmd, 'subtask'],
        [sidequestCmd, 'sidequest'],
    ] as const) {
        cmd.command('item <id> <itemId>')
            .description(`Mark one ${kind} item done`)
            .action((id: string, itemId: string) =>
                withWorkspace(async (ws) => {
                    const ref: SubworkRef = { kind, id: parseId(id) };
                    const result = await ws.store.completeSubworkItem(ref, parseId(itemId));
                    if (result.alreadyComplete) {
                        ws.logger.info(`${labelOf(ref)} is already completed; nothing changed.`);
                        return;
                    }
                    ws.logger.success(`Item #${result.item.id} done`);
                    if (result.closed) {
                        reportClosed(ws, ref, result);
                    }
                })
            );
    }

    program
        .command('next [parent] [id]')
        .description('Show the next pending child of project (default), path, milestone, task, subtask or sidequest')
        .action((parent: string | undefined, id: string | undefined) =>
            withWorkspace((ws) => {
                const ref = toParentRef(parseParentKind(parent ?? 'project'), id === undefined ? undefined : parseId(id));
                const next = ws.store.getNextPending(ref);
                if (!next) {
                    ws.logger.info('Nothing pending.');
                    return;
                }
                ws.logger.info(`#${next.id} ${'name' in next ? next.name : next.description}`);
            })
        );

    // ═══════════════════════════════════════════════════════════════════════
    // NOTES
    // ═══════════════════════════════════════════════════════════════════════

    const noteCmd = program.command('note').description('Append-only note log');

    noteCmd
        .command('add <type> <message>')
        .action((type: string, message: string) =>
            withWorkspace(async (ws) => {
                const note = await ws.store.logNote(parseNoteType(type), message);
                ws.logger.success(`Logged ${note.noteType} note #${note.id}`);
            })
        );

    noteCmd
        .command('list')
        .option('-t, --type <type>', 'Only this note type', parseNoteType)
        .option('-n, --limit <n>', 'Maximum notes', parseId)
        .action((opts: { type?: NoteType; limit?: number }) =>
            withWorkspace((ws) => {
                for (const note of ws.store.listNotes({ noteType: opts.type, limit: opts.limit })) {
                    ws.logger.info(`${note.createdAt} [${note.noteType}] ${note.message}`);
                }
            })
        );

    // ═══════════════════════════════════════════════════════════════════════
    // SERVER
    // ═══════════════════════════════════════════════════════════════════════

    program
        .command('serve')
        .description('Run the MCP server over stdio')
        .action(() => serveStdio(cwd));

    return program;
}

if (require.main === module) {
    createProgram()
        .parseAsync(process.argv)
        .catch((err: unknown) => {
            logError(new ConsoleLogger(), err);
            process.exitCode = 1;
        });
}
