/**
 * SHELL: MCP Server Entrypoint
 * Exposes the store, checkpoint and status over MCP tools.
 * stdout carries the protocol, so all logging goes to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PathkeeperError } from '../core/errors';
import { ConsoleLogger } from '../core/logger';
import { findRoot } from '../core/paths';
import { formatStatus } from '../core/status';
import { readPackageInfo } from '../version';
import { Workspace, openWorkspace, readLiveGitFacts } from './session';
import { TOOLS, toParentRef } from './tools';

function textResult(value: unknown): CallToolResult {
    const text = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
    return { content: [{ type: 'text', text }] };
}

/** Domain errors become tool errors the agent can act on; anything else propagates to the SDK. */
async function respond(work: () => unknown): Promise<CallToolResult> {
    try {
        return textResult(await work());
    } catch (err) {
        if (!(err instanceof PathkeeperError)) throw err;
        const text = err.hint ? `[${err.code}] ${err.message}\nHint: ${err.hint}` : `[${err.code}] ${err.message}`;
        return { isError: true, content: [{ type: 'text', text }] };
    }
}

export function createMcpServer(workspace: Workspace): McpServer {
    const { store, checkpoint } = workspace;
    const server = new McpServer({ name: 'pathkeeper', version: readPackageInfo().version });

    server.registerTool(
        TOOLS.get_project.name,
        { description: TOOLS.get_project.description, inputSchema: TOOLS.get_project.schema.shape },
        async () => respond(() => store.getProject())
    );

    server.registerTool(
        TOOLS.get_status.name,
        { description: TOOLS.get_status.description, inputSchema: TOOLS.get_status.schema.shape },
        async () =>
            respond(async () => {
                const status = store.getStatus();
                const git = await readLiveGitFacts(workspace);
                return { text: formatStatus(status, git), status, git };
            })
    );

    server.registerTool(
        TOOLS.add_completion_path.name,
        { description: TOOLS.add_completion_path.description, inputSchema: TOOLS.add_completion_path.schema.shape },
        async (args) => respond(() => store.addCompletionPath(args))
    );

    server.registerTool(
        TOOLS.add_milestone.name,
        { description: TOOLS.add_milestone.description, inputSchema: TOOLS.add_milestone.schema.shape },
        async ({ pathId, ...milestone }) => respond(() => store.addMilestone(pathId, milestone))
    );

    server.registerTool(
        TOOLS.define_task.name,
        { description: TOOLS.define_task.description, inputSchema: TOOLS.define_task.schema.shape },
        async ({ milestoneId, ...definition }) => respond(() => store.defineTask(milestoneId, definition))
    );

    server.registerTool(
        TOOLS.start_task.name,
        { description: TOOLS.start_task.description, inputSchema: TOOLS.start_task.schema.shape },
        async ({ taskId }) => respond(() => store.startTask(taskId))
    );

    server.registerTool(
        TOOLS.complete_item.name,
        { description: TOOLS.complete_item.description, inputSchema: TOOLS.complete_item.schema.shape },
        async ({ taskId, itemId, strict }) => respond(() => store.completeItem(taskId, itemId, { strict }))
    );

    server.registerTool(
        TOOLS.complete_task.name,
        { description: TOOLS.complete_task.description, inputSchema: TOOLS.complete_task.schema.shape },
        async ({ taskId, strict }) => respond(() => store.completeTask(taskId, { strict }))
    );

    server.registerTool(
        TOOLS.force_complete_task.name,
        { description: TOOLS.force_complete_task.description, inputSchema: TOOLS.force_complete_task.schema.shape },
        async ({ taskId, reason }) => respond(() => store.forceCompleteTask(taskId, reason))
    );

    server.registerTool(
        TOOLS.set_task_priority.name,
        { description: TOOLS.set_task_priority.description, inputSchema: TOOLS.set_task_priority.schema.shape },
        async ({ taskId, priority }) => respond(() => store.setTaskPriority(taskId, priority))
    );

    server.registerTool(
        TOOLS.add_subtask.name,
        { description: TOOLS.add_subtask.description, inputSchema: TOOLS.add_subtask.schema.shape },
        async ({ taskId, ...subtask }) => respond(() => store.addSubtask(taskId, subtask))
    );

    server.registerTool(
        TOOLS.complete_subtask.name,
        { description: TOOLS.complete_subtask.description, inputSchema: TOOLS.complete_subtask.schema.shape },
        async ({ subtaskId, strict }) => respond(() => store.completeSubtask(subtaskId, { strict }))
    );

    server.registerTool(
        TOOLS.open_sidequest.name,
        { description: TOOLS.open_sidequest.description, inputSchema: TOOLS.open_sidequest.schema.shape },
        async ({ taskId, ...sidequest }) => respond(() => store.openSidequest(taskId, sidequest))
    );

    server.registerTool(
        TOOLS.complete_sidequest.name,
        { description: TOOLS.complete_sidequest.description, inputSchema: TOOLS.complete_sidequest.schema.shape },
        async ({ sidequestId, strict }) => respond(() => store.completeSidequest(sidequestId, { strict }))
    );

    server.registerTool(
        TOOLS.complete_subwork_item.name,
        { description: TOOLS.complete_subwork_item.description, inputSchema: TOOLS.complete_subwork_item.schema.shape },
        async ({ kind, id, itemId, strict }) => respond(() => store.completeSubworkItem({ kind, id }, itemId, { strict }))
    );

    server.registerTool(
        TOOLS.list_subwork.name,
        { description: TOOLS.list_subwork.description, inputSchema: TOOLS.list_subwork.schema.shape },
        async ({ taskId }) =>
            respond(() => ({
                subtasks: store.listSubtasks(taskId).map((subtask) => ({
                    ...subtask,
                    items: store.listSubworkItems({ kind: 'subtask', id: subtask.id }),
                })),
                sidequests: store.listSidequests({ taskId }).map((sidequest) => ({
                    ...sidequest,
                    items: store.listSubworkItems({ kind: 'sidequest', id: sidequest.id }),
                })),
            }))
    );

    server.registerTool(
        TOOLS.get_next_pending.name,
        { description: TOOLS.get_next_pending.description, inputSchema: TOOLS.get_next_pending.schema.shape },
        async ({ parent, id }) => respond(() => ({ next: store.getNextPending(toParentRef(parent, id)) }))
    );

    server.registerTool(
        TOOLS.git_sync.name,
        { description: TOOLS.git_sync.description, inputSchema: TOOLS.git_sync.schema.shape },
        async () => respond(() => checkpoint.syncOrDegrade())
    );

    server.registerTool(
        TOOLS.git_acknowledge.name,
        { description: TOOLS.git_acknowledge.description, inputSchema: TOOLS.git_acknowledge.schema.shape },
        async () => respond(() => checkpoint.acknowledge())
    );

    server.registerTool(
        TOOLS.log_note.name,
        { description: TOOLS.log_note.description, inputSchema: TOOLS.log_note.schema.shape },
        async ({ noteType, message, table, id }) =>
            respond(() => store.logNote(noteType, message, table && id !== undefined ? { table, id } : undefined))
    );

    server.registerTool(
        TOOLS.list_notes.name,
        { description: TOOLS.list_notes.description, inputSchema: TOOLS.list_notes.schema.shape },
        async (filter) => respond(() => store.listNotes(filter))
    );

    server.registerTool(
        TOOLS.archive_project.name,
        { description: TOOLS.archive_project.description, inputSchema: TOOLS.archive_project.schema.shape },
        async () => respond(() => store.archiveProject())
    );

    return server;
}

export async function serveStdio(startDir: string = process.cwd()): Promise<void> {
    const root = findRoot(startDir) ?? startDir;
    const workspace = await openWorkspace(root, {
        logger: (config) => new ConsoleLogger({ level: config.logLevel, stream: 'stderr' }),
    });
    const server = createMcpServer(workspace);

    const transport = new StdioServerTransport();
    transport.onclose = () => workspace.close();
    await server.connect(transport);
    workspace.logger.info(`Pathkeeper MCP server running at ${root}`);
}

if (require.main === module) {
    serveStdio().catch((err) => {
        console.error('Fatal Error:', err);
        process.exit(1);
    });
}
