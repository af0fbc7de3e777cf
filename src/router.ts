import type { AgentLoop, AgentOutcome } from './agent';
import type { ToolServerConnection } from './connection';
import { parseCommand, type Command, type CommandGrammar } from './commands';
import type { ConversationContextBuilder } from './context';
import { describeError } from './errors';
import {
    formatHelp,
    formatPromptList,
    formatResourceList,
    formatServerList,
    formatToolHelp,
    formatToolList,
    formatToolResult,
} from './format';
import { silentLogger, type Logger } from './logger';
import type { ServerPool } from './pool';
import { ToolRegistry } from './registry';
import type { ResponseSink, ThreadReplier } from './sink';
import type { InboundMessage } from './types';

export interface CommandRouterOptions {
    prefix: string;
    ignoredPrefixes: string[];
    /** Posted before the agent starts working; empty disables it. */
    processingNotice?: string;
}

export interface CommandRouterDeps {
    pool: ServerPool;
    sink: ResponseSink;
    agent: AgentLoop;
    context: ConversationContextBuilder;
    logger?: Logger;
}

export interface RouteResult {
    command: Command;
    outcome?: AgentOutcome;
}

export class CommandRouter {
    private readonly logger: Logger;

    constructor(private readonly deps: CommandRouterDeps, private readonly options: CommandRouterOptions) {
        this.logger = deps.logger ?? silentLogger;
    }

    grammar(): CommandGrammar {
        return {
            prefix: this.options.prefix,
            ignoredPrefixes: this.options.ignoredPrefixes,
            serverNames: this.deps.pool.serverNames(),
        };
    }

    async route(message: InboundMessage): Promise<RouteResult> {
        const command = parseCommand(message.text, this.grammar());
        const reply = this.deps.sink.thread(message.channelId, message.rootId);
        this.logger.debug(`Routing ${command.kind} command from ${message.userId}`);

        switch (command.kind) {
            case 'ignore':
                return { command };
            case 'help':
                await reply.post(formatHelp(this.options.prefix));
                return { command };
            case 'servers':
                await reply.post(formatServerList(this.deps.pool.status()));
                return { command };
            case 'usage':
                await reply.post(`Invalid command. Use ${command.usage}`);
                return { command };
            case 'tools':
                await this.replyWithTools(command.server, command.tool, reply);
                return { command };
            case 'resources':
                await this.replyWithListing(command.server, reply, async (connection) =>
                    formatResourceList(command.server, await connection.listResources()));
                return { command };
            case 'prompts':
                await this.replyWithListing(command.server, reply, async (connection) =>
                    formatPromptList(command.server, await connection.listPrompts()));
                return { command };
            case 'call':
                await this.callTool(command.server, command.tool, command.args, reply);
                return { command };
            case 'chat':
                return { command, outcome: await this.converse(command.text, message, reply) };
        }
    }

    private async replyWithTools(server: string, toolName: string | undefined, reply: ThreadReplier) {
        await this.replyWithListing(server, reply, async (connection) => {
            const tools = await connection.listTools();
            if (!toolName) {
                return formatToolList(server, tools);
            }
            const tool = tools.find(t => t.name === toolName);
            return tool
                ? formatToolHelp(server, tool, this.options.prefix)
                : `Tool '${toolName}' not found on ${server}.`;
        });
    }

    private async replyWithListing(
        server: string,
        reply: ThreadReplier,
        render: (connection: ToolServerConnection) => Promise<string>
    ) {
        const connection = this.deps.pool.get(server);
        if (!connection) {
            await reply.post(`Unknown server '${server}'. Available servers: ${this.deps.pool.serverNames().join(', ')}`);
            return;
        }
        try {
            await reply.post(await render(connection));
        } catch (error) {
            this.logger.error(`Error processing command for ${server}: ${describeError(error)}`);
            await reply.post(`Error processing command: ${describeError(error)}`);
        }
    }

    private async callTool(server: string, tool: string, args: Record<string, unknown>, reply: ThreadReplier) {
        this.logger.info(`Calling tool ${tool} on ${server} with inputs`, args);
        try {
            const result = await this.deps.pool.invoke(server, tool, args);
            const text = formatToolResult(result);
            if (result.isError) {
                await reply.post(`Tool ${tool} on ${server} returned an error:\n${text}`);
            } else {
                await reply.post(`Tool result from ${server}:\n${text}`);
            }
        } catch (error) {
            this.logger.error(`Error calling tool ${tool} on ${server}: ${describeError(error)}`);
            await reply.post(`Error calling tool ${tool} on ${server}: ${describeError(error)}`);
        }
    }

    private async converse(text: string, message: InboundMessage, reply: ThreadReplier): Promise<AgentOutcome> {
        if (this.options.processingNotice) {
            await reply.post(this.options.processingNotice);
        }

        const listing = await this.deps.pool.listTools();
        for (const failure of listing.failures) {
            this.logger.warn(`Tools of ${failure.serverName} are unavailable for this request: ${failure.error.message}`);
        }
        const registry = ToolRegistry.fromListing(listing.items);
        const history = await this.deps.context.build(message.rootId, message.channelId);

        return this.deps.agent.run({ prompt: text, postText: message.text, history, registry, reply });
    }
}
