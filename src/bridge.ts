import { EventEmitter } from 'events';
import { AgentLoop, type AgentLoopOptions } from './agent';
import type { ChatBackend, PostedEvent } from './chat/types';
import { DEFAULT_IGNORED_PREFIXES } from './commands';
import { ConversationContextBuilder } from './context';
import { ChannelResolutionError, describeError } from './errors';
import type { LLMProvider } from './llm/types';
import { silentLogger, type Logger } from './logger';
import { ServerPool } from './pool';
import { CommandRouter, type RouteResult } from './router';
import { ResponseSink } from './sink';
import type { InboundMessage, ServerConfig } from './types';

export interface MCPChatBridgeConfig {
    servers: Record<string, ServerConfig>;
    commandPrefix: string;
    ignoredPrefixes?: string[];
    teamName?: string;
    channelName?: string;
    /** Used when the channel cannot be looked up by name. */
    channelId?: string;
    processingNotice?: string;
    maxPostLength?: number;
    agent?: Partial<AgentLoopOptions>;
}

export interface MCPChatBridgeDeps {
    chat: ChatBackend;
    llm: LLMProvider;
    /** Built from `config.servers` when absent. */
    pool?: ServerPool;
    logger?: Logger;
}

interface Components {
    router: CommandRouter;
    sink: ResponseSink;
}

/**
 * Owns the server pool, the chat identity and the per-request components, and
 * feeds every relevant chat post through the command router.
 */
export class MCPChatBridge extends EventEmitter {
    readonly pool: ServerPool;
    private readonly chat: ChatBackend;
    private readonly llm: LLMProvider;
    private readonly logger: Logger;
    private botUserId?: string;
    private channelId?: string;
    private components?: Components;

    constructor(private readonly config: MCPChatBridgeConfig, deps: MCPChatBridgeDeps) {
        super();
        this.chat = deps.chat;
        this.llm = deps.llm;
        this.logger = deps.logger ?? silentLogger;
        this.pool = deps.pool ?? new ServerPool(config.servers, { logger: this.logger.child('pool') });
    }

    get defaultChannelId(): string | undefined {
        return this.channelId;
    }

    get botId(): string | undefined {
        return this.botUserId;
    }

    async start(): Promise<void> {
        const statuses = await this.pool.connectAll();
        const connected = statuses.filter(s => s.state === 'connected').map(s => s.name);
        this.logger.info(`Connected to ${connected.length} MCP servers: ${connected.join(', ')}`);

        const me = await this.chat.getMe();
        this.botUserId = me.id;
        this.logger.info(`Logged in to chat as ${me.username} (${me.id})`);

        this.channelId = await this.resolveChannel();
        this.logger.info(`Using channel ${this.channelId}`);

        this.components = this.buildComponents(me.id, this.channelId);

        this.chat.onPost(async (event) => {
            await this.handlePost(event);
        });
        await this.chat.connect();
        this.emit('started', { channelId: this.channelId, servers: connected });
    }

    async stop(): Promise<void> {
        try {
            await this.chat.close();
        } catch (error) {
            this.logger.error(`Error closing chat connection: ${describeError(error)}`);
        }
        await this.pool.shutdown();
        this.components = undefined;
        this.emit('stopped');
    }

    /**
     * Routes one posted event. Returns `undefined` for posts the bridge does
     * not answer.
     */
    async handlePost(event: PostedEvent): Promise<RouteResult | undefined> {
        const { components, botUserId, channelId } = this;
        if (!components || !botUserId) {
            this.logger.warn('Ignoring post received before the bridge started');
            return undefined;
        }

        const { post } = event;
        if (post.userId === botUserId) {
            return undefined;
        }
        const direct = event.channelType === 'D';
        const mentioned = event.mentions.includes(botUserId);
        if (post.channelId !== channelId && !direct && !mentioned) {
            this.logger.debug(`Ignoring post from channel ${post.channelId}`);
            return undefined;
        }

        const message: InboundMessage = {
            channelId: post.channelId,
            rootId: post.rootId || post.id,
            userId: post.userId,
            text: post.message,
        };
        this.logger.info(`Received message from ${post.userId} in ${post.channelId}`);

        try {
            const result = await components.router.route(message);
            this.emit('message:handled', { message, result });
            return result;
        } catch (error) {
            this.logger.error(`Error handling message ${post.id}: ${describeError(error)}`);
            await components.sink.post(message.channelId, `Error processing command: ${describeError(error)}`, message.rootId);
            this.emit('message:error', { message, error });
            return undefined;
        }
    }

    private async resolveChannel(): Promise<string> {
        const { teamName, channelName, channelId } = this.config;
        if (teamName && channelName) {
            try {
                const teams = await this.chat.getTeams();
                const team = teams.find(t => t.name === teamName);
                if (!team) {
                    throw new ChannelResolutionError(`Team '${teamName}' not found`);
                }
                const channel = await this.chat.getChannelByName(team.id, channelName);
                return channel.id;
            } catch (error) {
                this.logger.warn(`Could not resolve channel '${channelName}' in team '${teamName}': ${describeError(error)}`);
            }
        }
        if (!channelId) {
            throw new ChannelResolutionError('No channel could be resolved and no channel id is configured');
        }
        this.logger.info(`Falling back to configured channel id ${channelId}`);
        return channelId;
    }

    private buildComponents(botUserId: string, channelId: string): Components {
        const sink = new ResponseSink(this.chat, {
            defaultChannelId: channelId,
            maxPostLength: this.config.maxPostLength,
            logger: this.logger.child('sink'),
        });
        const context = new ConversationContextBuilder(this.chat, botUserId, this.logger.child('context'));
        const agent = new AgentLoop(
            { llm: this.llm, pool: this.pool, logger: this.logger.child('agent') },
            this.config.agent
        );
        const router = new CommandRouter(
            { pool: this.pool, sink, agent, context, logger: this.logger.child('router') },
            {
                prefix: this.config.commandPrefix,
                ignoredPrefixes: this.config.ignoredPrefixes ?? DEFAULT_IGNORED_PREFIXES,
                processingNotice: this.config.processingNotice,
            }
        );
        return { router, sink };
    }
}
