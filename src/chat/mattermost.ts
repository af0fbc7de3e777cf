import WebSocket from 'ws';
import { z } from 'zod';
import { ChatRequestError, describeError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type {
    ChatBackend,
    ChatChannel,
    ChatPost,
    ChatTeam,
    ChatThread,
    ChatUser,
    PostedEvent,
    PostHandler,
} from './types';

const PostSchema = z.object({
    id: z.string(),
    channel_id: z.string(),
    user_id: z.string(),
    message: z.string().default(''),
    create_at: z.number(),
    root_id: z.string().default(''),
    type: z.string().default(''),
});

const ThreadSchema = z.object({
    order: z.array(z.string()).default([]),
    posts: z.record(PostSchema).default({}),
});

const UserSchema = z.object({
    id: z.string(),
    username: z.string(),
});

const TeamSchema = z.object({
    id: z.string(),
    name: z.string(),
    display_name: z.string().default(''),
});

const ChannelSchema = z.object({
    id: z.string(),
    team_id: z.string().default(''),
    name: z.string(),
});

const WebSocketEventSchema = z.object({
    event: z.string(),
    data: z.record(z.unknown()).default({}),
});

const PostedDataSchema = z.object({
    post: z.string(),
    channel_type: z.string().default(''),
    mentions: z.string().optional(),
});

const MentionsSchema = z.array(z.string());

type WirePost = z.infer<typeof PostSchema>;

function toChatPost(post: WirePost): ChatPost {
    return {
        id: post.id,
        channelId: post.channel_id,
        userId: post.user_id,
        message: post.message,
        createAt: post.create_at,
        rootId: post.root_id,
        type: post.type,
    };
}

function rawDataToString(data: WebSocket.RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data).toString('utf8');
    }
    return data.toString('utf8');
}

const tryParseJson = (value: string): unknown => {
    try {
        return JSON.parse(value);
    } catch {
        return undefined;
    }
};

export interface MattermostClientConfig {
    /** Host name, optionally with an http(s):// prefix. */
    url: string;
    scheme: 'http' | 'https';
    port: number;
    token: string;
    reconnectDelayMs?: number;
    maxReconnectAttempts?: number;
    logger?: Logger;
}

/**
 * Mattermost REST v4 client plus the websocket event stream.
 */
export class MattermostClient implements ChatBackend {
    readonly apiUrl: string;
    readonly websocketUrl: string;
    private readonly token: string;
    private readonly reconnectDelayMs: number;
    private readonly maxReconnectAttempts: number;
    private readonly logger: Logger;
    private handlers: PostHandler[] = [];
    private socket?: WebSocket;
    private closing = false;
    private reconnectAttempts = 0;
    private reconnectTimer?: NodeJS.Timeout;
    private seq = 1;

    constructor(config: MattermostClientConfig) {
        const host = config.url.replace(/^https?:\/\//, '').replace(/\/+$/, '');
        const wsScheme = config.scheme === 'https' ? 'wss' : 'ws';
        this.apiUrl = `${config.scheme}://${host}:${config.port}/api/v4`;
        this.websocketUrl = `${wsScheme}://${host}:${config.port}/api/v4/websocket`;
        this.token = config.token;
        this.reconnectDelayMs = config.reconnectDelayMs ?? 5000;
        this.maxReconnectAttempts = config.maxReconnectAttempts ?? 10;
        this.logger = config.logger ?? silentLogger;
    }

    async getMe(): Promise<ChatUser> {
        return this.request('GET', '/users/me', UserSchema);
    }

    async postMessage(channelId: string, message: string, rootId?: string): Promise<ChatPost> {
        const post = await this.request('POST', '/posts', PostSchema, {
            channel_id: channelId,
            message,
            root_id: rootId ?? '',
        });
        return toChatPost(post);
    }

    async getThread(rootId: string): Promise<ChatThread> {
        const thread = await this.request('GET', `/posts/${encodeURIComponent(rootId)}/thread`, ThreadSchema);
        const posts: Record<string, ChatPost> = {};
        for (const [id, post] of Object.entries(thread.posts)) {
            posts[id] = toChatPost(post);
        }
        return { order: thread.order, posts };
    }

    async getTeams(): Promise<ChatTeam[]> {
        const teams = await this.request('GET', '/users/me/teams', z.array(TeamSchema));
        return teams.map(team => ({ id: team.id, name: team.name, displayName: team.display_name }));
    }

    async getChannelByName(teamId: string, name: string): Promise<ChatChannel> {
        const channel = await this.request(
            'GET',
            `/teams/${encodeURIComponent(teamId)}/channels/name/${encodeURIComponent(name)}`,
            ChannelSchema
        );
        return { id: channel.id, teamId: channel.team_id, name: channel.name };
    }

    onPost(handler: PostHandler): void {
        this.handlers.push(handler);
    }

    async connect(): Promise<void> {
        this.closing = false;
        this.reconnectAttempts = 0;
        await this.openSocket();
    }

    async close(): Promise<void> {
        this.closing = true;
        clearTimeout(this.reconnectTimer);
        const socket = this.socket;
        this.socket = undefined;
        if (!socket || socket.readyState === WebSocket.CLOSED) {
            return;
        }
        await new Promise<void>((resolve) => {
            const timer = setTimeout(() => {
                socket.terminate();
                resolve();
            }, 2000);
            socket.once('close', () => {
                clearTimeout(timer);
                resolve();
            });
            socket.close();
        });
    }

    private async request<T>(
        method: 'GET' | 'POST',
        path: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        body?: unknown
    ): Promise<T> {
        const response = await fetch(`${this.apiUrl}${path}`, {
            method,
            headers: {
                'Authorization': `Bearer ${this.token}`,
                'Content-Type': 'application/json',
                'X-Requested-With': 'XMLHttpRequest',
            },
            body: body === undefined ? undefined : JSON.stringify(body),
        });
        const text = await response.text();
        if (!response.ok) {
            throw new ChatRequestError(method, path, response.status, text);
        }
        return schema.parse(text ? JSON.parse(text) : {});
    }

    private openSocket(): Promise<void> {
        const socket = new WebSocket(this.websocketUrl);
        this.socket = socket;

        socket.on('message', (data: WebSocket.RawData) => this.handleSocketMessage(data));
        socket.on('close', () => this.handleSocketClose(socket));
        socket.on('error', (error: Error) => this.logger.error(`WebSocket error: ${error.message}`));

        return new Promise((resolve, reject) => {
            const onOpen = () => {
                socket.removeListener('error', onError);
                this.reconnectAttempts = 0;
                socket.send(JSON.stringify({
                    seq: this.seq++,
                    action: 'authentication_challenge',
                    data: { token: this.token },
                }));
                this.logger.info(`WebSocket connected to ${this.websocketUrl}`);
                resolve();
            };
            const onError = (error: Error) => {
                socket.removeListener('open', onOpen);
                reject(new Error(`Failed to connect to WebSocket ${this.websocketUrl}: ${error.message}`));
            };
            socket.once('open', onOpen);
            socket.once('error', onError);
        });
    }

    private handleSocketMessage(data: WebSocket.RawData) {
        const event = WebSocketEventSchema.safeParse(tryParseJson(rawDataToString(data)));
        if (!event.success || event.data.event !== 'posted') {
            return;
        }
        const posted = PostedDataSchema.safeParse(event.data.data);
        const post = posted.success ? PostSchema.safeParse(tryParseJson(posted.data.post)) : undefined;
        if (!posted.success || !post?.success) {
            this.logger.warn('Ignoring malformed posted event');
            return;
        }
        const mentions = MentionsSchema.safeParse(tryParseJson(posted.data.mentions ?? '[]'));
        this.dispatch({
            post: toChatPost(post.data),
            channelType: posted.data.channel_type,
            mentions: mentions.success ? mentions.data : [],
        });
    }

    private dispatch(event: PostedEvent) {
        for (const handler of this.handlers) {
            let result: void | Promise<void>;
            try {
                result = handler(event);
            } catch (error) {
                this.logger.error(`Post handler failed: ${describeError(error)}`);
                continue;
            }
            void Promise.resolve(result).catch((error: unknown) => {
                this.logger.error(`Post handler failed: ${describeError(error)}`);
            });
        }
    }

    private handleSocketClose(socket: WebSocket) {
        if (socket !== this.socket) {
            return;
        }
        this.socket = undefined;
        if (this.closing) {
            return;
        }
        if (this.reconnectAttempts >= this.maxReconnectAttempts) {
            this.logger.error(`WebSocket closed; giving up after ${this.reconnectAttempts} reconnect attempts`);
            return;
        }
        this.reconnectAttempts++;
        this.logger.warn(`WebSocket closed; reconnecting in ${this.reconnectDelayMs}ms (attempt ${this.reconnectAttempts})`);
        this.reconnectTimer = setTimeout(() => {
            this.openSocket().catch((error: unknown) => {
                this.logger.error(`WebSocket reconnect failed: ${describeError(error)}`);
            });
        }, this.reconnectDelayMs);
    }
}
