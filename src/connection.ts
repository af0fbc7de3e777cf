import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    CallToolResultSchema,
    type CallToolResult,
    type Prompt,
    type Resource,
    type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { MCPConnectionError, describeError } from './errors';
import type { ConnectionState, ServerConfig } from './types';
import { silentLogger, type Logger } from './logger';

export const CLIENT_INFO = {
    name: 'mcp-chat-bridge',
    version: '0.1.0',
} as const;

export interface CallOptions {
    signal?: AbortSignal;
}

/**
 * One live session to a single tool server.
 */
export interface ToolServerConnection {
    readonly name: string;
    readonly state: ConnectionState;
    readonly lastError?: Error;
    connect(): Promise<void>;
    listTools(): Promise<Tool[]>;
    callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<CallToolResult>;
    listResources(): Promise<Resource[]>;
    listPrompts(): Promise<Prompt[]>;
    close(): Promise<void>;
}

export type TransportFactory = (name: string, config: ServerConfig) => Transport;

export const createTransport: TransportFactory = (name, config) => {
    switch (config.type) {
        case 'stdio':
            return new StdioClientTransport({
                command: config.command,
                args: config.args,
                env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
            });
        case 'http': {
            const requestInit: RequestInit = {};
            if (config.headers) {
                requestInit.headers = { ...config.headers };
            }
            return new StreamableHTTPClientTransport(new URL('/mcp', config.url), { requestInit });
        }
        default: {
            const unreachable: never = config;
            throw new Error(`Invalid server config for ${name}: ${JSON.stringify(unreachable)}`);
        }
    }
};

// Servers speaking an older protocol revision answer tools/call with `toolResult`.
const LegacyToolResultSchema = z.object({ toolResult: z.unknown() });

export function normalizeToolResult(raw: unknown): CallToolResult {
    const legacy = LegacyToolResultSchema.safeParse(raw);
    if (legacy.success && legacy.data.toolResult !== undefined) {
        return {
            content: [{ type: 'text', text: JSON.stringify(legacy.data.toolResult) }],
        };
    }
    return CallToolResultSchema.parse(raw);
}

export interface MCPServerConnectionOptions {
    createTransport?: TransportFactory;
    logger?: Logger;
}

export class MCPServerConnection implements ToolServerConnection {
    private client?: Client;
    private _state: ConnectionState = 'disconnected';
    private _lastError?: Error;
    private readonly makeTransport: TransportFactory;
    private readonly logger: Logger;

    constructor(
        public readonly name: string,
        public readonly config: ServerConfig,
        options: MCPServerConnectionOptions = {}
    ) {
        this.makeTransport = options.createTransport ?? createTransport;
        this.logger = options.logger ?? silentLogger;
    }

    get state(): ConnectionState {
        return this._state;
    }

    get lastError(): Error | undefined {
        return this._lastError;
    }

    async connect(): Promise<void> {
        if (this._state === 'connected') {
            return;
        }
        try {
            if (this.config.type === 'stdio') {
                this.logger.info(`Launching ${this.name}: ${this.config.command} ${this.config.args.join(' ')}`);
            } else {
                this.logger.info(`Connecting to ${this.name} at ${this.config.url}`);
            }
            const transport = this.makeTransport(this.name, this.config);
            const client = new Client({ ...CLIENT_INFO }, { capabilities: {} });
            await client.connect(transport);
            this.client = client;
            this._state = 'connected';
            this._lastError = undefined;
        } catch (error) {
            const connectionError = new MCPConnectionError(this.name, describeError(error));
            this._state = 'failed';
            this._lastError = connectionError;
            throw connectionError;
        }
    }

    async listTools(): Promise<Tool[]> {
        const client = this.requireClient();
        const tools: Tool[] = [];
        let cursor: string | undefined;
        do {
            const page = await client.listTools(cursor ? { cursor } : undefined);
            tools.push(...page.tools);
            cursor = page.nextCursor;
        } while (cursor);
        this.logger.debug(`Found ${tools.length} tools on ${this.name}`);
        return tools;
    }

    async callTool(name: string, args: Record<string, unknown>, options: CallOptions = {}): Promise<CallToolResult> {
        const client = this.requireClient();
        this.logger.info(`Calling tool ${name} on ${this.name}`, args);
        const raw = await client.callTool(
            { name, arguments: args },
            CallToolResultSchema,
            { signal: options.signal }
        );
        return normalizeToolResult(raw);
    }

    async listResources(): Promise<Resource[]> {
        const client = this.requireClient();
        if (!client.getServerCapabilities()?.resources) {
            return [];
        }
        const resources: Resource[] = [];
        let cursor: string | undefined;
        do {
            const page = await client.listResources(cursor ? { cursor } : undefined);
            resources.push(...page.resources);
            cursor = page.nextCursor;
        } while (cursor);
        return resources;
    }

    async listPrompts(): Promise<Prompt[]> {
        const client = this.requireClient();
        if (!client.getServerCapabilities()?.prompts) {
            return [];
        }
        const prompts: Prompt[] = [];
        let cursor: string | undefined;
        do {
            const page = await client.listPrompts(cursor ? { cursor } : undefined);
            prompts.push(...page.prompts);
            cursor = page.nextCursor;
        } while (cursor);
        return prompts;
    }

    async close(): Promise<void> {
        const client = this.client;
        this.client = undefined;
        this._state = 'disconnected';
        if (client) {
            await client.close();
        }
    }

    private requireClient(): Client {
        if (!this.client || this._state !== 'connected') {
            throw new MCPConnectionError(this.name, 'Client not connected');
        }
        return this.client;
    }
}
