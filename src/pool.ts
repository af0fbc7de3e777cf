import { EventEmitter } from 'events';
import type { CallToolResult, Prompt, Resource, Tool } from '@modelcontextprotocol/sdk/types.js';
import { MCPServerConnection, type CallOptions, type ToolServerConnection } from './connection';
import {
    MCPToolCallError,
    PoolInitializationError,
    ServerNotFoundError,
    describeError,
    type ServerFailure,
} from './errors';
import { silentLogger, type Logger } from './logger';
import type { ServerConfig, ServerStatus } from './types';

export interface Tagged<T> {
    serverName: string;
    item: T;
}

/**
 * Result of a fan-out over every connected server. A server that failed
 * during listing contributes nothing to `items` and one entry to `failures`.
 */
export interface FanOutResult<T> {
    items: Tagged<T>[];
    failures: ServerFailure[];
}

export type ConnectionFactory = (name: string, config: ServerConfig, logger: Logger) => ToolServerConnection;

export const defaultConnectionFactory: ConnectionFactory = (name, config, logger) =>
    new MCPServerConnection(name, config, { logger });

export interface ServerPoolOptions {
    createConnection?: ConnectionFactory;
    logger?: Logger;
}

export class ServerPool extends EventEmitter {
    // Configuration order; shutdown walks it backwards.
    private connections: ToolServerConnection[] = [];
    private readonly createConnection: ConnectionFactory;
    private readonly logger: Logger;

    constructor(private readonly servers: Record<string, ServerConfig>, options: ServerPoolOptions = {}) {
        super();
        this.createConnection = options.createConnection ?? defaultConnectionFactory;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Connects every configured server. Individual failures are logged and
     * recorded; only a pool with no connected server is an error.
     */
    async connectAll(): Promise<ServerStatus[]> {
        const entries = Object.entries(this.servers);
        this.logger.info(`Found ${entries.length} MCP servers in config`);

        this.connections = entries.map(([name, config]) =>
            this.createConnection(name, config, this.logger.child(name))
        );

        const failures: ServerFailure[] = [];
        await Promise.all(this.connections.map(async (connection) => {
            try {
                await connection.connect();
                this.logger.info(`Connected to MCP server '${connection.name}'`);
                this.emit('server:connected', { serverName: connection.name });
            } catch (error) {
                const failure = error instanceof Error ? error : new Error(String(error));
                failures.push({ serverName: connection.name, error: failure });
                this.logger.error(`Failed to connect to MCP server '${connection.name}': ${failure.message}`);
                this.emit('server:error', { serverName: connection.name, error: failure });
            }
        }));

        if (this.connected().length === 0) {
            throw new PoolInitializationError(failures);
        }
        return this.status();
    }

    serverNames(): string[] {
        return this.connected().map(c => c.name);
    }

    has(serverName: string): boolean {
        return this.get(serverName) !== undefined;
    }

    get(serverName: string): ToolServerConnection | undefined {
        return this.connected().find(c => c.name === serverName);
    }

    status(): ServerStatus[] {
        return this.connections.map(c => ({
            name: c.name,
            state: c.state,
            ...(c.lastError ? { error: c.lastError.message } : {}),
        }));
    }

    listTools(): Promise<FanOutResult<Tool>> {
        return this.fanOut('tools', c => c.listTools());
    }

    listResources(): Promise<FanOutResult<Resource>> {
        return this.fanOut('resources', c => c.listResources());
    }

    listPrompts(): Promise<FanOutResult<Prompt>> {
        return this.fanOut('prompts', c => c.listPrompts());
    }

    async invoke(
        serverName: string,
        toolName: string,
        args: Record<string, unknown>,
        options: CallOptions = {}
    ): Promise<CallToolResult> {
        const connection = this.get(serverName);
        if (!connection) {
            throw new ServerNotFoundError(serverName);
        }
        try {
            return await connection.callTool(toolName, args, options);
        } catch (error) {
            throw new MCPToolCallError(toolName, serverName, error);
        }
    }

    /**
     * Disconnects in reverse connection order. A failing close is logged and
     * the remaining connections are still closed.
     */
    async shutdown(): Promise<void> {
        for (const connection of [...this.connections].reverse()) {
            if (connection.state !== 'connected') {
                continue;
            }
            try {
                await connection.close();
                this.emit('server:disconnected', { serverName: connection.name, reason: 'Shutdown' });
            } catch (error) {
                this.logger.error(`Error disconnecting ${connection.name}: ${describeError(error)}`);
            }
        }
        this.connections = [];
    }

    private connected(): ToolServerConnection[] {
        return this.connections.filter(c => c.state === 'connected');
    }

    private async fanOut<T>(
        kind: string,
        list: (connection: ToolServerConnection) => Promise<T[]>
    ): Promise<FanOutResult<T>> {
        const connections = this.connected();
        const settled = await Promise.allSettled(connections.map(c => list(c)));

        const result: FanOutResult<T> = { items: [], failures: [] };
        settled.forEach((outcome, index) => {
            const serverName = connections[index].name;
            if (outcome.status === 'fulfilled') {
                result.items.push(...outcome.value.map(item => ({ serverName, item })));
            } else {
                const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
                this.logger.error(`Error getting ${kind} from ${serverName}: ${error.message}`);
                result.failures.push({ serverName, error });
            }
        });
        return result;
    }
}
