export class MCPError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MCPError';
    }
}

export class MCPConnectionError extends MCPError {
    constructor(public serverName: string, message: string) {
        super(`Connection error for server ${serverName}: ${message}`);
        this.name = 'MCPConnectionError';
    }
}

export interface ServerFailure {
    serverName: string;
    error: Error;
}

/**
 * Raised by the pool when not a single configured server could be connected.
 */
export class PoolInitializationError extends MCPError {
    constructor(public failures: ServerFailure[]) {
        super(
            failures.length === 0
                ? 'No MCP servers configured'
                : `No MCP servers could be connected (${failures.map(f => f.serverName).join(', ')})`
        );
        this.name = 'PoolInitializationError';
    }
}

export class ServerNotFoundError extends MCPError {
    constructor(public serverName: string) {
        super(`Server '${serverName}' not found or not connected.`);
        this.name = 'ServerNotFoundError';
    }
}

export class ToolNotFoundError extends MCPError {
    constructor(public toolName: string) {
        super(`Tool '${toolName}' not found in any MCP server.`);
        this.name = 'ToolNotFoundError';
    }
}

export class MCPToolCallError extends MCPError {
    constructor(
        public toolName: string,
        public serverName: string,
        public cause: unknown
    ) {
        super(`Tool call failed: ${serverName}.${toolName}: ${describeError(cause)}`);
        this.name = 'MCPToolCallError';
    }
}

export class ArgumentParseError extends MCPError {
    constructor(public rawArguments: string, public cause: unknown) {
        super(`Failed to parse tool arguments: ${rawArguments}`);
        this.name = 'ArgumentParseError';
    }
}

export class LLMRequestError extends MCPError {
    constructor(public provider: string, public cause: unknown) {
        super(`LLM request to ${provider} failed: ${describeError(cause)}`);
        this.name = 'LLMRequestError';
    }
}

export class ChannelResolutionError extends MCPError {
    constructor(message: string) {
        super(message);
        this.name = 'ChannelResolutionError';
    }
}

export class OperationTimeoutError extends MCPError {
    constructor(public operation: string, public timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'OperationTimeoutError';
    }
}

export class ChatRequestError extends MCPError {
    constructor(
        public method: string,
        public path: string,
        public status: number,
        public body: string
    ) {
        super(`Chat backend request ${method} ${path} failed with status ${status}${body ? `: ${body}` : ''}`);
        this.name = 'ChatRequestError';
    }
}

export class ConfigError extends MCPError {
    constructor(message: string, public issues: string[] = []) {
        super(issues.length > 0 ? `${message}:\n${issues.map(i => `  - ${i}`).join('\n')}` : message);
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
