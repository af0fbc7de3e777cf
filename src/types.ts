import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export interface RegisteredTool extends Tool {
    serverName: string;
    qualifiedName: string;
}

export interface StdioServerConfig {
    type: 'stdio';
    command: string;
    args: string[];
    env?: Record<string, string>;
}

export interface HttpServerConfig {
    type: 'http';
    url: string;
    headers?: Record<string, string>;
}

export type ServerConfig = StdioServerConfig | HttpServerConfig;

export type ConnectionState = 'disconnected' | 'connected' | 'failed';

export interface ServerStatus {
    name: string;
    state: ConnectionState;
    error?: string;
}

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
    id: string;
    /** Qualified (`server.tool`) or short tool name, as the LLM wrote it. */
    name: string;
    /** Raw JSON argument string. */
    arguments: string;
}

export interface ConversationMessage {
    role: MessageRole;
    content: string;
    toolCallId?: string;
    name?: string;
    isError?: boolean;
    toolCalls?: ToolCall[];
}

export interface ToolResult {
    toolCallId: string;
    toolName: string;
    content: string;
    isError: boolean;
}

export interface InboundMessage {
    channelId: string;
    /** Thread root every reply is posted under. */
    rootId: string;
    userId: string;
    text: string;
}
