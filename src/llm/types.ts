import type { ConversationMessage, ToolCall } from '../types';

export interface LLMToolDefinition {
    name: string;
    description: string;
    /** JSON schema of the tool input. */
    parameters: Record<string, unknown>;
}

export interface ChatRequest {
    messages: ConversationMessage[];
    tools: LLMToolDefinition[];
    signal?: AbortSignal;
}

export interface ChatResponse {
    content: string | null;
    toolCalls: ToolCall[];
}

export type ProviderName = 'openai' | 'azure' | 'anthropic' | 'gemini';

/**
 * Normalized chat-completion contract every provider adapter implements.
 */
export interface LLMProvider {
    readonly name: ProviderName;
    readonly model: string;
    chat(request: ChatRequest): Promise<ChatResponse>;
}

export interface GenerationDefaults {
    temperature?: number;
    maxTokens?: number;
}
