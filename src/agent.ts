import { parseToolArguments } from './arguments';
import {
    LLMRequestError,
    ToolNotFoundError,
    describeError,
} from './errors';
import { codeBlock, formatToolResult } from './format';
import type { ChatResponse, LLMProvider } from './llm/types';
import { silentLogger, type Logger } from './logger';
import { withTimeout } from './patterns/timeout';
import type { ServerPool } from './pool';
import type { ToolRegistry } from './registry';
import type { ThreadReplier } from './sink';
import type { ConversationMessage, RegisteredTool, ToolCall, ToolResult } from './types';

export const DEFAULT_SYSTEM_PROMPT =
    'You are an AI assistant integrated with Mattermost and MCP servers. ' +
    'You can call tools from connected MCP servers to help answer questions. ' +
    "Always be helpful, accurate, and concise. If you don't know something, say so.";

export interface AgentLoopOptions {
    systemPrompt: string;
    /** LLM calls allowed for one user message. */
    maxTurns: number;
    /** Tool calls allowed for one user message, across all turns. */
    maxToolCalls: number;
    llmTimeoutMs?: number;
    toolTimeoutMs?: number;
}

export const DEFAULT_AGENT_OPTIONS: AgentLoopOptions = {
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
    maxTurns: 10,
    maxToolCalls: 25,
    llmTimeoutMs: 120_000,
    toolTimeoutMs: 60_000,
};

export interface AgentRunRequest {
    prompt: string;
    /** Raw text of the inbound post when it differs from `prompt`, e.g. a stripped command prefix. */
    postText?: string;
    history: ConversationMessage[];
    registry: ToolRegistry;
    reply: ThreadReplier;
}

interface RunStats {
    turns: number;
    toolCalls: number;
    messages: ConversationMessage[];
}

export type AgentOutcome =
    | ({ status: 'completed'; answer: string } & RunStats)
    | ({ status: 'max_turns_exceeded' } & RunStats)
    | ({ status: 'tool_budget_exceeded' } & RunStats)
    | ({ status: 'llm_error'; error: LLMRequestError } & RunStats);

export interface AgentLoopDeps {
    llm: LLMProvider;
    pool: ServerPool;
    logger?: Logger;
}

/**
 * Drives the LLM through rounds of tool calls until it answers without
 * requesting any. Tool calls of one turn run one after another, in the order
 * the model listed them.
 */
export class AgentLoop {
    private readonly llm: LLMProvider;
    private readonly pool: ServerPool;
    private readonly logger: Logger;
    private readonly options: AgentLoopOptions;

    constructor(deps: AgentLoopDeps, options: Partial<AgentLoopOptions> = {}) {
        this.llm = deps.llm;
        this.pool = deps.pool;
        this.logger = deps.logger ?? silentLogger;
        this.options = { ...DEFAULT_AGENT_OPTIONS };
        for (const [key, value] of Object.entries(options)) {
            if (value !== undefined) {
                Object.assign(this.options, { [key]: value });
            }
        }
    }

    async run(request: AgentRunRequest): Promise<AgentOutcome> {
        const { registry, reply } = request;
        const tools = registry.toLLMTools();
        const messages = buildMessages(this.options.systemPrompt, request.history, request.prompt, request.postText);
        const stats: RunStats = { turns: 0, toolCalls: 0, messages };

        while (stats.turns < this.options.maxTurns) {
            stats.turns++;

            let response: ChatResponse;
            try {
                response = await withTimeout(
                    signal => this.llm.chat({ messages, tools, signal }),
                    { timeoutMs: this.options.llmTimeoutMs, operation: 'LLM request' }
                );
            } catch (error) {
                const llmError = new LLMRequestError(this.llm.name, error);
                this.logger.error(llmError.message);
                await reply.post(`Error processing your request: ${describeError(error)}`);
                return { status: 'llm_error', error: llmError, ...stats };
            }

            const content = response.content ?? '';
            if (response.toolCalls.length === 0) {
                const answer = content.trim().length > 0 ? content : 'No response generated';
                messages.push({ role: 'assistant', content: answer });
                await reply.post(answer);
                return { status: 'completed', answer, ...stats };
            }

            messages.push({ role: 'assistant', content, toolCalls: response.toolCalls });
            if (content.trim().length > 0) {
                await reply.post(content);
            }

            for (const call of response.toolCalls) {
                if (stats.toolCalls >= this.options.maxToolCalls) {
                    this.logger.warn(`Tool call budget of ${this.options.maxToolCalls} exhausted`);
                    await reply.post(`⚠️ Stopped after ${stats.toolCalls} tool calls without a final answer.`);
                    return { status: 'tool_budget_exceeded', ...stats };
                }
                stats.toolCalls++;
                const result = await this.executeToolCall(call, registry, reply);
                messages.push({
                    role: 'tool',
                    toolCallId: result.toolCallId,
                    name: result.toolName,
                    content: result.content,
                    isError: result.isError,
                });
            }

            await reply.post('🧠 Processing tool results...');
        }

        this.logger.warn(`Agent loop reached ${this.options.maxTurns} turns without a final answer`);
        await reply.post(`⚠️ Stopped after ${this.options.maxTurns} turns without a final answer.`);
        return { status: 'max_turns_exceeded', ...stats };
    }

    private async executeToolCall(call: ToolCall, registry: ToolRegistry, reply: ThreadReplier): Promise<ToolResult> {
        const failed = (content: string): ToolResult => ({
            toolCallId: call.id,
            toolName: call.name,
            content,
            isError: true,
        });

        let tool: RegisteredTool;
        try {
            tool = registry.resolve(call.name);
        } catch (error) {
            if (!(error instanceof ToolNotFoundError)) {
                throw error;
            }
            await reply.post(`⚠️ ${error.message}`);
            return failed(error.message);
        }

        const { args, error: parseError } = parseToolArguments(call.arguments);
        if (parseError) {
            this.logger.warn(`${parseError.message}; passing it as free text`);
        }

        this.logger.info(`Calling tool '${tool.name}' on server '${tool.serverName}'`, args);
        await reply.post(`🔧 Executing tool: \`${tool.name}\` on server \`${tool.serverName}\`...`);

        try {
            const result = await withTimeout(
                signal => this.pool.invoke(tool.serverName, tool.name, args, { signal }),
                { timeoutMs: this.options.toolTimeoutMs, operation: `Tool ${tool.qualifiedName}` }
            );
            const text = formatToolResult(result);
            if (result.isError) {
                await reply.post(`⚠️ Tool \`${tool.name}\` returned an error:\n${codeBlock(text)}`);
                return failed(text);
            }
            await reply.post(`📊 Tool \`${tool.name}\` result:\n${codeBlock(text)}`);
            return { toolCallId: call.id, toolName: call.name, content: text, isError: false };
        } catch (error) {
            const message = `Error executing tool '${call.name}': ${describeError(error)}`;
            this.logger.error(message);
            await reply.post(`⚠️ ${message}`);
            return failed(message);
        }
    }
}

/**
 * System prompt, thread history, then the new user message unless the
 * history already ends with it (the inbound post is part of its own thread,
 * as typed, so `postText` counts as a match too).
 */
export function buildMessages(
    systemPrompt: string,
    history: ConversationMessage[],
    prompt: string,
    postText?: string
): ConversationMessage[] {
    const messages: ConversationMessage[] = [{ role: 'system', content: systemPrompt }, ...history];
    const last = history[history.length - 1];
    const seen = [prompt, postText ?? prompt].map(text => text.trim());
    if (!last || last.role !== 'user' || !seen.includes(last.content.trim())) {
        messages.push({ role: 'user', content: prompt });
    }
    return messages;
}
