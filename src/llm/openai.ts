import { OpenAI } from 'openai';
import type { ConversationMessage } from '../types';
import type { ChatRequest, ChatResponse, GenerationDefaults, LLMProvider, ProviderName } from './types';
import { ToolNameMap } from './tool-names';

export interface OpenAIProviderConfig {
    apiKey: string;
    baseURL?: string;
    model?: string;
    organization?: string;
    project?: string;
    defaultOptions?: GenerationDefaults;
}

export interface OpenAIProviderOptions {
    /** Prebuilt client, e.g. an AzureOpenAI instance. */
    client?: OpenAI;
    name?: ProviderName;
}

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;

/**
 * Chat completions with function calling. Also serves Azure deployments and
 * Gemini's OpenAI-compatible endpoint, which share the request shape.
 */
export class OpenAIProvider implements LLMProvider {
    readonly name: ProviderName;
    readonly model: string;
    private client: OpenAI;
    private defaultOptions: Required<GenerationDefaults>;

    constructor(config: OpenAIProviderConfig, options: OpenAIProviderOptions = {}) {
        this.name = options.name ?? 'openai';
        this.client = options.client ?? new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL || process.env.OPENAI_BASE_URL,
            organization: config.organization,
            project: config.project,
        });
        this.model = config.model || 'gpt-4o';
        this.defaultOptions = {
            temperature: 0.7,
            maxTokens: 1000,
            ...config.defaultOptions
        };
    }

    async chat(request: ChatRequest): Promise<ChatResponse> {
        const names = new ToolNameMap(request.tools.map(t => t.name));
        const tools: OpenAI.Chat.ChatCompletionTool[] = request.tools.map(tool => ({
            type: 'function',
            function: {
                name: names.encode(tool.name),
                description: tool.description,
                parameters: tool.parameters,
            },
        }));

        const completion = await this.client.chat.completions.create({
            model: this.model,
            messages: request.messages.map(message => toMessageParam(message, names)),
            tools: tools.length > 0 ? tools : undefined,
            tool_choice: tools.length > 0 ? 'auto' : undefined,
            temperature: this.defaultOptions.temperature,
            max_tokens: this.defaultOptions.maxTokens,
        }, { signal: request.signal });

        const message = completion.choices[0]?.message;
        if (!message) {
            return { content: null, toolCalls: [] };
        }
        return {
            content: message.content,
            toolCalls: (message.tool_calls ?? []).map(call => ({
                id: call.id,
                name: names.decode(call.function.name),
                arguments: call.function.arguments,
            })),
        };
    }
}

function toMessageParam(message: ConversationMessage, names: ToolNameMap): MessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
        case 'tool':
            return { role: 'tool', tool_call_id: message.toolCallId ?? '', content: message.content };
        case 'assistant': {
            const param: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
                role: 'assistant',
                content: message.content || null,
            };
            if (message.toolCalls && message.toolCalls.length > 0) {
                param.tool_calls = message.toolCalls.map((call): OpenAI.Chat.ChatCompletionMessageToolCall => ({
                    id: call.id,
                    type: 'function',
                    function: { name: names.encode(call.name), arguments: call.arguments || '{}' },
                }));
            }
            return param;
        }
    }
}
