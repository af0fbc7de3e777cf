import Anthropic from '@anthropic-ai/sdk';
import { parseToolArguments } from '../arguments';
import type { ConversationMessage } from '../types';
import type { ChatRequest, ChatResponse, GenerationDefaults, LLMProvider } from './types';
import { ToolNameMap } from './tool-names';

export interface AnthropicProviderConfig {
    apiKey: string;
    model?: string;
    defaultOptions?: GenerationDefaults;
}

type MessageParam = Anthropic.MessageParam;
type ContentBlockParam = Exclude<MessageParam['content'], string>[number];

export class AnthropicProvider implements LLMProvider {
    readonly name = 'anthropic' as const;
    readonly model: string;
    private client: Anthropic;
    private defaultOptions: Required<GenerationDefaults>;

    constructor(config: AnthropicProviderConfig) {
        this.client = new Anthropic({ apiKey: config.apiKey });
        this.model = config.model || 'claude-3-5-sonnet-20241022';
        this.defaultOptions = {
            temperature: 0.7,
            maxTokens: 1024,
            ...config.defaultOptions
        };
    }

    async chat(request: ChatRequest): Promise<ChatResponse> {
        const names = new ToolNameMap(request.tools.map(t => t.name));
        const tools: Anthropic.Tool[] = request.tools.map(tool => ({
            name: names.encode(tool.name),
            description: tool.description,
            input_schema: { ...tool.parameters, type: 'object' },
        }));

        const system = request.messages
            .filter(m => m.role === 'system')
            .map(m => m.content)
            .join('\n\n');

        const response = await this.client.messages.create({
            model: this.model,
            max_tokens: this.defaultOptions.maxTokens,
            temperature: this.defaultOptions.temperature,
            system: system || undefined,
            messages: toMessageParams(request.messages, names),
            tools: tools.length > 0 ? tools : undefined,
        }, { signal: request.signal });

        const text: string[] = [];
        const toolCalls: ChatResponse['toolCalls'] = [];
        for (const block of response.content) {
            if (block.type === 'text') {
                text.push(block.text);
            } else if (block.type === 'tool_use') {
                toolCalls.push({
                    id: block.id,
                    name: names.decode(block.name),
                    arguments: JSON.stringify(block.input ?? {}),
                });
            }
        }

        return {
            content: text.length > 0 ? text.join('\n') : null,
            toolCalls,
        };
    }
}

/**
 * Anthropic has no `tool` role: results travel as `tool_result` blocks in a
 * user turn, and consecutive blocks of the same role share one message.
 */
export function toMessageParams(messages: ConversationMessage[], names: ToolNameMap): MessageParam[] {
    const params: MessageParam[] = [];

    const append = (role: MessageParam['role'], blocks: ContentBlockParam[]) => {
        if (blocks.length === 0) {
            return;
        }
        const last = params[params.length - 1];
        if (last && last.role === role && Array.isArray(last.content)) {
            last.content.push(...blocks);
        } else {
            params.push({ role, content: blocks });
        }
    };

    for (const message of messages) {
        switch (message.role) {
            case 'system':
                break;
            case 'user':
                append('user', textBlocks(message.content));
                break;
            case 'assistant': {
                const blocks = textBlocks(message.content);
                for (const call of message.toolCalls ?? []) {
                    blocks.push({
                        type: 'tool_use',
                        id: call.id,
                        name: names.encode(call.name),
                        input: parseToolArguments(call.arguments).args,
                    });
                }
                append('assistant', blocks);
                break;
            }
            case 'tool':
                append('user', [{
                    type: 'tool_result',
                    tool_use_id: message.toolCallId ?? '',
                    content: message.content,
                    is_error: message.isError ?? false,
                }]);
                break;
        }
    }
    return params;
}

function textBlocks(content: string): ContentBlockParam[] {
    return content.trim().length > 0 ? [{ type: 'text', text: content }] : [];
}
