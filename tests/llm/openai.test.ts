import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIProvider } from '../../src/llm/openai';
import { createProvider, GEMINI_OPENAI_BASE_URL } from '../../src/llm/index';
import { OpenAI } from 'openai';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

// Mock OpenAI client
vi.mock('openai', () => {
    return {
        OpenAI: vi.fn().mockImplementation(() => ({
            chat: {
                completions: {
                    create
                }
            }
        })),
        AzureOpenAI: vi.fn().mockImplementation(() => ({
            chat: {
                completions: {
                    create
                }
            }
        }))
    };
});

describe('OpenAIProvider Configuration', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        vi.clearAllMocks();
        process.env = { ...originalEnv };
        delete process.env.OPENAI_BASE_URL;
    });

    afterEach(() => {
        process.env = originalEnv;
    });

    it('should use default baseURL when not specified', () => {
        new OpenAIProvider({ apiKey: 'test-key' });
        expect(OpenAI).toHaveBeenCalledWith(expect.objectContaining({
            apiKey: 'test-key',
            baseURL: undefined
        }));
    });

    it('should use baseURL from config when provided', () => {
        new OpenAIProvider({
            apiKey: 'test-key',
            baseURL: 'https://api.custom.com/v1'
        });
        expect(OpenAI).toHaveBeenCalledWith(expect.objectContaining({
            apiKey: 'test-key',
            baseURL: 'https://api.custom.com/v1'
        }));
    });

    it('should use OPENAI_BASE_URL env var when config is missing', () => {
        process.env.OPENAI_BASE_URL = 'https://api.env.com/v1';
        new OpenAIProvider({ apiKey: 'test-key' });
        expect(OpenAI).toHaveBeenCalledWith(expect.objectContaining({
            apiKey: 'test-key',
            baseURL: 'https://api.env.com/v1'
        }));
    });

    it('should prioritize config baseURL over env var', () => {
        process.env.OPENAI_BASE_URL = 'https://api.env.com/v1';
        new OpenAIProvider({
            apiKey: 'test-key',
            baseURL: 'https://api.config.com/v1'
        });
        expect(OpenAI).toHaveBeenCalledWith(expect.objectContaining({
            apiKey: 'test-key',
            baseURL: 'https://api.config.com/v1'
        }));
    });

    it('should point gemini at its OpenAI-compatible endpoint', () => {
        const provider = createProvider({ provider: 'gemini', apiKey: 'test-key' });
        expect(provider.name).toBe('gemini');
        expect(provider.model).toBe('gemini-1.5-pro');
        expect(OpenAI).toHaveBeenCalledWith(expect.objectContaining({
            apiKey: 'test-key',
            baseURL: GEMINI_OPENAI_BASE_URL
        }));
    });

    it('should use the deployment as the azure model', () => {
        const provider = createProvider({
            provider: 'azure',
            apiKey: 'test-key',
            endpoint: 'https://example.openai.azure.com',
            apiVersion: '2024-10-21',
            deployment: 'gpt-4o-prod'
        });
        expect(provider.name).toBe('azure');
        expect(provider.model).toBe('gpt-4o-prod');
    });
});

describe('OpenAIProvider chat', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should send encoded tool names and decode tool calls', async () => {
        create.mockResolvedValue({
            choices: [{
                message: {
                    content: null,
                    tool_calls: [{
                        id: 'call_1',
                        type: 'function',
                        function: { name: 'weather__get_weather', arguments: '{"city":"Paris"}' }
                    }]
                }
            }]
        });
        const provider = new OpenAIProvider({ apiKey: 'test-key' });

        const response = await provider.chat({
            messages: [
                { role: 'system', content: 'be brief' },
                { role: 'user', content: 'weather in Paris?' }
            ],
            tools: [{ name: 'weather.get_weather', description: 'Current weather', parameters: { type: 'object' } }]
        });

        expect(response).toEqual({
            content: null,
            toolCalls: [{ id: 'call_1', name: 'weather.get_weather', arguments: '{"city":"Paris"}' }]
        });
        const [body] = create.mock.calls[0];
        expect(body.model).toBe('gpt-4o');
        expect(body.tool_choice).toBe('auto');
        expect(body.tools).toEqual([{
            type: 'function',
            function: { name: 'weather__get_weather', description: 'Current weather', parameters: { type: 'object' } }
        }]);
        expect(body.messages).toEqual([
            { role: 'system', content: 'be brief' },
            { role: 'user', content: 'weather in Paris?' }
        ]);
    });

    it('should pair assistant tool calls with tool messages', async () => {
        create.mockResolvedValue({ choices: [{ message: { content: 'Sunny', tool_calls: undefined } }] });
        const provider = new OpenAIProvider({ apiKey: 'test-key' });

        const response = await provider.chat({
            messages: [
                { role: 'user', content: 'weather?' },
                {
                    role: 'assistant',
                    content: '',
                    toolCalls: [{ id: 'call_1', name: 'weather.get_weather', arguments: '' }]
                },
                { role: 'tool', toolCallId: 'call_1', name: 'weather.get_weather', content: 'Sunny, 21°C' }
            ],
            tools: []
        });

        expect(response).toEqual({ content: 'Sunny', toolCalls: [] });
        const [body] = create.mock.calls[0];
        expect(body.tools).toBeUndefined();
        expect(body.messages).toEqual([
            { role: 'user', content: 'weather?' },
            {
                role: 'assistant',
                content: null,
                tool_calls: [{
                    id: 'call_1',
                    type: 'function',
                    function: { name: 'weather__get_weather', arguments: '{}' }
                }]
            },
            { role: 'tool', tool_call_id: 'call_1', content: 'Sunny, 21°C' }
        ]);
    });
});
