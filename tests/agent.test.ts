import { describe, it, expect, beforeEach } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { AgentLoop, buildMessages, type AgentLoopOptions } from '../src/agent';
import type { CallOptions } from '../src/connection';
import type { ChatResponse } from '../src/llm/types';
import { ToolRegistry } from '../src/registry';
import { ResponseSink, type ThreadReplier } from '../src/sink';
import {
    FakeChatBackend,
    FakeConnection,
    ScriptedLLM,
    fakePool,
    makeTool,
    textResult,
    toolCall,
} from './helpers/fakes';

const answer = (content: string): ChatResponse => ({ content, toolCalls: [] });

describe('AgentLoop', () => {
    let chat: FakeChatBackend;
    let reply: ThreadReplier;
    let weather: FakeConnection;

    beforeEach(() => {
        chat = new FakeChatBackend();
        reply = new ResponseSink(chat, { defaultChannelId: 'channel-1' }).thread('channel-1', 'root-1');
        weather = new FakeConnection('weather', {
            tools: [makeTool('get_weather'), makeTool('station_status')],
            onCall: async (name, args) => name === 'station_status'
                ? textResult('Station offline', true)
                : textResult(`Sunny in ${String(args.city)}`),
        });
    });

    async function runAgent(llm: ScriptedLLM, prompt: string, options: Partial<AgentLoopOptions> = {}, connections = [weather]) {
        const pool = fakePool(connections);
        await pool.connectAll();
        const registry = ToolRegistry.fromListing((await pool.listTools()).items);
        const agent = new AgentLoop({ llm, pool }, { systemPrompt: 'You are a test assistant.', ...options });
        return agent.run({ prompt, history: [], registry, reply });
    }

    it('answers directly when the model calls no tools', async () => {
        const llm = new ScriptedLLM([answer('Hello there.')]);

        const outcome = await runAgent(llm, 'hi');

        expect(outcome.status).toBe('completed');
        expect(outcome.turns).toBe(1);
        expect(outcome.toolCalls).toBe(0);
        expect(chat.messages()).toEqual(['Hello there.']);
        expect(llm.requests[0].messages).toEqual([
            { role: 'system', content: 'You are a test assistant.' },
            { role: 'user', content: 'hi' },
        ]);
        expect(llm.requests[0].tools.map(t => t.name)).toEqual(['weather.get_weather', 'weather.station_status']);
    });

    it('posts a placeholder for an empty answer', async () => {
        const outcome = await runAgent(new ScriptedLLM([{ content: null, toolCalls: [] }]), 'hi');
        expect(outcome.status === 'completed' && outcome.answer).toBe('No response generated');
        expect(chat.messages()).toEqual(['No response generated']);
    });

    it('runs requested tools and feeds their results back', async () => {
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'weather.get_weather', { city: 'Paris' })] },
            answer('It is sunny in Paris.'),
        ]);

        const outcome = await runAgent(llm, 'weather in Paris?');

        expect(outcome.status).toBe('completed');
        expect(outcome.turns).toBe(2);
        expect(outcome.toolCalls).toBe(1);
        expect(weather.calls).toEqual([{ name: 'get_weather', args: { city: 'Paris' } }]);
        expect(chat.messages()).toEqual([
            '🔧 Executing tool: `get_weather` on server `weather`...',
            '📊 Tool `get_weather` result:\n```\nSunny in Paris\n```',
            '🧠 Processing tool results...',
            'It is sunny in Paris.',
        ]);
        expect(llm.requests[1].messages.slice(2)).toEqual([
            { role: 'assistant', content: '', toolCalls: [toolCall('call_1', 'weather.get_weather', { city: 'Paris' })] },
            { role: 'tool', toolCallId: 'call_1', name: 'weather.get_weather', content: 'Sunny in Paris', isError: false },
        ]);
    });

    it('resolves short tool names and posts accompanying text', async () => {
        const llm = new ScriptedLLM([
            { content: 'Let me check.', toolCalls: [toolCall('call_1', 'get_weather', { city: 'Oslo' })] },
            answer('Sunny.'),
        ]);

        await runAgent(llm, 'weather in Oslo?');

        expect(weather.calls).toEqual([{ name: 'get_weather', args: { city: 'Oslo' } }]);
        expect(chat.messages()[0]).toBe('Let me check.');
    });

    it('reports unknown tools to the user and the model', async () => {
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'calendar.list_events')] },
            answer('I cannot reach your calendar.'),
        ]);

        const outcome = await runAgent(llm, 'what is on my calendar?');

        expect(outcome.status).toBe('completed');
        expect(chat.messages()[0]).toBe("⚠️ Tool 'calendar.list_events' not found in any MCP server.");
        expect(llm.requests[1].messages[3]).toEqual({
            role: 'tool',
            toolCallId: 'call_1',
            name: 'calendar.list_events',
            content: "Tool 'calendar.list_events' not found in any MCP server.",
            isError: true,
        });
    });

    it('feeds tool-level errors back to the model', async () => {
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'weather.station_status', { station: 'north' })] },
            answer('The north station is offline.'),
        ]);

        await runAgent(llm, 'is the north station up?');

        expect(chat.messages()[1]).toBe('⚠️ Tool `station_status` returned an error:\n```\nStation offline\n```');
        expect(llm.requests[1].messages[3]).toMatchObject({ role: 'tool', content: 'Station offline', isError: true });
    });

    it('feeds thrown tool errors back to the model', async () => {
        const broken = new FakeConnection('weather', {
            tools: [makeTool('get_weather')],
            onCall: async () => {
                throw new Error('boom');
            },
        });
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'weather.get_weather', { city: 'Paris' })] },
            answer('The weather service is down.'),
        ]);

        const outcome = await runAgent(llm, 'weather?', {}, [broken]);

        const expected = "Error executing tool 'weather.get_weather': Tool call failed: weather.get_weather: boom";
        expect(outcome.status).toBe('completed');
        expect(chat.messages()[1]).toBe(`⚠️ ${expected}`);
        expect(llm.requests[1].messages[3]).toMatchObject({ role: 'tool', content: expected, isError: true });
    });

    it('passes unparseable arguments as free text', async () => {
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'weather.get_weather', 'city=Paris')] },
            answer('Done.'),
        ]);

        await runAgent(llm, 'weather?');

        expect(weather.calls).toEqual([{ name: 'get_weather', args: { text: 'city=Paris' } }]);
    });

    it('reports LLM failures and stops', async () => {
        const outcome = await runAgent(new ScriptedLLM([new Error('rate limited')]), 'hi');

        expect(outcome.status).toBe('llm_error');
        expect(outcome.status === 'llm_error' && outcome.error.message).toBe('LLM request to openai failed: rate limited');
        expect(chat.messages()).toEqual(['Error processing your request: rate limited']);
    });

    it('stops after the turn budget', async () => {
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'weather.get_weather', { city: 'Paris' })] },
            { content: null, toolCalls: [toolCall('call_2', 'weather.get_weather', { city: 'Rome' })] },
        ]);

        const outcome = await runAgent(llm, 'weather everywhere', { maxTurns: 2 });

        expect(outcome.status).toBe('max_turns_exceeded');
        expect(outcome.turns).toBe(2);
        expect(outcome.toolCalls).toBe(2);
        expect(chat.messages().at(-1)).toBe('⚠️ Stopped after 2 turns without a final answer.');
    });

    it('stops after the tool call budget', async () => {
        const llm = new ScriptedLLM([{
            content: null,
            toolCalls: [
                toolCall('call_1', 'weather.get_weather', { city: 'Paris' }),
                toolCall('call_2', 'weather.get_weather', { city: 'Rome' }),
                toolCall('call_3', 'weather.get_weather', { city: 'Oslo' }),
            ],
        }]);

        const outcome = await runAgent(llm, 'weather everywhere', { maxToolCalls: 2 });

        expect(outcome.status).toBe('tool_budget_exceeded');
        expect(outcome.toolCalls).toBe(2);
        expect(weather.calls.map(c => c.args.city)).toEqual(['Paris', 'Rome']);
        expect(chat.messages().at(-1)).toBe('⚠️ Stopped after 2 tool calls without a final answer.');
    });

    it('aborts tool calls that exceed the timeout', async () => {
        let signal: AbortSignal | undefined;
        const hanging = new FakeConnection('weather', {
            tools: [makeTool('get_weather')],
            onCall: (_name, _args, options: CallOptions) => {
                signal = options.signal;
                return new Promise<CallToolResult>(() => undefined);
            },
        });
        const llm = new ScriptedLLM([
            { content: null, toolCalls: [toolCall('call_1', 'weather.get_weather')] },
            answer('The weather service timed out.'),
        ]);

        await runAgent(llm, 'weather?', { toolTimeoutMs: 20 }, [hanging]);

        expect(signal?.aborted).toBe(true);
        expect(llm.requests[1].messages[3]).toMatchObject({
            role: 'tool',
            content: "Error executing tool 'weather.get_weather': Tool weather.get_weather timed out after 20ms",
            isError: true,
        });
    });
});

describe('buildMessages', () => {
    it('does not repeat a prompt that ends the history', () => {
        const messages = buildMessages('system', [{ role: 'user', content: 'hello ' }], 'hello');
        expect(messages).toEqual([
            { role: 'system', content: 'system' },
            { role: 'user', content: 'hello ' },
        ]);
    });

    it('matches the raw post text of a prefixed prompt', () => {
        const messages = buildMessages('system', [{ role: 'user', content: '/what is up' }], 'what is up', '/what is up');
        expect(messages).toEqual([
            { role: 'system', content: 'system' },
            { role: 'user', content: '/what is up' },
        ]);
    });

    it('appends the prompt after earlier history', () => {
        const messages = buildMessages('system', [
            { role: 'user', content: 'hello' },
            { role: 'assistant', content: 'hi' },
        ], 'hello');
        expect(messages.map(m => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    });
});
