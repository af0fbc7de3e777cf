import { describe, it, expect } from 'vitest';
import { DEFAULT_IGNORED_PREFIXES, parseCommand, type CommandGrammar } from '../src/commands';

const grammar: CommandGrammar = {
    prefix: '/',
    ignoredPrefixes: DEFAULT_IGNORED_PREFIXES,
    serverNames: ['weather', 'echo'],
};

describe('parseCommand', () => {
    it('turns plain text into a chat command', () => {
        expect(parseCommand('  what is the weather?  ', grammar)).toEqual({ kind: 'chat', text: 'what is the weather?' });
    });

    it('ignores commands meant for other bots', () => {
        expect(parseCommand('!deploy now', grammar)).toEqual({ kind: 'ignore' });
        expect(parseCommand('/deploy now', { ...grammar, prefix: '#' })).toEqual({ kind: 'ignore' });
    });

    it('does not ignore its own prefix', () => {
        expect(parseCommand('!help', { ...grammar, prefix: '!' })).toEqual({ kind: 'help' });
    });

    it('recognises help and servers', () => {
        expect(parseCommand('/', grammar)).toEqual({ kind: 'help' });
        expect(parseCommand('/help', grammar)).toEqual({ kind: 'help' });
        expect(parseCommand('/servers', grammar)).toEqual({ kind: 'servers' });
    });

    it('parses server listings', () => {
        expect(parseCommand('/weather tools', grammar)).toEqual({ kind: 'tools', server: 'weather' });
        expect(parseCommand('/weather tools get_weather', grammar)).toEqual({ kind: 'tools', server: 'weather', tool: 'get_weather' });
        expect(parseCommand('/weather resources', grammar)).toEqual({ kind: 'resources', server: 'weather' });
        expect(parseCommand('/weather prompts', grammar)).toEqual({ kind: 'prompts', server: 'weather' });
    });

    it('parses tool calls with arguments', () => {
        expect(parseCommand('/weather call get_weather city=Paris', grammar)).toEqual({
            kind: 'call',
            server: 'weather',
            tool: 'get_weather',
            args: { city: 'Paris' },
        });
        expect(parseCommand('/echo call echo message "Hello World"', grammar)).toEqual({
            kind: 'call',
            server: 'echo',
            tool: 'echo',
            args: { message: 'Hello World' },
        });
    });

    it('keeps the spacing of JSON arguments', () => {
        expect(parseCommand('/echo call echo {"message": "Hello   World"}', grammar)).toEqual({
            kind: 'call',
            server: 'echo',
            tool: 'echo',
            args: { message: 'Hello   World' },
        });
    });

    it('parses the server.tool shorthand', () => {
        expect(parseCommand('/weather.get_weather {"city": "Paris"}', grammar)).toEqual({
            kind: 'call',
            server: 'weather',
            tool: 'get_weather',
            args: { city: 'Paris' },
        });
    });

    it('answers incomplete server commands with usage', () => {
        expect(parseCommand('/weather', grammar)).toEqual({
            kind: 'usage',
            server: 'weather',
            usage: '/weather <tools|call|resources|prompts> [arguments]',
        });
        expect(parseCommand('/weather call', grammar)).toEqual({
            kind: 'usage',
            server: 'weather',
            usage: '/weather call <tool_name> [arguments]',
        });
    });

    it('hands unknown commands to the agent', () => {
        expect(parseCommand('/weather forecast for Paris', grammar)).toEqual({ kind: 'chat', text: 'weather forecast for Paris' });
        expect(parseCommand('/summarize this thread', grammar)).toEqual({ kind: 'chat', text: 'summarize this thread' });
        expect(parseCommand('/calendar.list', grammar)).toEqual({ kind: 'chat', text: 'calendar.list' });
    });
});
