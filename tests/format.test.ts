import { describe, it, expect } from 'vitest';
import { codeBlock, formatPromptList, formatServerList, formatToolList, formatToolResult } from '../src/format';

describe('formatToolResult', () => {
    it('joins text items and embedded text resources', () => {
        expect(formatToolResult({
            content: [
                { type: 'text', text: 'line one' },
                { type: 'resource', resource: { uri: 'file:///notes.txt', text: 'from a resource' } },
            ],
        })).toBe('line one\nfrom a resource');
    });

    it('serializes other content as JSON', () => {
        expect(formatToolResult({
            content: [{ type: 'image', data: 'aGk=', mimeType: 'image/png' }],
        })).toBe('{"type":"image","data":"aGk=","mimeType":"image/png"}');
    });
});

describe('listings', () => {
    it('skips servers that were never connected', () => {
        expect(formatServerList([
            { name: 'weather', state: 'connected' },
            { name: 'idle', state: 'disconnected' },
            { name: 'broken', state: 'failed' },
        ])).toBe('Available MCP servers:\n- weather\n- broken (unavailable: connection failed)');
    });

    it('describes empty tool lists', () => {
        expect(formatToolList('weather', [])).toBe('No tools available for weather.');
    });

    it('marks required prompt arguments', () => {
        expect(formatPromptList('docs', [{
            name: 'summarize',
            description: 'Summarize a page',
            arguments: [{ name: 'url', required: true }, { name: 'style' }],
        }])).toBe('Available MCP prompts for docs:\n- summarize (url*, style): Summarize a page');
    });

    it('wraps text in a code block', () => {
        expect(codeBlock('x')).toBe('```\nx\n```');
    });
});
