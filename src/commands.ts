import { parseCommandArguments, skipWords } from './arguments';
import { QUALIFIED_NAME_SEPARATOR } from './registry';

export type Command =
    | { kind: 'help' }
    | { kind: 'servers' }
    | { kind: 'tools'; server: string; tool?: string }
    | { kind: 'call'; server: string; tool: string; args: Record<string, unknown> }
    | { kind: 'resources'; server: string }
    | { kind: 'prompts'; server: string }
    | { kind: 'usage'; server: string; usage: string }
    | { kind: 'chat'; text: string }
    | { kind: 'ignore' };

export type CommandKind = Command['kind'];

export interface CommandGrammar {
    prefix: string;
    /** Prefixes of other bots' commands; such messages are dropped. */
    ignoredPrefixes: string[];
    /** Names of the connected servers. */
    serverNames: string[];
}

export const DEFAULT_IGNORED_PREFIXES = ['!', '/'];

/**
 * Turns a chat message into a typed command. Anything the grammar does not
 * recognise becomes a `chat` command for the agent.
 */
export function parseCommand(message: string, grammar: CommandGrammar): Command {
    const text = message.trim();
    const { prefix } = grammar;

    if (!prefix || !text.startsWith(prefix)) {
        const ignored = grammar.ignoredPrefixes.some(p => p !== prefix && text.startsWith(p));
        return ignored ? { kind: 'ignore' } : { kind: 'chat', text };
    }

    const body = text.slice(prefix.length).trim();
    const tokens = body.split(/\s+/).filter(t => t.length > 0);
    const [first, second, ...rest] = tokens;

    if (first === undefined || first === 'help') {
        return { kind: 'help' };
    }
    if (first === 'servers') {
        return { kind: 'servers' };
    }

    const servers = new Set(grammar.serverNames);

    if (!servers.has(first)) {
        const shorthand = parseShorthandCall(first, servers);
        if (shorthand) {
            return { kind: 'call', ...shorthand, args: parseCommandArguments(skipWords(body, 1)) };
        }
        return { kind: 'chat', text: body };
    }

    const server = first;
    switch (second) {
        case undefined:
            return { kind: 'usage', server, usage: `${prefix}${server} <tools|call|resources|prompts> [arguments]` };
        case 'tools':
            return rest[0] ? { kind: 'tools', server, tool: rest[0] } : { kind: 'tools', server };
        case 'resources':
            return { kind: 'resources', server };
        case 'prompts':
            return { kind: 'prompts', server };
        case 'call': {
            const [tool] = rest;
            if (!tool) {
                return { kind: 'usage', server, usage: `${prefix}${server} call <tool_name> [arguments]` };
            }
            return { kind: 'call', server, tool, args: parseCommandArguments(skipWords(body, 3)) };
        }
        default:
            return { kind: 'chat', text: body };
    }
}

function parseShorthandCall(token: string, servers: Set<string>): { server: string; tool: string } | undefined {
    const separator = token.indexOf(QUALIFIED_NAME_SEPARATOR);
    if (separator <= 0) {
        return undefined;
    }
    const server = token.slice(0, separator);
    const tool = token.slice(separator + 1);
    return servers.has(server) && tool.length > 0 ? { server, tool } : undefined;
}
