import { ArgumentParseError } from './errors';

/** Key a non-JSON argument string is passed under. */
export const DEFAULT_ARGUMENT_KEY = 'text';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
    value !== null && typeof value === 'object' && !Array.isArray(value)
);

export interface ParsedArguments {
    args: Record<string, unknown>;
    error?: ArgumentParseError;
}

/**
 * Parses the JSON argument string of an LLM tool call. Anything that is not a
 * JSON object is passed as free text under DEFAULT_ARGUMENT_KEY, with the
 * parse error attached so the caller can log it.
 */
export function parseToolArguments(raw: string | undefined): ParsedArguments {
    const trimmed = raw?.trim() ?? '';
    if (trimmed.length === 0) {
        return { args: {} };
    }
    try {
        const parsed: unknown = JSON.parse(trimmed);
        if (isPlainObject(parsed)) {
            return { args: parsed };
        }
        return {
            args: { [DEFAULT_ARGUMENT_KEY]: trimmed },
            error: new ArgumentParseError(trimmed, new Error('Arguments are not a JSON object')),
        };
    } catch (error) {
        return {
            args: { [DEFAULT_ARGUMENT_KEY]: trimmed },
            error: new ArgumentParseError(trimmed, error),
        };
    }
}

const tryParseJson = (value: string): unknown => {
    try {
        return JSON.parse(value);
    } catch {
        return undefined;
    }
};

const KEY_VALUE_TOKEN = /^([^=\s]+)=(.*)$/s;

function stripWrapping(value: string, quote: string): string {
    if (value.length >= 2 && value.startsWith(quote) && value.endsWith(quote)) {
        return value.slice(1, -1);
    }
    return value;
}

/** The text left after the first `count` whitespace-separated words. */
export function skipWords(text: string, count: number): string {
    let rest = text.trimStart();
    for (let i = 0; i < count && rest.length > 0; i++) {
        rest = rest.replace(/^\S+\s*/, '');
    }
    return rest;
}

/**
 * Arguments typed after `call <tool>` in a chat command, tried in order:
 * a JSON object (optionally wrapped in single quotes), `key=value` pairs,
 * then the legacy `key value...` form. JSON and legacy values keep the
 * whitespace of the message.
 */
export function parseCommandArguments(raw: string): Record<string, unknown> {
    const text = raw.trim();
    if (text.length === 0) {
        return {};
    }

    const parsed = tryParseJson(stripWrapping(text, "'"));
    if (isPlainObject(parsed)) {
        return parsed;
    }

    const tokens = text.split(/\s+/);
    const pairs = tokens.map(token => KEY_VALUE_TOKEN.exec(token));
    if (pairs.every(match => match !== null)) {
        const args: Record<string, unknown> = {};
        for (const match of pairs) {
            if (match) {
                args[match[1]] = stripWrapping(match[2], '"');
            }
        }
        return args;
    }

    return { [tokens[0]]: stripWrapping(skipWords(text, 1), '"') };
}
