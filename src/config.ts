import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { AgentLoopOptions } from './agent';
import { DEFAULT_SYSTEM_PROMPT } from './agent';
import { ConfigError, describeError } from './errors';
import type { ProviderConfig } from './llm/index';
import { silentLogger, type Logger, type LogLevel } from './logger';
import { QUALIFIED_NAME_SEPARATOR } from './registry';
import type { ServerConfig } from './types';

// The entry point loads `.env` with dotenv before calling into this module.

const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export const DEFAULT_TEAM_NAME = 'test';
export const DEFAULT_CHANNEL_NAME = 'mcp-client';

const optionalString = z.string().trim().optional().transform(v => (v ? v : undefined));

const EnvSchema = z.object({
    MATTERMOST_URL: z.string().trim().min(1).default('localhost'),
    MATTERMOST_SCHEME: z.enum(['http', 'https']).default('http'),
    MATTERMOST_PORT: z.coerce.number().int().positive().default(8065),
    MATTERMOST_TOKEN: z.string().trim().min(1, 'MATTERMOST_TOKEN is required'),
    MATTERMOST_TEAM_NAME: optionalString,
    MATTERMOST_CHANNEL_NAME: optionalString,
    MATTERMOST_CHANNEL_ID: optionalString,
    COMMAND_PREFIX: z.string().trim().min(1).default('/'),
    LOG_LEVEL: z.string().trim().toLowerCase()
        .transform(v => (v === 'warning' ? 'warn' : v))
        .pipe(z.enum(LOG_LEVEL_NAMES))
        .default('info'),
    LLM_PROVIDER: z.enum(['openai', 'azure', 'anthropic', 'gemini']).default('openai'),
    LLM_MODEL: optionalString,
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString,
    AZURE_OPENAI_API_KEY: optionalString,
    AZURE_OPENAI_ENDPOINT: optionalString,
    AZURE_OPENAI_API_VERSION: z.string().trim().min(1).default('2024-10-21'),
    AZURE_OPENAI_DEPLOYMENT: z.string().trim().min(1).default('gpt-4o'),
    ANTHROPIC_API_KEY: optionalString,
    GOOGLE_API_KEY: optionalString,
    SYSTEM_PROMPT: optionalString,
    MCP_SERVERS_CONFIG: z.string().trim().min(1).default('mcp-servers.json'),
    AGENT_MAX_TURNS: z.coerce.number().int().positive().default(10),
    AGENT_MAX_TOOL_CALLS: z.coerce.number().int().positive().default(25),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    PROCESSING_NOTICE: z.string().default('Processing your request...'),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
    mattermost: {
        url: string;
        scheme: 'http' | 'https';
        port: number;
        token: string;
        teamName?: string;
        channelName?: string;
        channelId?: string;
    };
    commandPrefix: string;
    logLevel: LogLevel;
    llm: ProviderConfig;
    agent: AgentLoopOptions;
    processingNotice: string;
    serversConfigPath: string;
}

export function loadAppConfig(env: Record<string, string | undefined>): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            'Invalid environment configuration',
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const vars = parsed.data;

    return {
        mattermost: {
            url: vars.MATTERMOST_URL,
            scheme: vars.MATTERMOST_SCHEME,
            port: vars.MATTERMOST_PORT,
            token: vars.MATTERMOST_TOKEN,
            teamName: vars.MATTERMOST_TEAM_NAME ?? DEFAULT_TEAM_NAME,
            channelName: vars.MATTERMOST_CHANNEL_NAME ?? DEFAULT_CHANNEL_NAME,
            channelId: vars.MATTERMOST_CHANNEL_ID,
        },
        commandPrefix: vars.COMMAND_PREFIX,
        logLevel: vars.LOG_LEVEL,
        llm: buildProviderConfig(vars),
        agent: {
            systemPrompt: vars.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
            maxTurns: vars.AGENT_MAX_TURNS,
            maxToolCalls: vars.AGENT_MAX_TOOL_CALLS,
            llmTimeoutMs: vars.LLM_TIMEOUT_MS,
            toolTimeoutMs: vars.TOOL_TIMEOUT_MS,
        },
        processingNotice: vars.PROCESSING_NOTICE,
        serversConfigPath: path.resolve(process.cwd(), vars.MCP_SERVERS_CONFIG),
    };
}

function requireKey(value: string | undefined, name: string, provider: string): string {
    if (!value) {
        throw new ConfigError(`${name} is required when LLM_PROVIDER is ${provider}`);
    }
    return value;
}

function buildProviderConfig(vars: Env): ProviderConfig {
    switch (vars.LLM_PROVIDER) {
        case 'openai':
            return {
                provider: 'openai',
                apiKey: requireKey(vars.OPENAI_API_KEY, 'OPENAI_API_KEY', 'openai'),
                model: vars.LLM_MODEL,
                baseURL: vars.OPENAI_BASE_URL,
            };
        case 'azure':
            return {
                provider: 'azure',
                apiKey: requireKey(vars.AZURE_OPENAI_API_KEY, 'AZURE_OPENAI_API_KEY', 'azure'),
                endpoint: requireKey(vars.AZURE_OPENAI_ENDPOINT, 'AZURE_OPENAI_ENDPOINT', 'azure'),
                apiVersion: vars.AZURE_OPENAI_API_VERSION,
                deployment: vars.LLM_MODEL ?? vars.AZURE_OPENAI_DEPLOYMENT,
            };
        case 'anthropic':
            return {
                provider: 'anthropic',
                apiKey: requireKey(vars.ANTHROPIC_API_KEY, 'ANTHROPIC_API_KEY', 'anthropic'),
                model: vars.LLM_MODEL,
            };
        case 'gemini':
            return {
                provider: 'gemini',
                apiKey: requireKey(vars.GOOGLE_API_KEY, 'GOOGLE_API_KEY', 'gemini'),
                model: vars.LLM_MODEL,
            };
    }
}

const StdioEntrySchema = z.object({
    type: z.literal('stdio').optional(),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
});

const HttpEntrySchema = z.object({
    type: z.literal('http').optional(),
    url: z.string().url(),
    headers: z.record(z.string()).optional(),
});

const ServersFileSchema = z.object({
    mcpServers: z.record(z.unknown()),
});

/**
 * Validates one entry of the `mcpServers` map. Entries with a `command` are
 * stdio servers, entries with a `url` are HTTP servers.
 */
export function parseServerEntry(name: string, entry: unknown): ServerConfig {
    if (name.includes(QUALIFIED_NAME_SEPARATOR)) {
        throw new ConfigError(`Server name '${name}' must not contain '${QUALIFIED_NAME_SEPARATOR}'`);
    }
    const stdio = StdioEntrySchema.safeParse(entry);
    if (stdio.success) {
        const { command, args, env } = stdio.data;
        return env ? { type: 'stdio', command, args, env } : { type: 'stdio', command, args };
    }
    const http = HttpEntrySchema.safeParse(entry);
    if (http.success) {
        const { url, headers } = http.data;
        return headers ? { type: 'http', url, headers } : { type: 'http', url };
    }
    throw new ConfigError(`Unsupported configuration for server '${name}'`, [
        ...stdio.error.issues.map(issue => `stdio ${issue.path.join('.') || '(entry)'}: ${issue.message}`),
        ...http.error.issues.map(issue => `http ${issue.path.join('.') || '(entry)'}: ${issue.message}`),
    ]);
}

/**
 * Builds the server map from the parsed contents of an `mcp-servers.json`
 * file. Invalid entries are skipped with a warning.
 */
export function parseServersConfig(raw: unknown, logger: Logger = silentLogger): Record<string, ServerConfig> {
    const file = ServersFileSchema.safeParse(raw);
    if (!file.success) {
        throw new ConfigError('Server configuration must contain an "mcpServers" object');
    }
    const servers: Record<string, ServerConfig> = {};
    for (const [name, entry] of Object.entries(file.data.mcpServers)) {
        try {
            servers[name] = parseServerEntry(name, entry);
        } catch (error) {
            logger.warn(`Skipping MCP server '${name}': ${describeError(error)}`);
        }
    }
    return servers;
}

export async function loadServerConfigs(filePath: string, logger: Logger = silentLogger): Promise<Record<string, ServerConfig>> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read server configuration ${filePath}: ${describeError(error)}`);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Server configuration ${filePath} is not valid JSON: ${describeError(error)}`);
    }
    return parseServersConfig(raw, logger);
}
