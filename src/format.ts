import type { CallToolResult, Prompt, Resource, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ServerStatus } from './types';

export function formatHelp(prefix: string): string {
    return [
        '**MCP Client Help**',
        `Use \`${prefix}<command>\` to interact with MCP servers.`,
        '',
        '**Available Commands:**',
        `1. \`${prefix}help\` - Show this help message`,
        `2. \`${prefix}servers\` - List all available MCP servers`,
        '',
        '**Server-specific Commands:**',
        `Use \`${prefix}<server_name> <command>\` to interact with a specific server.`,
        `1. \`${prefix}<server_name> tools\` - List all available tools for the server`,
        `2. \`${prefix}<server_name> tools <tool_name>\` - Show the parameters of one tool`,
        `3. \`${prefix}<server_name> call <tool_name> <arguments>\` - Call a specific tool`,
        `4. \`${prefix}<server_name> resources\` - List all available resources`,
        `5. \`${prefix}<server_name> prompts\` - List all available prompts`,
        `6. \`${prefix}<server_name>.<tool_name> <arguments>\` - Shorthand for \`call\``,
        '',
        '**Arguments** may be given as:',
        `- a JSON object: \`${prefix}weather call get_forecast {"city": "Paris", "days": 3}\``,
        `- key=value pairs: \`${prefix}weather call get_forecast city=Paris days=3\``,
        `- a single name and value: \`${prefix}echo call echo message "Hello World"\``,
        '',
        '**Direct Interaction:**',
        'Any other message is answered by the AI assistant, which calls tools as needed.',
    ].join('\n');
}

export function formatServerList(statuses: ServerStatus[]): string {
    const lines = ['Available MCP servers:'];
    for (const status of statuses) {
        if (status.state === 'connected') {
            lines.push(`- ${status.name}`);
        } else if (status.state === 'failed') {
            lines.push(`- ${status.name} (unavailable: ${status.error ?? 'connection failed'})`);
        }
    }
    return lines.join('\n');
}

export function formatToolList(serverName: string, tools: Tool[]): string {
    if (tools.length === 0) {
        return `No tools available for ${serverName}.`;
    }
    const lines = [`Available tools for ${serverName}:`];
    for (const tool of tools) {
        lines.push(tool.description ? `- ${tool.name}: ${tool.description}` : `- ${tool.name}`);
    }
    return lines.join('\n');
}

export function formatToolHelp(serverName: string, tool: Tool, prefix: string): string {
    const lines = [`**Tool Help: ${tool.name}**`];
    if (tool.description) {
        lines.push(`Description: ${tool.description}`);
    }
    lines.push('', '**Parameters:**');

    const properties: Record<string, unknown> = tool.inputSchema.properties ?? {};
    const required = tool.inputSchema.required ?? [];
    const names = Object.keys(properties);
    if (names.length === 0) {
        lines.push('No parameters required');
    } else {
        for (const name of names) {
            const info = describeProperty(properties[name]);
            const mark = required.includes(name) ? '*' : '';
            lines.push(`- ${name}${mark}: ${info.type}${info.description ? ` - ${info.description}` : ''}`);
        }
        lines.push('', '* = required parameter');
    }

    const example = required.length > 0 ? `${required[0]}=<value>` : '';
    lines.push('', '**Example:**', `\`${prefix}${serverName} call ${tool.name}${example ? ` ${example}` : ''}\``);
    return lines.join('\n');
}

function describeProperty(schema: unknown): { type: string; description?: string } {
    if (schema === null || typeof schema !== 'object') {
        return { type: 'any' };
    }
    const type = 'type' in schema && typeof schema.type === 'string' ? schema.type : 'any';
    const description = 'description' in schema && typeof schema.description === 'string'
        ? schema.description
        : undefined;
    return { type, description };
}

export function formatResourceList(serverName: string, resources: Resource[]): string {
    if (resources.length === 0) {
        return `No resources available for ${serverName}.`;
    }
    const lines = [`Available MCP resources for ${serverName}:`];
    for (const resource of resources) {
        const detail = resource.description ? `: ${resource.description}` : '';
        lines.push(`- ${resource.name} (${resource.uri})${detail}`);
    }
    return lines.join('\n');
}

export function formatPromptList(serverName: string, prompts: Prompt[]): string {
    if (prompts.length === 0) {
        return `No prompts available for ${serverName}.`;
    }
    const lines = [`Available MCP prompts for ${serverName}:`];
    for (const prompt of prompts) {
        const args = (prompt.arguments ?? []).map(a => (a.required ? `${a.name}*` : a.name));
        const signature = args.length > 0 ? ` (${args.join(', ')})` : '';
        lines.push(`- ${prompt.name}${signature}${prompt.description ? `: ${prompt.description}` : ''}`);
    }
    return lines.join('\n');
}

/**
 * Flattens the content items of a tool result into one string: text as is,
 * embedded text resources by their text, anything else as JSON.
 */
export function formatToolResult(result: CallToolResult): string {
    return result.content.map((item) => {
        if (item.type === 'text') {
            return item.text;
        }
        if (item.type === 'resource' && 'text' in item.resource && typeof item.resource.text === 'string') {
            return item.resource.text;
        }
        return JSON.stringify(item);
    }).join('\n');
}

export function codeBlock(text: string): string {
    return `\`\`\`\n${text}\n\`\`\``;
}
