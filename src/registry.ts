import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ToolNotFoundError } from './errors';
import type { LLMToolDefinition } from './llm/types';
import type { Tagged } from './pool';
import type { RegisteredTool } from './types';

export const QUALIFIED_NAME_SEPARATOR = '.';

export function qualifyToolName(serverName: string, toolName: string): string {
    return `${serverName}${QUALIFIED_NAME_SEPARATOR}${toolName}`;
}

/**
 * Namespaced view over every tool the pool discovered. Keys are
 * `server.tool`; the short name is kept on each entry for secondary lookup.
 */
export class ToolRegistry {
    private tools: Map<string, RegisteredTool> = new Map();

    static fromListing(listing: Tagged<Tool>[]): ToolRegistry {
        const registry = new ToolRegistry();
        for (const { serverName, item } of listing) {
            registry.register(serverName, item);
        }
        return registry;
    }

    register(serverName: string, tool: Tool): RegisteredTool {
        const registeredTool: RegisteredTool = {
            ...tool,
            serverName,
            qualifiedName: qualifyToolName(serverName, tool.name),
        };
        this.tools.set(registeredTool.qualifiedName, registeredTool);
        return registeredTool;
    }

    unregisterServer(serverName: string) {
        for (const [name, tool] of this.tools.entries()) {
            if (tool.serverName === serverName) {
                this.tools.delete(name);
            }
        }
    }

    get(qualifiedName: string): RegisteredTool | undefined {
        return this.tools.get(qualifiedName);
    }

    has(qualifiedName: string): boolean {
        return this.tools.has(qualifiedName);
    }

    findByShortName(name: string): RegisteredTool[] {
        return this.filter(t => t.name === name);
    }

    /**
     * Qualified name first, then short name. Several servers may expose the
     * same short name; the first one registered wins.
     */
    resolve(name: string): RegisteredTool {
        const exact = this.tools.get(name);
        if (exact) {
            return exact;
        }
        const [first] = this.findByShortName(name);
        if (!first) {
            throw new ToolNotFoundError(name);
        }
        return first;
    }

    list(): RegisteredTool[] {
        return Array.from(this.tools.values());
    }

    filter(predicate: (tool: RegisteredTool) => boolean): RegisteredTool[] {
        return this.list().filter(predicate);
    }

    forServer(serverName: string): RegisteredTool[] {
        return this.filter(t => t.serverName === serverName);
    }

    get size(): number {
        return this.tools.size;
    }

    toLLMTools(): LLMToolDefinition[] {
        return this.list().map(toLLMTool);
    }

    clear() {
        this.tools.clear();
    }
}

export function toLLMTool(tool: RegisteredTool): LLMToolDefinition {
    const schema = tool.inputSchema;
    const hasParameters = schema.properties !== undefined && Object.keys(schema.properties).length > 0;
    return {
        name: tool.qualifiedName,
        description: tool.description ?? '',
        parameters: hasParameters
            ? { ...schema }
            : { type: 'object', properties: {}, required: [] },
    };
}
