const TOOL_NAME_INVALID_CHARS = /[^A-Za-z0-9_-]+/g;
const TOOL_NAME_FALLBACK = 'tool';
export const TOOL_NAME_MAX_LENGTH = 64;

/**
 * Maps a qualified tool name onto the `[A-Za-z0-9_-]{1,64}` alphabet the
 * provider APIs accept: `weather.get_weather` becomes `weather__get_weather`.
 */
export const sanitizeToolName = (raw: string): string => {
    const replaced = raw
        .replace(/\./g, '__')
        .replace(TOOL_NAME_INVALID_CHARS, '_')
        .slice(0, TOOL_NAME_MAX_LENGTH);
    return replaced.length > 0 ? replaced : TOOL_NAME_FALLBACK;
};

/**
 * Two-way mapping between registry names and the names sent to a provider
 * for one request. Names the model invents are passed through unchanged.
 */
export class ToolNameMap {
    private toWire = new Map<string, string>();
    private fromWire = new Map<string, string>();

    constructor(names: string[]) {
        for (const name of names) {
            if (this.toWire.has(name)) {
                continue;
            }
            const base = sanitizeToolName(name);
            let wire = base;
            for (let n = 2; this.fromWire.has(wire); n++) {
                const suffix = `_${n}`;
                wire = `${base.slice(0, TOOL_NAME_MAX_LENGTH - suffix.length)}${suffix}`;
            }
            this.toWire.set(name, wire);
            this.fromWire.set(wire, name);
        }
    }

    encode(name: string): string {
        return this.toWire.get(name) ?? sanitizeToolName(name);
    }

    decode(wireName: string): string {
        return this.fromWire.get(wireName) ?? wireName;
    }
}
