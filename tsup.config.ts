import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts', 'src/main.ts'],
    format: ['esm'],
    target: 'node20',
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    treeshake: true,
    external: ['@modelcontextprotocol/sdk', '@anthropic-ai/sdk', 'zod', 'openai', 'ws', 'dotenv'],
});
