import { AzureOpenAI } from 'openai';
import { AnthropicProvider } from './anthropic';
import { OpenAIProvider } from './openai';
import type { GenerationDefaults, LLMProvider } from './types';

export * from './types';
export * from './openai';
export * from './anthropic';
export * from './tool-names';

export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

export type ProviderConfig =
    | {
        provider: 'openai';
        apiKey: string;
        model?: string;
        baseURL?: string;
        organization?: string;
        project?: string;
        defaultOptions?: GenerationDefaults;
    }
    | {
        provider: 'azure';
        apiKey: string;
        endpoint: string;
        apiVersion: string;
        deployment: string;
        defaultOptions?: GenerationDefaults;
    }
    | {
        provider: 'anthropic';
        apiKey: string;
        model?: string;
        defaultOptions?: GenerationDefaults;
    }
    | {
        provider: 'gemini';
        apiKey: string;
        model?: string;
        baseURL?: string;
        defaultOptions?: GenerationDefaults;
    };

/**
 * Picks the adapter for a provider once, at construction time.
 */
export function createProvider(config: ProviderConfig): LLMProvider {
    switch (config.provider) {
        case 'openai':
            return new OpenAIProvider(config);
        case 'azure':
            return new OpenAIProvider(
                { apiKey: config.apiKey, model: config.deployment, defaultOptions: config.defaultOptions },
                {
                    name: 'azure',
                    client: new AzureOpenAI({
                        apiKey: config.apiKey,
                        endpoint: config.endpoint,
                        apiVersion: config.apiVersion,
                        deployment: config.deployment,
                    }),
                }
            );
        case 'anthropic':
            return new AnthropicProvider(config);
        case 'gemini':
            return new OpenAIProvider(
                {
                    apiKey: config.apiKey,
                    baseURL: config.baseURL || GEMINI_OPENAI_BASE_URL,
                    model: config.model || 'gemini-1.5-pro',
                    defaultOptions: config.defaultOptions,
                },
                { name: 'gemini' }
            );
    }
}
