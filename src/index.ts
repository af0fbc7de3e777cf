export * from './bridge';
export * from './agent';
export * from './router';
export * from './commands';
export * from './arguments';
export * from './context';
export * from './sink';
export * from './pool';
export * from './connection';
export * from './registry';
export * from './format';
export * from './config';
export * from './logger';
export * from './types';
export * from './errors';
export * from './chat/types';
export * from './chat/mattermost';
export * as llm from './llm/index';
export * as patterns from './patterns/index';
