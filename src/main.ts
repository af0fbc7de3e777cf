#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { MCPChatBridge } from './bridge';
import { MattermostClient } from './chat/mattermost';
import { loadAppConfig, loadServerConfigs } from './config';
import { describeError } from './errors';
import { createProvider } from './llm/index';
import { createLogger } from './logger';

async function main() {
    loadDotenv();
    const config = loadAppConfig(process.env);
    const logger = createLogger('bridge', config.logLevel);

    const servers = await loadServerConfigs(config.serversConfigPath, logger.child('config'));
    const llm = createProvider(config.llm);
    logger.info(`Using LLM provider ${llm.name} with model ${llm.model}`);

    const chat = new MattermostClient({ ...config.mattermost, logger: logger.child('mattermost') });
    const bridge = new MCPChatBridge(
        {
            servers,
            commandPrefix: config.commandPrefix,
            teamName: config.mattermost.teamName,
            channelName: config.mattermost.channelName,
            channelId: config.mattermost.channelId,
            processingNotice: config.processingNotice,
            agent: config.agent,
        },
        { chat, llm, logger }
    );

    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) {
            return;
        }
        stopping = true;
        logger.info(`Received ${signal}, shutting down`);
        bridge.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error(`Error during shutdown: ${describeError(error)}`);
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    try {
        await bridge.start();
    } catch (error) {
        await bridge.stop();
        throw error;
    }
    logger.info(`Listening for messages with prefix '${config.commandPrefix}'`);
}

main().catch((error: unknown) => {
    createLogger('bridge').error(`Fatal error: ${describeError(error)}`);
    process.exit(1);
});
