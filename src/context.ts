import type { ChatBackend, ChatPost } from './chat/types';
import { describeError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { ConversationMessage } from './types';

const SYSTEM_POST_PREFIX = 'system_';

/**
 * Rebuilds the message history of a chat thread for the LLM. Nothing is
 * cached; every request reads the thread again.
 */
export class ConversationContextBuilder {
    constructor(
        private readonly chat: ChatBackend,
        private readonly botUserId: string,
        private readonly logger: Logger = silentLogger
    ) { }

    async build(rootId?: string, channelId?: string): Promise<ConversationMessage[]> {
        if (!rootId) {
            return [];
        }

        let posts: ChatPost[];
        try {
            const thread = await this.chat.getThread(rootId);
            posts = Object.values(thread.posts);
        } catch (error) {
            this.logger.error(`Error fetching thread history for ${rootId}${channelId ? ` in ${channelId}` : ''}: ${describeError(error)}`);
            return [];
        }

        return posts
            .filter(post => !post.type.startsWith(SYSTEM_POST_PREFIX))
            .filter(post => post.message.trim().length > 0)
            .sort((a, b) => a.createAt - b.createAt)
            .map((post): ConversationMessage => ({
                role: post.userId === this.botUserId ? 'assistant' : 'user',
                content: post.message,
            }));
    }
}
