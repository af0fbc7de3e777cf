import type { ChatBackend, ChatPost } from './chat/types';
import { describeError } from './errors';
import { silentLogger, type Logger } from './logger';

// Mattermost rejects posts above 16383 characters.
export const DEFAULT_MAX_POST_LENGTH = 16000;

export interface ResponseSinkOptions {
    defaultChannelId: string;
    maxPostLength?: number;
    logger?: Logger;
}

/**
 * Posts every reply of one inbound message under the same thread root.
 */
export interface ThreadReplier {
    readonly channelId: string;
    readonly rootId: string;
    post(text: string): Promise<ChatPost[]>;
}

const FENCE = '```';
// Room for a reopened fence at the start of a chunk and a closing one at its end.
const FENCE_RESERVE = 2 * (FENCE.length + 1);

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/**
 * Splits `text` into chunks of at most `maxLength` UTF-16 units, preferring a
 * line break in the second half of a chunk. Surrogate pairs are never split,
 * and a code block cut in two is closed and reopened across the chunks.
 */
export function splitMessage(text: string, maxLength: number): string[] {
    if (text.length <= maxLength) {
        return [text];
    }
    const budget = text.includes(FENCE) && maxLength > FENCE_RESERVE * 2
        ? maxLength - FENCE_RESERVE
        : maxLength;

    const chunks: string[] = [];
    let rest = text;
    while (rest.length > budget) {
        const newline = rest.lastIndexOf('\n', budget);
        let cut = newline > budget / 2 ? newline : budget;
        if (cut !== newline && cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) {
            cut--;
        }
        chunks.push(rest.slice(0, cut));
        rest = rest.slice(cut === newline ? cut + 1 : cut);
    }
    chunks.push(rest);
    return budget === maxLength ? chunks : balanceFences(chunks);
}

function balanceFences(chunks: string[]): string[] {
    let open = false;
    return chunks.map((chunk) => {
        const body = open ? `${FENCE}\n${chunk}` : chunk;
        const fences = chunk.split('\n').filter(line => line.trimStart().startsWith(FENCE)).length;
        if (fences % 2 === 1) {
            open = !open;
        }
        return open ? `${body}\n${FENCE}` : body;
    });
}

export class ResponseSink {
    private readonly defaultChannelId: string;
    private readonly maxPostLength: number;
    private readonly logger: Logger;

    constructor(private readonly chat: ChatBackend, options: ResponseSinkOptions) {
        this.defaultChannelId = options.defaultChannelId;
        this.maxPostLength = options.maxPostLength ?? DEFAULT_MAX_POST_LENGTH;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Posts `text`, split over several posts when it is too long. A failed
     * post is logged and ends the delivery of the remaining chunks.
     */
    async post(channelId: string | undefined, text: string, rootId?: string): Promise<ChatPost[]> {
        let target = channelId;
        if (!target) {
            this.logger.warn(`Channel id is not set, using default channel - ${this.defaultChannelId}`);
            target = this.defaultChannelId;
        }

        const posted: ChatPost[] = [];
        for (const chunk of splitMessage(text, this.maxPostLength)) {
            try {
                posted.push(await this.chat.postMessage(target, chunk, rootId));
            } catch (error) {
                this.logger.error(`Failed to post to channel ${target}: ${describeError(error)}`);
                break;
            }
        }
        return posted;
    }

    thread(channelId: string | undefined, rootId: string): ThreadReplier {
        const resolved = channelId || this.defaultChannelId;
        return {
            channelId: resolved,
            rootId,
            post: (text) => this.post(channelId, text, rootId),
        };
    }
}
