export interface ChatPost {
    id: string;
    channelId: string;
    userId: string;
    message: string;
    /** Creation time in epoch milliseconds. */
    createAt: number;
    /** Empty for a post that starts a thread. */
    rootId: string;
    /** Empty for a regular user post, `system_*` for backend notifications. */
    type: string;
}

export interface ChatThread {
    order: string[];
    posts: Record<string, ChatPost>;
}

export interface ChatUser {
    id: string;
    username: string;
}

export interface ChatTeam {
    id: string;
    name: string;
    displayName: string;
}

export interface ChatChannel {
    id: string;
    teamId: string;
    name: string;
}

export interface PostedEvent {
    post: ChatPost;
    /** `O` open, `P` private, `D` direct, `G` group. */
    channelType: string;
    /** User ids mentioned in the post. */
    mentions: string[];
}

export type PostHandler = (event: PostedEvent) => void | Promise<void>;

/**
 * What the bridge needs from the team-chat backend.
 */
export interface ChatBackend {
    getMe(): Promise<ChatUser>;
    postMessage(channelId: string, message: string, rootId?: string): Promise<ChatPost>;
    getThread(rootId: string): Promise<ChatThread>;
    getTeams(): Promise<ChatTeam[]>;
    getChannelByName(teamId: string, name: string): Promise<ChatChannel>;
    onPost(handler: PostHandler): void;
    connect(): Promise<void>;
    close(): Promise<void>;
}
