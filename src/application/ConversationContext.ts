import { AspectRatioLabel } from '../domain/entities/AspectRatio';

/**
 * Values a chat keeps between the "image received" and "instruction received" turns.
 */
export interface ConversationState {
    /** Pending source image */
    photo: Buffer;
    aspectRatio: AspectRatioLabel;
}

/**
 * Key-value context scoped to one conversation.
 */
export class ConversationContext {
    private state: Partial<ConversationState> = {};

    get<K extends keyof ConversationState>(key: K): ConversationState[K] | undefined {
        return this.state[key];
    }

    set<K extends keyof ConversationState>(key: K, value: ConversationState[K]): void {
        this.state[key] = value;
    }

    has(key: keyof ConversationState): boolean {
        return this.state[key] !== undefined;
    }

    clear(): void {
        this.state = {};
    }
}

export const DEFAULT_MAX_CONVERSATIONS = 1000;

/**
 * In-memory contexts, one per chat id. Nothing survives a restart.
 * Holds at most maxConversations contexts; the least recently used one is
 * evicted to make room, dropping its stashed photo.
 */
export class ConversationContextStore {
    private readonly contexts: Map<number, ConversationContext> = new Map();

    constructor(private readonly maxConversations: number = DEFAULT_MAX_CONVERSATIONS) {
        if (!Number.isInteger(maxConversations) || maxConversations < 1) {
            throw new Error(`maxConversations must be a positive integer, got: ${maxConversations}`);
        }
    }

    /**
     * Returns the chat's context, creating an empty one on first use.
     */
    forChat(chatId: number): ConversationContext {
        let context = this.contexts.get(chatId);
        if (context) {
            // Map keeps insertion order; re-insert to mark as most recent
            this.contexts.delete(chatId);
        } else {
            context = new ConversationContext();
            this.evictOldest();
        }
        this.contexts.set(chatId, context);
        return context;
    }

    /**
     * Clears the chat's context and forgets it.
     */
    release(chatId: number): void {
        this.contexts.get(chatId)?.clear();
        this.contexts.delete(chatId);
    }

    get size(): number {
        return this.contexts.size;
    }

    private evictOldest(): void {
        if (this.contexts.size < this.maxConversations) {
            return;
        }
        const oldest = this.contexts.keys().next();
        if (!oldest.done) {
            console.log(`[Conversations] Evicting context for chat ${oldest.value}`);
            this.release(oldest.value);
        }
    }
}
