import type {
  ConversationId,
  Message,
  MessageId,
  MessageStore,
} from "../types";
import { KeyedSerial } from "../util/keyedSerial";
import { cloneMessage, compareMessages } from "../util/messages";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConversationCacheOptions {
  /** Messages kept per conversation. */
  capacity: number;
  /** Conversations kept before the least recently used one is dropped. */
  maxConversations: number;
  clock?: () => number;
}

export interface CacheWindow {
  /** Contiguous run of the newest messages, oldest-first. */
  messages: Message[];
  /** True when the window holds the conversation's entire history. */
  complete: boolean;
  warmedAt: number;
}

interface CacheEntry {
  messages: Message[];
  complete: boolean;
  warmedAt: number;
}

// ---------------------------------------------------------------------------
// ConversationCache — write-through projection of the newest messages
//
// Every mutation for a conversation runs on that conversation's serial lane,
// so a fill and a put or status refresh can never interleave. Status is never
// written here directly: it is re-read from the store after the store
// confirmed the transition.
// ---------------------------------------------------------------------------

export class ConversationCache {
  private readonly entries = new Map<ConversationId, CacheEntry>();
  private readonly locations = new Map<MessageId, ConversationId>();
  private readonly lanes = new KeyedSerial();
  private readonly capacity: number;
  private readonly maxConversations: number;
  private readonly clock: () => number;

  constructor(
    private readonly store: MessageStore,
    options: ConversationCacheOptions,
  ) {
    if (options.capacity < 1) {
      throw new Error("ConversationCache: capacity must be at least 1");
    }
    this.capacity = options.capacity;
    this.maxConversations = Math.max(1, options.maxConversations);
    this.clock = options.clock ?? (() => Date.now());
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  /** Recent messages, oldest-first. Warms a cold conversation first. */
  async get(conversationId: ConversationId): Promise<Message[]> {
    return (await this.window(conversationId)).messages;
  }

  async window(conversationId: ConversationId): Promise<CacheWindow> {
    return this.lanes.run(conversationId, async () => {
      const entry = await this.ensure(conversationId);
      return {
        messages: entry.messages.map(cloneMessage),
        complete: entry.complete,
        warmedAt: entry.warmedAt,
      };
    });
  }

  /** Cached copy of one message, without touching the store. */
  peek(messageId: MessageId): Message | null {
    const conversationId = this.locations.get(messageId);
    if (conversationId === undefined) return null;
    const found = this.entries
      .get(conversationId)
      ?.messages.find((m) => m.id === messageId);
    return found ? cloneMessage(found) : null;
  }

  isWarm(conversationId: ConversationId): boolean {
    return this.entries.has(conversationId);
  }

  stats(): { conversations: number; messages: number } {
    return { conversations: this.entries.size, messages: this.locations.size };
  }

  // -----------------------------------------------------------------------
  // Writes
  // -----------------------------------------------------------------------

  async warm(conversationId: ConversationId): Promise<void> {
    await this.lanes.run(conversationId, async () => {
      await this.ensure(conversationId);
    });
  }

  /**
   * Apply a persisted message. Cold conversations are left cold: their next
   * read fills from the store, which already holds the message.
   */
  async put(message: Message): Promise<void> {
    await this.lanes.run(message.conversationId, async () => {
      const entry = this.entries.get(message.conversationId);
      if (!entry) return;
      this.insert(entry, message);
    });
  }

  /**
   * Re-read a cached message's per-recipient state from the store. Pass the
   * conversation when it is known: the refresh then queues behind a fill that
   * is still loading, which may have read the message before the transition.
   */
  async invalidateStatus(
    messageId: MessageId,
    conversationId = this.locations.get(messageId),
  ): Promise<void> {
    if (conversationId === undefined) return;

    await this.lanes.run(conversationId, async () => {
      const entry = this.entries.get(conversationId);
      const index = entry ? entry.messages.findIndex((m) => m.id === messageId) : -1;
      if (!entry || index === -1) return;

      const fresh = await this.store.getMessage(messageId);
      if (fresh) {
        entry.messages[index] = fresh;
      } else {
        // The projection no longer matches the store; rebuild it on next read.
        this.drop(conversationId);
        console.warn(`[cache] ${messageId} vanished from the store; dropped ${conversationId}`);
      }
    });
  }

  evict(conversationId: ConversationId): void {
    this.drop(conversationId);
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async ensure(conversationId: ConversationId): Promise<CacheEntry> {
    const existing = this.entries.get(conversationId);
    if (existing) {
      // Refresh LRU position.
      this.entries.delete(conversationId);
      this.entries.set(conversationId, existing);
      return existing;
    }

    const fetched = await this.store.fetchContextWindow(conversationId, this.capacity + 1);
    const complete = fetched.length <= this.capacity;
    const entry: CacheEntry = {
      messages: complete ? fetched : fetched.slice(fetched.length - this.capacity),
      complete,
      warmedAt: this.clock(),
    };

    this.entries.set(conversationId, entry);
    for (const m of entry.messages) {
      this.locations.set(m.id, conversationId);
    }

    while (this.entries.size > this.maxConversations) {
      const oldest = this.entries.keys().next().value;
      if (oldest === undefined) break;
      this.drop(oldest);
    }

    return entry;
  }

  private insert(entry: CacheEntry, message: Message): void {
    if (entry.messages.some((m) => m.id === message.id)) return;

    let index = entry.messages.length;
    while (index > 0 && compareMessages(entry.messages[index - 1], message) > 0) {
      index--;
    }
    entry.messages.splice(index, 0, cloneMessage(message));
    this.locations.set(message.id, message.conversationId);

    while (entry.messages.length > this.capacity) {
      const evicted = entry.messages.shift();
      if (evicted) this.locations.delete(evicted.id);
      entry.complete = false;
    }
  }

  private drop(conversationId: ConversationId): void {
    const entry = this.entries.get(conversationId);
    if (!entry) return;
    for (const m of entry.messages) {
      this.locations.delete(m.id);
    }
    this.entries.delete(conversationId);
  }
}
