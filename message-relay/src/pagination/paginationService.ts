import type {
  ConversationId,
  Message,
  MessageAnchor,
  MessageId,
  MessageStore,
  Page,
  PageDirection,
} from "../types";
import type { ConversationCache } from "../cache/conversationCache";
import { InvalidCursor, MessageNotFound, ValidationError } from "../errors";
import { decodeCursor, encodeCursor } from "./cursor";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PaginationOptions {
  defaultLimit: number;
  maxLimit: number;
}

export interface PageRequest {
  cursor?: string | null;
  limit?: number;
  /** Defaults to the cursor's direction, or backward from the newest. */
  direction?: PageDirection;
  /** Read straight from the store. */
  bypassCache?: boolean;
}

// ---------------------------------------------------------------------------
// PaginationService
// ---------------------------------------------------------------------------

export class PaginationService {
  constructor(
    private readonly store: MessageStore,
    private readonly cache: ConversationCache,
    private readonly options: PaginationOptions = { defaultLimit: 20, maxLimit: 100 },
  ) {}

  /**
   * One page of history. Backward pages are newest-first, forward pages
   * oldest-first; `nextCursor` continues in the same direction and is null
   * once the end is reached.
   */
  async page(conversationId: ConversationId, request: PageRequest = {}): Promise<Page> {
    const limit = this.resolveLimit(request.limit);

    let anchor: MessageAnchor | null = null;
    let direction: PageDirection = request.direction ?? "backward";
    if (request.cursor) {
      const cursor = decodeCursor(request.cursor);
      if (cursor.conversationId !== conversationId) {
        throw new InvalidCursor("cursor belongs to another conversation");
      }
      await this.requireAnchor(conversationId, cursor.anchor);
      anchor = cursor.anchor;
      direction = request.direction ?? cursor.direction;
    }

    const cached = request.bypassCache
      ? null
      : await this.fromCache(conversationId, anchor, limit + 1, direction);
    const fetched =
      cached ?? (await this.store.fetchRange(conversationId, anchor, limit + 1, direction));

    const messages = fetched.slice(0, limit);
    const last = messages[messages.length - 1];
    const nextCursor =
      fetched.length > limit && last
        ? encodeCursor({
            conversationId,
            anchor: { id: last.id, createdAt: last.createdAt },
            direction,
          })
        : null;

    return { messages, nextCursor };
  }

  /** Cursor positioned at a message, for jumping into history. */
  async cursorAt(
    conversationId: ConversationId,
    messageId: MessageId,
    direction: PageDirection,
  ): Promise<string> {
    const message = this.cache.peek(messageId) ?? (await this.store.getMessage(messageId));
    if (!message || message.conversationId !== conversationId) {
      throw new MessageNotFound(messageId);
    }
    return encodeCursor({
      conversationId,
      anchor: { id: message.id, createdAt: message.createdAt },
      direction,
    });
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private resolveLimit(limit: number | undefined): number {
    if (limit === undefined) return this.options.defaultLimit;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("page: limit must be a positive integer");
    }
    return Math.min(limit, this.options.maxLimit);
  }

  private async requireAnchor(
    conversationId: ConversationId,
    anchor: MessageAnchor,
  ): Promise<void> {
    const message = this.cache.peek(anchor.id) ?? (await this.store.getMessage(anchor.id));
    if (
      !message ||
      message.conversationId !== conversationId ||
      message.createdAt !== anchor.createdAt
    ) {
      throw new InvalidCursor("cursor anchor no longer exists");
    }
  }

  /**
   * Serve from the cached window when it unambiguously covers the range,
   * otherwise null. The window is the newest contiguous run of messages,
   * so anything newer than a cached anchor is cached as well.
   */
  private async fromCache(
    conversationId: ConversationId,
    anchor: MessageAnchor | null,
    count: number,
    direction: PageDirection,
  ): Promise<Message[] | null> {
    const window = await this.cache.window(conversationId);
    const messages = window.messages;
    const index = anchor ? messages.findIndex((m) => m.id === anchor.id) : -1;
    if (anchor && index === -1) return null;

    if (direction === "backward") {
      const older = anchor ? messages.slice(0, index) : messages;
      if (older.length < count && !window.complete) return null;
      return older.slice(Math.max(0, older.length - count)).reverse();
    }

    if (!anchor) {
      return window.complete ? messages.slice(0, count) : null;
    }
    return messages.slice(index + 1, index + 1 + count);
  }
}
