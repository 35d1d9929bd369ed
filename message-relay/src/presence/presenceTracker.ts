/**
 * Presence and typing state, process-local.
 *
 * Presence transitions reach only observers subscribed to a conversation the
 * subject belongs to. Typing entries expire on their own: every read checks
 * the expiry, and a periodic sweep turns elapsed entries into a "stopped"
 * event. Nothing here throws to callers; a failing observer loses the event.
 */

import type {
  ConversationId,
  PresenceEvent,
  PresenceRecord,
  PresenceStatus,
  TypingEntry,
  UserId,
} from "../types";
import { errorMessage } from "../errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PresenceObserver {
  /** The user the observer delivers to; never sent its own signals. */
  readonly userId: UserId;
  notify(event: PresenceEvent): void;
}

export interface PresenceTrackerOptions {
  /** TTL used when setTyping is called without one. */
  typingTtlMs: number;
  /** A refresh inside this window extends the TTL without a new event. */
  reannounceMs: number;
  sweepIntervalMs: number;
  clock?: () => number;
}

interface TypingState {
  expiresAt: number;
  announcedAt: number;
}

interface UserState {
  status: PresenceStatus;
  lastSeen: number;
}

// ---------------------------------------------------------------------------
// PresenceTracker
// ---------------------------------------------------------------------------

export class PresenceTracker {
  private readonly users = new Map<UserId, UserState>();
  private readonly typing = new Map<UserId, Map<ConversationId, TypingState>>();
  private readonly subscribers = new Map<ConversationId, Set<PresenceObserver>>();
  /** Per user: followed conversation -> how many of the user's observers follow it. */
  private readonly following = new Map<UserId, Map<ConversationId, number>>();
  private readonly options: Required<PresenceTrackerOptions>;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: PresenceTrackerOptions) {
    this.options = { ...options, clock: options.clock ?? (() => Date.now()) };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  // -----------------------------------------------------------------------
  // Presence
  // -----------------------------------------------------------------------

  setOnline(userId: UserId): void {
    this.transition(userId, "online");
  }

  setOffline(userId: UserId): void {
    const entries = this.typing.get(userId);
    if (entries) {
      for (const conversationId of [...entries.keys()]) {
        this.clearTyping(userId, conversationId);
      }
    }
    this.transition(userId, "offline");
  }

  presenceOf(userId: UserId): PresenceRecord {
    const state = this.users.get(userId);
    const now = this.options.clock();
    const typing: TypingEntry[] = [];
    for (const [conversationId, entry] of this.typing.get(userId) ?? []) {
      if (entry.expiresAt > now) {
        typing.push({ conversationId, expiresAt: entry.expiresAt });
      }
    }
    return {
      userId,
      status: state?.status ?? "offline",
      lastSeen: state?.lastSeen ?? null,
      typing,
    };
  }

  // -----------------------------------------------------------------------
  // Typing
  // -----------------------------------------------------------------------

  setTyping(userId: UserId, conversationId: ConversationId, ttlMs?: number): void {
    const ttl = ttlMs !== undefined && ttlMs > 0 ? ttlMs : this.options.typingTtlMs;
    const now = this.options.clock();

    let entries = this.typing.get(userId);
    if (!entries) {
      entries = new Map();
      this.typing.set(userId, entries);
    }

    const existing = entries.get(conversationId);
    if (existing && existing.expiresAt > now) {
      existing.expiresAt = now + ttl;
      if (now - existing.announcedAt >= this.options.reannounceMs) {
        existing.announcedAt = now;
        this.publishTyping(userId, conversationId, true);
      }
      return;
    }

    entries.set(conversationId, { expiresAt: now + ttl, announcedAt: now });
    this.publishTyping(userId, conversationId, true);
  }

  clearTyping(userId: UserId, conversationId: ConversationId): void {
    const entries = this.typing.get(userId);
    if (!entries || !entries.delete(conversationId)) return;
    if (entries.size === 0) {
      this.typing.delete(userId);
    }
    this.publishTyping(userId, conversationId, false);
  }

  isTyping(userId: UserId, conversationId: ConversationId): boolean {
    const entry = this.typing.get(userId)?.get(conversationId);
    return entry !== undefined && entry.expiresAt > this.options.clock();
  }

  /** Users currently typing in the conversation. */
  typingIn(conversationId: ConversationId): UserId[] {
    const now = this.options.clock();
    const result: UserId[] = [];
    for (const [userId, entries] of this.typing) {
      const entry = entries.get(conversationId);
      if (entry && entry.expiresAt > now) {
        result.push(userId);
      }
    }
    return result;
  }

  /** Drop elapsed typing entries, emitting "stopped" for each. */
  sweep(): void {
    const now = this.options.clock();
    for (const [userId, entries] of [...this.typing]) {
      for (const [conversationId, entry] of [...entries]) {
        if (entry.expiresAt <= now) {
          this.clearTyping(userId, conversationId);
        }
      }
    }
  }

  // -----------------------------------------------------------------------
  // Subscriptions
  // -----------------------------------------------------------------------

  /** Deliver presence and typing events relevant to a conversation. */
  subscribe(observer: PresenceObserver, conversationId: ConversationId): () => void {
    let observers = this.subscribers.get(conversationId);
    if (!observers) {
      observers = new Set();
      this.subscribers.set(conversationId, observers);
    }
    if (observers.has(observer)) {
      return () => undefined;
    }
    observers.add(observer);
    this.follow(observer.userId, conversationId, 1);

    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const current = this.subscribers.get(conversationId);
      if (!current) return;
      current.delete(observer);
      if (current.size === 0) {
        this.subscribers.delete(conversationId);
      }
      this.follow(observer.userId, conversationId, -1);
    };
  }

  /** Conversations the user's own observers are subscribed to. */
  conversationsOf(userId: UserId): ConversationId[] {
    return [...(this.following.get(userId)?.keys() ?? [])];
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private follow(userId: UserId, conversationId: ConversationId, delta: 1 | -1): void {
    let counts = this.following.get(userId);
    if (!counts) {
      counts = new Map();
      this.following.set(userId, counts);
    }
    const count = (counts.get(conversationId) ?? 0) + delta;
    if (count > 0) {
      counts.set(conversationId, count);
    } else {
      counts.delete(conversationId);
      if (counts.size === 0) this.following.delete(userId);
    }
  }

  private transition(userId: UserId, status: PresenceStatus): void {
    const state = this.users.get(userId);
    if (state?.status === status) return;

    const lastSeen = this.options.clock();
    this.users.set(userId, { status, lastSeen });

    // Everyone sharing at least one conversation with the subject, once.
    const audience = new Set<PresenceObserver>();
    for (const conversationId of this.conversationsOf(userId)) {
      for (const observer of this.subscribers.get(conversationId) ?? []) {
        if (observer.userId !== userId) audience.add(observer);
      }
    }
    this.deliver(audience, { type: "presence", userId, status, lastSeen });
  }

  private publishTyping(
    userId: UserId,
    conversationId: ConversationId,
    active: boolean,
  ): void {
    const audience = new Set<PresenceObserver>();
    for (const observer of this.subscribers.get(conversationId) ?? []) {
      if (observer.userId !== userId) audience.add(observer);
    }
    this.deliver(audience, { type: "typing", userId, conversationId, active });
  }

  private deliver(audience: Iterable<PresenceObserver>, event: PresenceEvent): void {
    for (const observer of audience) {
      try {
        observer.notify(event);
      } catch (err: unknown) {
        console.warn(`[presence] dropped ${event.type} event for ${observer.userId}: ${errorMessage(err)}`);
      }
    }
  }
}
