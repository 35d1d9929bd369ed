import type {
  Connection,
  ConversationId,
  MembershipChange,
  Message,
  MessageContent,
  MessageId,
  Page,
  PageDirection,
  PresenceEvent,
  PresenceRecord,
  PushEvent,
  TransitionOutcome,
  UserId,
} from "./types";
import type { RelayConfig } from "./config";
import type { ConversationSummary, MemberConversation, RelayStore } from "./db/store";
import { ConnectionRegistry } from "./registry/connectionRegistry";
import { PresenceTracker, type PresenceObserver } from "./presence/presenceTracker";
import { ConversationCache } from "./cache/conversationCache";
import { DeliveryEngine } from "./delivery/deliveryEngine";
import { PaginationService, type PageRequest } from "./pagination/paginationService";
import { groupConversationId, parseConversationId } from "./conversations";
import { ConversationNotFound, ValidationError, errorMessage } from "./errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RelayServiceOptions = Pick<
  RelayConfig,
  "heartbeat" | "delivery" | "cache" | "pagination" | "typing"
> & { clock?: () => number };

export interface RelayHealth {
  ok: boolean;
  messageCount: number;
  conversationCount: number;
  onlineUsers: number;
  connections: number;
  cachedConversations: number;
}

/** What the HTTP and WebSocket surfaces need from the relay. */
export interface IRelayService {
  submit(conversationId: ConversationId, senderId: UserId, content: MessageContent): Promise<Message>;
  acknowledgeDelivered(messageId: MessageId, recipientId: UserId): Promise<TransitionOutcome>;
  acknowledgeRead(messageId: MessageId, recipientId: UserId): Promise<TransitionOutcome>;
  markConversationRead(conversationId: ConversationId, readerId: UserId): Promise<number>;
  setTyping(userId: UserId, conversationId: ConversationId, ttlMs?: number): Promise<void>;
  clearTyping(userId: UserId, conversationId: ConversationId): void;
  page(conversationId: ConversationId, viewerId: UserId, request?: PageRequest): Promise<Page>;
  cursorAt(
    conversationId: ConversationId,
    viewerId: UserId,
    messageId: MessageId,
    direction: PageDirection,
  ): Promise<string>;
  presenceOf(userIds: UserId[]): PresenceRecord[];
  listConversations(userId: UserId): MemberConversation[];
  createGroup(groupId: string, creatorId: UserId, members: UserId[]): ConversationSummary;
  addMember(conversationId: ConversationId, userId: UserId): boolean;
  removeMember(conversationId: ConversationId, userId: UserId): boolean;
  connect(userId: UserId, connection: Connection): Promise<void>;
  disconnect(userId: UserId, connection: Connection): void;
  touch(connection: Connection): void;
  healthCheck(): RelayHealth;
}

// ---------------------------------------------------------------------------
// PresenceFeed — one per online user, forwards presence to their connections
// ---------------------------------------------------------------------------

class PresenceFeed implements PresenceObserver {
  private readonly subscriptions = new Map<ConversationId, () => void>();

  constructor(
    readonly userId: UserId,
    private readonly presence: PresenceTracker,
    private readonly push: (event: PushEvent) => void,
  ) {}

  notify(event: PresenceEvent): void {
    this.push(
      event.type === "presence"
        ? { type: "presence_changed", userId: event.userId, status: event.status, lastSeen: event.lastSeen }
        : {
            type: "typing_changed",
            userId: event.userId,
            conversationId: event.conversationId,
            active: event.active,
          },
    );
  }

  follow(conversationId: ConversationId): void {
    if (this.subscriptions.has(conversationId)) return;
    this.subscriptions.set(conversationId, this.presence.subscribe(this, conversationId));
  }

  unfollow(conversationId: ConversationId): void {
    this.subscriptions.get(conversationId)?.();
    this.subscriptions.delete(conversationId);
  }

  close(): void {
    for (const unsubscribe of this.subscriptions.values()) unsubscribe();
    this.subscriptions.clear();
  }
}

// ---------------------------------------------------------------------------
// RelayService — wires the components and enforces membership at the edge
// ---------------------------------------------------------------------------

export class RelayService implements IRelayService {
  readonly registry: ConnectionRegistry;
  readonly presence: PresenceTracker;
  readonly cache: ConversationCache;
  readonly engine: DeliveryEngine;
  readonly pagination: PaginationService;

  private readonly feeds = new Map<UserId, PresenceFeed>();
  private readonly joining = new Map<UserId, Promise<void>>();

  constructor(
    private readonly store: RelayStore,
    options: RelayServiceOptions,
  ) {
    const clock = options.clock;
    this.registry = new ConnectionRegistry({
      heartbeatIntervalMs: options.heartbeat.intervalMs,
      heartbeatTimeoutMs: options.heartbeat.timeoutMs,
      clock,
    });
    this.presence = new PresenceTracker({
      typingTtlMs: options.typing.ttlMs,
      reannounceMs: options.typing.reannounceMs,
      sweepIntervalMs: options.typing.sweepIntervalMs,
      clock,
    });
    this.cache = new ConversationCache(store, { ...options.cache, clock });
    this.engine = new DeliveryEngine(
      { store, directory: store, cache: this.cache, registry: this.registry, presence: this.presence },
      { ...options.delivery, clock },
    );
    this.pagination = new PaginationService(store, this.cache, options.pagination);

    this.registry.on("connected", (e) => {
      if (e.first) this.join(e.userId);
    });
    this.registry.on("disconnected", (e) => {
      if (e.last) this.leave(e.userId);
    });
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    this.registry.start();
    this.presence.start();
  }

  /** Close every connection and wait for queued pushes to settle. */
  async stop(): Promise<void> {
    this.presence.stop();
    this.registry.stop();
    await Promise.all([...this.joining.values()]);
    await this.engine.flush();
  }

  // -----------------------------------------------------------------------
  // Connections
  // -----------------------------------------------------------------------

  /** Register a connection; resolves once the user's presence is wired. */
  async connect(userId: UserId, connection: Connection): Promise<void> {
    if (!userId) {
      throw new ValidationError("connect: userId is required");
    }
    this.registry.register(userId, connection);
    await this.joining.get(userId);
  }

  disconnect(userId: UserId, connection: Connection): void {
    this.registry.unregister(userId, connection, "closed");
  }

  touch(connection: Connection): void {
    this.registry.touch(connection);
  }

  // -----------------------------------------------------------------------
  // Messaging
  // -----------------------------------------------------------------------

  async submit(
    conversationId: ConversationId,
    senderId: UserId,
    content: MessageContent,
  ): Promise<Message> {
    const message = await this.engine.submit(conversationId, senderId, content);
    // A first direct message creates the conversation: start sharing presence.
    for (const userId of [senderId, ...message.deliveries.map((d) => d.recipientId)]) {
      this.feeds.get(userId)?.follow(conversationId);
    }
    return message;
  }

  acknowledgeDelivered(messageId: MessageId, recipientId: UserId): Promise<TransitionOutcome> {
    return this.engine.acknowledgeDelivered(messageId, recipientId);
  }

  acknowledgeRead(messageId: MessageId, recipientId: UserId): Promise<TransitionOutcome> {
    return this.engine.acknowledgeRead(messageId, recipientId);
  }

  markConversationRead(conversationId: ConversationId, readerId: UserId): Promise<number> {
    return this.engine.markConversationRead(conversationId, readerId);
  }

  // -----------------------------------------------------------------------
  // Presence
  // -----------------------------------------------------------------------

  async setTyping(userId: UserId, conversationId: ConversationId, ttlMs?: number): Promise<void> {
    await this.requireMember(conversationId, userId);
    this.presence.setTyping(userId, conversationId, ttlMs);
  }

  clearTyping(userId: UserId, conversationId: ConversationId): void {
    this.presence.clearTyping(userId, conversationId);
  }

  presenceOf(userIds: UserId[]): PresenceRecord[] {
    return [...new Set(userIds)].map((userId) => this.presence.presenceOf(userId));
  }

  // -----------------------------------------------------------------------
  // History
  // -----------------------------------------------------------------------

  async page(
    conversationId: ConversationId,
    viewerId: UserId,
    request: PageRequest = {},
  ): Promise<Page> {
    await this.requireMember(conversationId, viewerId);
    return this.pagination.page(conversationId, request);
  }

  async cursorAt(
    conversationId: ConversationId,
    viewerId: UserId,
    messageId: MessageId,
    direction: PageDirection,
  ): Promise<string> {
    await this.requireMember(conversationId, viewerId);
    return this.pagination.cursorAt(conversationId, messageId, direction);
  }

  // -----------------------------------------------------------------------
  // Conversations
  // -----------------------------------------------------------------------

  listConversations(userId: UserId): MemberConversation[] {
    if (!userId) {
      throw new ValidationError("listConversations: userId is required");
    }
    return this.store.listConversations(userId);
  }

  // -----------------------------------------------------------------------
  // Groups
  // -----------------------------------------------------------------------

  createGroup(groupId: string, creatorId: UserId, members: UserId[]): ConversationSummary {
    if (!creatorId) {
      throw new ValidationError("createGroup: creatorId is required");
    }
    if (groupId.includes(":")) {
      throw new ValidationError("createGroup: groupId may not contain ':'");
    }
    const conversationId = groupConversationId(groupId);
    if (this.store.getConversation(conversationId)) {
      throw new ValidationError(`createGroup: ${conversationId} already exists`);
    }

    const everyone = [...new Set([creatorId, ...members.filter((m) => m.length > 0)])];
    const summary = this.store.createGroup(conversationId, everyone);
    for (const userId of everyone) {
      this.feeds.get(userId)?.follow(conversationId);
    }
    console.log(`[relay] created ${conversationId} with ${everyone.length} members`);
    this.announceMembership(conversationId, "created", creatorId, everyone, everyone);
    return summary;
  }

  /** Returns false if the user was already a member. */
  addMember(conversationId: ConversationId, userId: UserId): boolean {
    this.requireGroup(conversationId);
    if (!userId) {
      throw new ValidationError("addMember: userId is required");
    }
    const added = this.store.addMember(conversationId, userId);
    this.feeds.get(userId)?.follow(conversationId);
    if (added) {
      const members = this.store.groupMembers(conversationId);
      this.announceMembership(conversationId, "member_added", userId, members, members);
    }
    return added;
  }

  /** Returns false if the user was not a member. */
  removeMember(conversationId: ConversationId, userId: UserId): boolean {
    this.requireGroup(conversationId);
    const removed = this.store.removeMember(conversationId, userId);
    this.feeds.get(userId)?.unfollow(conversationId);
    this.presence.clearTyping(userId, conversationId);
    if (removed) {
      const members = this.store.groupMembers(conversationId);
      this.announceMembership(conversationId, "member_removed", userId, members, [...members, userId]);
    }
    return removed;
  }

  // -----------------------------------------------------------------------
  // Health
  // -----------------------------------------------------------------------

  healthCheck(): RelayHealth {
    return {
      ok: true,
      ...this.store.getStats(),
      onlineUsers: this.registry.onlineUsers().length,
      connections: this.registry.connectionCount(),
      cachedConversations: this.cache.stats().conversations,
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private join(userId: UserId): void {
    const feed = new PresenceFeed(userId, this.presence, (event) =>
      this.engine.pushToUser(userId, event),
    );
    this.feeds.set(userId, feed);

    const joined = this.store
      .conversationsOf(userId)
      .then(
        (conversations) => {
          if (this.feeds.get(userId) !== feed) return;
          for (const conversationId of conversations) feed.follow(conversationId);
          this.presence.setOnline(userId);
        },
        (err: unknown) => {
          console.error(`[presence] could not load conversations of ${userId}: ${errorMessage(err)}`);
          if (this.feeds.get(userId) === feed) this.presence.setOnline(userId);
        },
      )
      .finally(() => {
        if (this.joining.get(userId) === joined) this.joining.delete(userId);
      });
    this.joining.set(userId, joined);
  }

  private leave(userId: UserId): void {
    const feed = this.feeds.get(userId);
    this.feeds.delete(userId);
    // Announce before unsubscribing: the audience is found through the feed.
    this.presence.setOffline(userId);
    feed?.close();
  }

  /** Tell every affected online member about a membership change. */
  private announceMembership(
    conversationId: ConversationId,
    change: MembershipChange,
    userId: UserId,
    members: UserId[],
    audience: UserId[],
  ): void {
    for (const recipient of audience) {
      this.engine.pushToUser(recipient, {
        type: "membership_changed",
        conversationId,
        change,
        userId,
        members: [...members],
      });
    }
  }

  private async requireMember(conversationId: ConversationId, userId: UserId): Promise<void> {
    const members = await this.store.membersOf(conversationId);
    if (!members.includes(userId)) {
      throw new ValidationError(`${userId} is not a member of ${conversationId}`);
    }
  }

  private requireGroup(conversationId: ConversationId): void {
    if (parseConversationId(conversationId).kind !== "group") {
      throw new ValidationError(`${conversationId} is not a group`);
    }
    if (!this.store.getConversation(conversationId)) {
      throw new ConversationNotFound(conversationId);
    }
  }
}
