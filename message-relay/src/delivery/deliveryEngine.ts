import { monotonicFactory } from "ulidx";
import type {
  Connection,
  ConversationId,
  DeliveryStatus,
  MembershipDirectory,
  Message,
  MessageContent,
  MessageId,
  MessageStore,
  PushEvent,
  TransitionOutcome,
  UserId,
} from "../types";
import type { ConnectionRegistry } from "../registry/connectionRegistry";
import type { PresenceTracker } from "../presence/presenceTracker";
import type { ConversationCache } from "../cache/conversationCache";
import {
  MembershipSnapshotUnavailable,
  MessageNotFound,
  PersistenceFailure,
  RelayError,
  ValidationError,
  errorMessage,
} from "../errors";
import { parseConversationId } from "../conversations";
import { KeyedSerial } from "../util/keyedSerial";
import { cloneMessage } from "../util/messages";
import { ConnectionOutbox } from "./outbox";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DeliveryEngineOptions {
  /** A push not accepted within this window counts as failed. */
  pushTimeoutMs: number;
  /** Most unacknowledged messages replayed to a fresh connection. */
  backlogLimit: number;
  /** Unacknowledged messages older than this are not replayed. */
  backlogMaxAgeMs: number;
  clock?: () => number;
}

export interface DeliveryEngineDeps {
  store: MessageStore;
  directory: MembershipDirectory;
  cache: ConversationCache;
  registry: ConnectionRegistry;
  presence: PresenceTracker;
}

// ---------------------------------------------------------------------------
// DeliveryEngine — submit -> persist -> fan-out -> per-recipient status
// ---------------------------------------------------------------------------

export class DeliveryEngine {
  private readonly outboxes = new Map<string, ConnectionOutbox>();
  private readonly conversations = new KeyedSerial();
  private readonly inflight = new Set<Promise<void>>();
  private readonly generateId = monotonicFactory();
  private readonly clock: () => number;

  constructor(
    private readonly deps: DeliveryEngineDeps,
    private readonly options: DeliveryEngineOptions,
  ) {
    this.clock = options.clock ?? (() => Date.now());
    deps.registry.on("connected", (e) => this.attach(e.connection));
    deps.registry.on("disconnected", (e) => this.detach(e.connection));
  }

  // -----------------------------------------------------------------------
  // Submit
  // -----------------------------------------------------------------------

  /**
   * Persist a message in `sent` for every member of the snapshot except the
   * sender, then push it to their live connections. Resolves once the
   * message is durable; pushes continue in the background.
   */
  async submit(
    conversationId: ConversationId,
    senderId: UserId,
    content: MessageContent,
  ): Promise<Message> {
    parseConversationId(conversationId);
    if (!senderId) {
      throw new ValidationError("submit: senderId is required");
    }
    validateContent(content);

    // One submit per conversation at a time: creation order is persist
    // order is enqueue order on every connection.
    return this.conversations.run(conversationId, async () => {
      const members = await this.snapshot(conversationId);
      if (!members.includes(senderId)) {
        throw new ValidationError(`submit: ${senderId} is not a member of ${conversationId}`);
      }

      const createdAt = this.clock();
      const recipients = [...new Set(members)].filter((m) => m !== senderId);
      const message: Message = {
        id: this.generateId(createdAt),
        conversationId,
        senderId,
        content,
        createdAt,
        deliveries: recipients.map((recipientId) => ({
          recipientId,
          status: "sent",
          sentAt: createdAt,
          deliveredAt: null,
          readAt: null,
        })),
      };

      try {
        await this.deps.store.append(message);
      } catch (err: unknown) {
        console.error(`[delivery] append failed for ${conversationId}: ${errorMessage(err)}`);
        throw new PersistenceFailure(`submit: message to ${conversationId} was not persisted`, err);
      }

      await this.deps.cache.put(message);
      this.deps.presence.clearTyping(senderId, conversationId);
      this.fanOut(message);
      return cloneMessage(message);
    });
  }

  // -----------------------------------------------------------------------
  // Acknowledgements
  // -----------------------------------------------------------------------

  async acknowledgeDelivered(messageId: MessageId, recipientId: UserId): Promise<TransitionOutcome> {
    const message = await this.requireRecipient(messageId, recipientId);
    return this.advance(message, recipientId, "delivered");
  }

  /** Records `delivered` first when the client skipped that acknowledgement. */
  async acknowledgeRead(messageId: MessageId, recipientId: UserId): Promise<TransitionOutcome> {
    const message = await this.requireRecipient(messageId, recipientId);
    return this.readThrough(message, recipientId);
  }

  /** Mark every unread message in the conversation read. Returns how many changed. */
  async markConversationRead(conversationId: ConversationId, readerId: UserId): Promise<number> {
    parseConversationId(conversationId);
    const unread = await this.persisted("unreadFor", () =>
      this.deps.store.unreadFor(conversationId, readerId),
    );

    let applied = 0;
    for (const message of unread) {
      if ((await this.readThrough(message, readerId)) === "applied") {
        applied++;
      }
    }
    return applied;
  }

  // -----------------------------------------------------------------------
  // Ephemeral pushes
  // -----------------------------------------------------------------------

  /** Push a non-persistent event to every live connection of a user. */
  pushToUser(userId: UserId, event: PushEvent): void {
    for (const connection of this.deps.registry.connectionsFor(userId)) {
      const outbox = this.outboxes.get(connection.id);
      if (outbox) {
        this.track(outbox.push(event), `push ${event.type} to ${connection.id}`);
      }
    }
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Resolves once every queued push and backlog replay has settled. */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  stats(): { outboxes: number; inflight: number } {
    return { outboxes: this.outboxes.size, inflight: this.inflight.size };
  }

  // -----------------------------------------------------------------------
  // Internal — fan-out and redelivery
  // -----------------------------------------------------------------------

  private fanOut(message: Message): void {
    for (const delivery of message.deliveries) {
      for (const connection of this.deps.registry.connectionsFor(delivery.recipientId)) {
        const outbox = this.outboxes.get(connection.id);
        if (!outbox) continue;
        this.track(
          outbox.push({ type: "new_message", message: cloneMessage(message) }),
          `push ${message.id} to ${connection.id}`,
        );
      }
    }
  }

  /** New connection: replay the user's unacknowledged backlog before anything else. */
  private attach(connection: Connection): void {
    const outbox = new ConnectionOutbox(connection, this.options.pushTimeoutMs, (err) => {
      console.warn(`[delivery] ${err.message}`);
      this.deps.registry.unregister(connection.userId, connection, "push_failed");
      connection.close();
    });
    this.outboxes.set(connection.id, outbox);

    const replay = outbox.replay(async (send) => {
      const backlog = await this.deps.store.pendingFor(connection.userId, {
        limit: this.options.backlogLimit,
        since: this.clock() - this.options.backlogMaxAgeMs,
      });
      let pushed = 0;
      for (const message of backlog) {
        if (!(await send({ type: "new_message", message }))) break;
        pushed++;
      }
      if (backlog.length > 0) {
        console.log(`[delivery] redelivered ${pushed}/${backlog.length} to ${connection.id}`);
      }
    });
    this.track(replay, `backlog for ${connection.id}`);
  }

  private detach(connection: Connection): void {
    const outbox = this.outboxes.get(connection.id);
    if (!outbox) return;
    outbox.cancel();
    this.outboxes.delete(connection.id);
  }

  private track(work: Promise<unknown>, label: string): void {
    const settled = work.then(
      () => undefined,
      (err: unknown) => {
        console.error(`[delivery] ${label} failed: ${errorMessage(err)}`);
      },
    );
    this.inflight.add(settled);
    void settled.then(() => this.inflight.delete(settled));
  }

  // -----------------------------------------------------------------------
  // Internal — state machine
  // -----------------------------------------------------------------------

  private async readThrough(message: Message, recipientId: UserId): Promise<TransitionOutcome> {
    const current = message.deliveries.find((d) => d.recipientId === recipientId);
    if (current?.status === "sent") {
      await this.advance(message, recipientId, "delivered");
    }
    return this.advance(message, recipientId, "read");
  }

  /**
   * One conditional write. A stale result means a concurrent call already
   * made (or passed) this transition; it is not an error.
   */
  private async advance(
    message: Message,
    recipientId: UserId,
    next: DeliveryStatus,
  ): Promise<TransitionOutcome> {
    const at = this.clock();
    const result = await this.persisted("updateStatus", () =>
      this.deps.store.updateStatus(message.id, recipientId, next, at),
    );
    if (result === "stale") {
      return "stale";
    }

    await this.deps.cache.invalidateStatus(message.id, message.conversationId);
    this.pushToUser(message.senderId, {
      type: "status_changed",
      messageId: message.id,
      conversationId: message.conversationId,
      recipientId,
      status: next,
      at,
    });
    return "applied";
  }

  private async requireRecipient(messageId: MessageId, recipientId: UserId): Promise<Message> {
    const message = await this.persisted("getMessage", () =>
      this.deps.store.getMessage(messageId),
    );
    if (!message) {
      throw new MessageNotFound(messageId);
    }
    if (!message.deliveries.some((d) => d.recipientId === recipientId)) {
      throw new ValidationError(`${recipientId} is not a recipient of ${messageId}`);
    }
    return message;
  }

  private async snapshot(conversationId: ConversationId): Promise<UserId[]> {
    try {
      return await this.deps.directory.membersOf(conversationId);
    } catch (err: unknown) {
      if (err instanceof RelayError) throw err;
      console.error(`[delivery] membership lookup failed for ${conversationId}: ${errorMessage(err)}`);
      throw new MembershipSnapshotUnavailable(conversationId, err);
    }
  }

  private async persisted<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err: unknown) {
      if (err instanceof RelayError) throw err;
      throw new PersistenceFailure(`${operation} failed: ${errorMessage(err)}`, err);
    }
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateContent(content: MessageContent): void {
  if (content.kind === "text") {
    if (!content.text || content.text.trim().length === 0) {
      throw new ValidationError("submit: text is required");
    }
    return;
  }
  if (!content.mediaId) {
    throw new ValidationError("submit: mediaId is required");
  }
}
