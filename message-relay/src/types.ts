// ---------------------------------------------------------------------------
// Identities
// ---------------------------------------------------------------------------

export type UserId = string;
export type MessageId = string;
export type ConversationId = string;

// ---------------------------------------------------------------------------
// Conversation — tagged variant, resolved from its identifier
// ---------------------------------------------------------------------------

export type ConversationRef =
  | { kind: "direct"; id: ConversationId; participants: [UserId, UserId] }
  | { kind: "group"; id: ConversationId; groupId: string };

// ---------------------------------------------------------------------------
// Message content
// ---------------------------------------------------------------------------

export type MediaType = "image" | "audio" | "video" | "document";

export type MessageContent =
  | { kind: "text"; text: string }
  | {
      kind: "media";
      mediaType: MediaType;
      /** Identifier of the metadata record held by the media collaborator. */
      mediaId: string;
      caption?: string;
    };

// ---------------------------------------------------------------------------
// Delivery state — per message, per recipient
// ---------------------------------------------------------------------------

export type DeliveryStatus = "sent" | "delivered" | "read";

export interface RecipientDelivery {
  recipientId: UserId;
  status: DeliveryStatus;
  /** Unix milliseconds of each transition; null until reached. */
  sentAt: number;
  deliveredAt: number | null;
  readAt: number | null;
}

/** Result of a conditional status write. "stale" means the race was already won. */
export type TransitionOutcome = "applied" | "stale";

// ---------------------------------------------------------------------------
// Message — persisted; only `deliveries` mutates after append
// ---------------------------------------------------------------------------

export interface Message {
  /** Time-ordered ULID. */
  id: MessageId;
  conversationId: ConversationId;
  senderId: UserId;
  content: MessageContent;
  /** Unix milliseconds. */
  createdAt: number;
  /** Ordered as in the membership snapshot taken at send time. */
  deliveries: RecipientDelivery[];
}

// ---------------------------------------------------------------------------
// Pagination
// ---------------------------------------------------------------------------

export type PageDirection = "backward" | "forward";

/** Position in a conversation's total order (createdAt, id). */
export interface MessageAnchor {
  id: MessageId;
  createdAt: number;
}

export interface Page {
  /** Newest-first for backward pages, oldest-first for forward pages. */
  messages: Message[];
  nextCursor: string | null;
}

// ---------------------------------------------------------------------------
// Presence
// ---------------------------------------------------------------------------

export type PresenceStatus = "online" | "offline";

export interface TypingEntry {
  conversationId: ConversationId;
  expiresAt: number;
}

export interface PresenceRecord {
  userId: UserId;
  status: PresenceStatus;
  /** Unix milliseconds; null if the user was never seen by this process. */
  lastSeen: number | null;
  typing: TypingEntry[];
}

export type PresenceEvent =
  | { type: "presence"; userId: UserId; status: PresenceStatus; lastSeen: number }
  | {
      type: "typing";
      userId: UserId;
      conversationId: ConversationId;
      active: boolean;
    };

// ---------------------------------------------------------------------------
// PushEvent — everything the engine writes to a live connection
// ---------------------------------------------------------------------------

export type PushEvent =
  | { type: "new_message"; message: Message }
  | {
      type: "status_changed";
      messageId: MessageId;
      conversationId: ConversationId;
      recipientId: UserId;
      status: DeliveryStatus;
      at: number;
    }
  | {
      type: "presence_changed";
      userId: UserId;
      status: PresenceStatus;
      lastSeen: number;
    }
  | {
      type: "typing_changed";
      userId: UserId;
      conversationId: ConversationId;
      active: boolean;
    }
  | {
      type: "membership_changed";
      conversationId: ConversationId;
      change: MembershipChange;
      /** The member the change is about; the creator for "created". */
      userId: UserId;
      /** Membership after the change. */
      members: UserId[];
    };

export type MembershipChange = "created" | "member_added" | "member_removed";

// ---------------------------------------------------------------------------
// Connection — a live bidirectional link owned by a transport
// ---------------------------------------------------------------------------

export interface Connection {
  readonly id: string;
  readonly userId: UserId;
  /** Resolves once the transport has accepted the frame; rejects if closed. */
  send(event: PushEvent): Promise<void>;
  /** Liveness probe; the transport answers via ConnectionRegistry.touch(). */
  ping?(): void;
  close(): void;
}

// ---------------------------------------------------------------------------
// External boundaries
// ---------------------------------------------------------------------------

export interface PendingQuery {
  /** Maximum number of messages returned (newest kept). */
  limit: number;
  /** Ignore messages created before this Unix millisecond. */
  since: number;
}

/** Persistence collaborator. Conditional writes must be atomic. */
export interface MessageStore {
  append(message: Message): Promise<MessageId>;
  updateStatus(
    messageId: MessageId,
    recipientId: UserId,
    next: DeliveryStatus,
    at: number,
  ): Promise<"success" | "stale">;
  fetchRange(
    conversationId: ConversationId,
    anchor: MessageAnchor | null,
    limit: number,
    direction: PageDirection,
  ): Promise<Message[]>;
  /** The newest `limit` messages, oldest-first. */
  fetchContextWindow(
    conversationId: ConversationId,
    limit: number,
  ): Promise<Message[]>;
  getMessage(messageId: MessageId): Promise<Message | null>;
  /** Messages still `sent` for the recipient, oldest-first. */
  pendingFor(recipientId: UserId, query: PendingQuery): Promise<Message[]>;
  /** Messages in the conversation the reader has not yet read, oldest-first. */
  unreadFor(
    conversationId: ConversationId,
    readerId: UserId,
  ): Promise<Message[]>;
}

/** Group-management collaborator, consumed read-only. */
export interface MembershipDirectory {
  membersOf(conversationId: ConversationId): Promise<UserId[]>;
  conversationsOf(userId: UserId): Promise<ConversationId[]>;
}
