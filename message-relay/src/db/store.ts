import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import type {
  ConversationId,
  DeliveryStatus,
  MembershipDirectory,
  Message,
  MessageAnchor,
  MessageContent,
  MessageId,
  MessageStore,
  PageDirection,
  PendingQuery,
  RecipientDelivery,
  UserId,
} from "../types";
import { parseConversationId } from "../conversations";

// ---------------------------------------------------------------------------
// Conversation summary row
// ---------------------------------------------------------------------------

export interface ConversationSummary {
  id: ConversationId;
  kind: "direct" | "group";
  /** ISO 8601. */
  firstSeenAt: string;
  /** ISO 8601; null for a group that has no messages yet. */
  lastMessageAt: string | null;
  messageCount: number;
}

/** A conversation as one member sees it. */
export interface MemberConversation extends ConversationSummary {
  /** Messages addressed to the member that are not yet read. */
  unreadCount: number;
}

const PREDECESSOR: Record<DeliveryStatus, DeliveryStatus | null> = {
  sent: null,
  delivered: "sent",
  read: "delivered",
};

// ---------------------------------------------------------------------------
// RelayStore — SQLite-backed persistence (better-sqlite3)
//
// Also answers the membership boundary: direct conversations record their
// participants on first append, groups are managed explicitly.
// ---------------------------------------------------------------------------

export class RelayStore implements MessageStore, MembershipDirectory {
  private db: Database.Database | null = null;
  private dbPath: string;

  /**
   * @param filePath  Path to the SQLite file. Pass `:memory:` or omit for
   *                  in-memory operation.
   */
  constructor(filePath?: string) {
    this.dbPath = filePath && filePath !== ":memory:" ? filePath : ":memory:";
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Create tables / indexes (idempotent) and open the database. */
  init(): void {
    if (this.dbPath !== ":memory:") {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);

    if (this.dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id              TEXT    PRIMARY KEY,
        conversation_id TEXT    NOT NULL,
        sender_id       TEXT    NOT NULL,
        content         TEXT    NOT NULL,
        created_at      INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation_order
        ON messages (conversation_id, created_at, id);

      CREATE TABLE IF NOT EXISTS deliveries (
        message_id   TEXT    NOT NULL REFERENCES messages (id),
        recipient_id TEXT    NOT NULL,
        position     INTEGER NOT NULL,
        status       TEXT    NOT NULL,
        sent_at      INTEGER NOT NULL,
        delivered_at INTEGER,
        read_at      INTEGER,
        PRIMARY KEY (message_id, recipient_id)
      );

      CREATE INDEX IF NOT EXISTS idx_deliveries_recipient_status
        ON deliveries (recipient_id, status);

      CREATE TABLE IF NOT EXISTS conversations (
        id              TEXT    PRIMARY KEY,
        kind            TEXT    NOT NULL,
        first_seen_at   TEXT    NOT NULL,
        last_message_at TEXT,
        message_count   INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS conversation_members (
        conversation_id TEXT    NOT NULL REFERENCES conversations (id),
        user_id         TEXT    NOT NULL,
        joined_at       INTEGER NOT NULL,
        PRIMARY KEY (conversation_id, user_id)
      );

      CREATE INDEX IF NOT EXISTS idx_members_user
        ON conversation_members (user_id);
    `);
  }

  /** Close the database connection. */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  // -----------------------------------------------------------------------
  // MessageStore — mutations
  // -----------------------------------------------------------------------

  /**
   * Atomically insert the message, its per-recipient rows and the
   * conversation bookkeeping. Throws if any part fails.
   */
  async append(message: Message): Promise<MessageId> {
    const db = this.getDb();

    const txn = db.transaction(() => {
      db.prepare(`
        INSERT INTO messages (id, conversation_id, sender_id, content, created_at)
        VALUES (@id, @conversationId, @senderId, @content, @createdAt)
      `).run({
        id: message.id,
        conversationId: message.conversationId,
        senderId: message.senderId,
        content: JSON.stringify(message.content),
        createdAt: message.createdAt,
      });

      const insertDelivery = db.prepare(`
        INSERT INTO deliveries
          (message_id, recipient_id, position, status, sent_at, delivered_at, read_at)
        VALUES
          (@messageId, @recipientId, @position, @status, @sentAt, @deliveredAt, @readAt)
      `);
      message.deliveries.forEach((d, position) => {
        insertDelivery.run({
          messageId: message.id,
          recipientId: d.recipientId,
          position,
          status: d.status,
          sentAt: d.sentAt,
          deliveredAt: d.deliveredAt,
          readAt: d.readAt,
        });
      });

      this.touchConversation(message);
    });

    txn();
    return message.id;
  }

  /**
   * Conditional write: only the immediate successor of the stored status is
   * accepted. Anything else (repeat, regression, skip) is reported stale.
   */
  async updateStatus(
    messageId: MessageId,
    recipientId: UserId,
    next: DeliveryStatus,
    at: number,
  ): Promise<"success" | "stale"> {
    const prev = PREDECESSOR[next];
    if (prev === null) return "stale";

    const result = this.getDb()
      .prepare(`
        UPDATE deliveries SET
          status       = @next,
          delivered_at = CASE WHEN @next = 'delivered' THEN @at ELSE delivered_at END,
          read_at      = CASE WHEN @next = 'read' THEN @at ELSE read_at END
        WHERE message_id = @messageId
          AND recipient_id = @recipientId
          AND status = @prev
      `)
      .run({ next, prev, at, messageId, recipientId });

    return result.changes === 1 ? "success" : "stale";
  }

  // -----------------------------------------------------------------------
  // MessageStore — queries
  // -----------------------------------------------------------------------

  /**
   * Messages strictly after (forward) or before (backward) the anchor, in
   * traversal order. A null anchor starts from the newest (backward) or the
   * oldest (forward) message.
   */
  async fetchRange(
    conversationId: ConversationId,
    anchor: MessageAnchor | null,
    limit: number,
    direction: PageDirection,
  ): Promise<Message[]> {
    const conditions = ["conversation_id = @conversationId"];
    if (anchor) {
      conditions.push(
        direction === "backward"
          ? "(created_at < @createdAt OR (created_at = @createdAt AND id < @id))"
          : "(created_at > @createdAt OR (created_at = @createdAt AND id > @id))",
      );
    }
    const order = direction === "backward" ? "DESC" : "ASC";

    const rows = this.getDb()
      .prepare(`
        SELECT * FROM messages
        WHERE ${conditions.join(" AND ")}
        ORDER BY created_at ${order}, id ${order}
        LIMIT @limit
      `)
      .all(
        anchor
          ? { conversationId, createdAt: anchor.createdAt, id: anchor.id, limit }
          : { conversationId, limit },
      );

    return this.hydrate(rows.map(toMessageRow));
  }

  async fetchContextWindow(
    conversationId: ConversationId,
    limit: number,
  ): Promise<Message[]> {
    const newestFirst = await this.fetchRange(conversationId, null, limit, "backward");
    return newestFirst.reverse();
  }

  async getMessage(messageId: MessageId): Promise<Message | null> {
    const row = this.getDb()
      .prepare("SELECT * FROM messages WHERE id = ?")
      .get(messageId);
    if (row === undefined) return null;
    const [message] = this.hydrate([toMessageRow(row)]);
    return message ?? null;
  }

  async pendingFor(recipientId: UserId, query: PendingQuery): Promise<Message[]> {
    const rows = this.getDb()
      .prepare(`
        SELECT m.* FROM deliveries d
        JOIN messages m ON m.id = d.message_id
        WHERE d.recipient_id = @recipientId
          AND d.status = 'sent'
          AND m.created_at >= @since
        ORDER BY m.created_at DESC, m.id DESC
        LIMIT @limit
      `)
      .all({ recipientId, since: query.since, limit: query.limit });

    return this.hydrate(rows.map(toMessageRow)).reverse();
  }

  async unreadFor(
    conversationId: ConversationId,
    readerId: UserId,
  ): Promise<Message[]> {
    const rows = this.getDb()
      .prepare(`
        SELECT m.* FROM deliveries d
        JOIN messages m ON m.id = d.message_id
        WHERE m.conversation_id = @conversationId
          AND d.recipient_id = @readerId
          AND d.status != 'read'
        ORDER BY m.created_at ASC, m.id ASC
      `)
      .all({ conversationId, readerId });

    return this.hydrate(rows.map(toMessageRow));
  }

  // -----------------------------------------------------------------------
  // MembershipDirectory
  // -----------------------------------------------------------------------

  /** Membership snapshot in join order. Unknown groups have no members. */
  async membersOf(conversationId: ConversationId): Promise<UserId[]> {
    const ref = parseConversationId(conversationId);
    if (ref.kind === "direct") {
      return [...ref.participants];
    }
    return this.groupMembers(conversationId);
  }

  /** Current members of a group in join order, read synchronously. */
  groupMembers(conversationId: ConversationId): UserId[] {
    const rows = this.getDb()
      .prepare(`
        SELECT user_id FROM conversation_members
        WHERE conversation_id = ?
        ORDER BY joined_at ASC, rowid ASC
      `)
      .all(conversationId);
    return rows.map((r) => readString(r, "user_id"));
  }

  async conversationsOf(userId: UserId): Promise<ConversationId[]> {
    const rows = this.getDb()
      .prepare(`
        SELECT conversation_id FROM conversation_members
        WHERE user_id = ?
        ORDER BY conversation_id ASC
      `)
      .all(userId);
    return rows.map((r) => readString(r, "conversation_id"));
  }

  // -----------------------------------------------------------------------
  // Group management stand-in
  // -----------------------------------------------------------------------

  createGroup(conversationId: ConversationId, members: UserId[]): ConversationSummary {
    const db = this.getDb();
    const now = Date.now();

    const txn = db.transaction(() => {
      db.prepare(`
        INSERT INTO conversations (id, kind, first_seen_at, last_message_at, message_count)
        VALUES (?, 'group', ?, NULL, 0)
      `).run(conversationId, new Date(now).toISOString());
      for (const userId of members) {
        this.insertMember(conversationId, userId, now);
      }
    });
    txn();

    return this.requireConversation(conversationId);
  }

  /** Returns false if the user was already a member. */
  addMember(conversationId: ConversationId, userId: UserId): boolean {
    this.requireConversation(conversationId);
    return this.insertMember(conversationId, userId, Date.now());
  }

  /** Returns false if the user was not a member. */
  removeMember(conversationId: ConversationId, userId: UserId): boolean {
    const result = this.getDb()
      .prepare(`
        DELETE FROM conversation_members
        WHERE conversation_id = ? AND user_id = ?
      `)
      .run(conversationId, userId);
    return result.changes === 1;
  }

  getConversation(conversationId: ConversationId): ConversationSummary | null {
    const row = this.getDb()
      .prepare("SELECT * FROM conversations WHERE id = ?")
      .get(conversationId);
    return row === undefined ? null : toConversationSummary(row);
  }

  /** The user's conversations, most recent activity first. */
  listConversations(userId: UserId): MemberConversation[] {
    const rows = this.getDb()
      .prepare(`
        SELECT c.*, (
          SELECT COUNT(*) FROM deliveries d
          JOIN messages m ON m.id = d.message_id
          WHERE m.conversation_id = c.id
            AND d.recipient_id = @userId
            AND d.status != 'read'
        ) AS unread_count
        FROM conversation_members cm
        JOIN conversations c ON c.id = cm.conversation_id
        WHERE cm.user_id = @userId
        ORDER BY COALESCE(c.last_message_at, c.first_seen_at) DESC, c.id ASC
      `)
      .all({ userId });
    return rows.map((row) => ({
      ...toConversationSummary(row),
      unreadCount: readNumber(row, "unread_count"),
    }));
  }

  /** Aggregate stats. */
  getStats(): { messageCount: number; conversationCount: number } {
    const db = this.getDb();
    const messages = db.prepare("SELECT COUNT(*) AS cnt FROM messages").get();
    const conversations = db.prepare("SELECT COUNT(*) AS cnt FROM conversations").get();
    return {
      messageCount: readNumber(messages, "cnt"),
      conversationCount: readNumber(conversations, "cnt"),
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private touchConversation(message: Message): void {
    const db = this.getDb();
    const ref = parseConversationId(message.conversationId);
    const at = new Date(message.createdAt).toISOString();

    db.prepare(`
      INSERT INTO conversations
        (id, kind, first_seen_at, last_message_at, message_count)
      VALUES
        (@id, @kind, @at, @at, 1)
      ON CONFLICT (id) DO UPDATE SET
        last_message_at = @at,
        message_count   = message_count + 1
    `).run({ id: message.conversationId, kind: ref.kind, at });

    if (ref.kind === "direct") {
      for (const userId of ref.participants) {
        this.insertMember(message.conversationId, userId, message.createdAt);
      }
    }
  }

  private insertMember(
    conversationId: ConversationId,
    userId: UserId,
    joinedAt: number,
  ): boolean {
    const result = this.getDb()
      .prepare(`
        INSERT OR IGNORE INTO conversation_members (conversation_id, user_id, joined_at)
        VALUES (?, ?, ?)
      `)
      .run(conversationId, userId, joinedAt);
    return result.changes === 1;
  }

  private requireConversation(conversationId: ConversationId): ConversationSummary {
    const convo = this.getConversation(conversationId);
    if (!convo) {
      throw new Error(`RelayStore: conversation ${conversationId} does not exist`);
    }
    return convo;
  }

  /** Attach per-recipient rows (in snapshot order) to message rows. */
  private hydrate(rows: MessageRow[]): Message[] {
    if (rows.length === 0) return [];

    const placeholders = rows.map(() => "?").join(", ");
    const deliveryRows = this.getDb()
      .prepare(`
        SELECT * FROM deliveries
        WHERE message_id IN (${placeholders})
        ORDER BY message_id, position
      `)
      .all(...rows.map((r) => r.id));

    const byMessage = new Map<MessageId, RecipientDelivery[]>();
    for (const raw of deliveryRows) {
      const messageId = readString(raw, "message_id");
      const list = byMessage.get(messageId) ?? [];
      list.push(toRecipientDelivery(raw));
      byMessage.set(messageId, list);
    }

    return rows.map((r) => ({
      id: r.id,
      conversationId: r.conversationId,
      senderId: r.senderId,
      content: r.content,
      createdAt: r.createdAt,
      deliveries: byMessage.get(r.id) ?? [],
    }));
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new Error("RelayStore: database not initialised — call init() first");
    }
    return this.db;
  }
}

// ---------------------------------------------------------------------------
// Row-to-interface mappers (snake_case -> camelCase)
// ---------------------------------------------------------------------------

interface MessageRow {
  id: MessageId;
  conversationId: ConversationId;
  senderId: UserId;
  content: MessageContent;
  createdAt: number;
}

function isRecord(row: unknown): row is Record<string, unknown> {
  return typeof row === "object" && row !== null;
}

function readString(row: unknown, column: string): string {
  const value = isRecord(row) ? row[column] : undefined;
  if (typeof value !== "string") {
    throw new Error(`RelayStore: column ${column} is not text`);
  }
  return value;
}

function readNumber(row: unknown, column: string): number {
  const value = isRecord(row) ? row[column] : undefined;
  if (typeof value !== "number") {
    throw new Error(`RelayStore: column ${column} is not numeric`);
  }
  return value;
}

function readNullableNumber(row: unknown, column: string): number | null {
  const value = isRecord(row) ? row[column] : undefined;
  return value === null || value === undefined ? null : readNumber(row, column);
}

function readStatus(row: unknown): DeliveryStatus {
  const value = readString(row, "status");
  if (value === "sent" || value === "delivered" || value === "read") {
    return value;
  }
  throw new Error(`RelayStore: unknown delivery status ${value}`);
}

function toMessageRow(row: unknown): MessageRow {
  return {
    id: readString(row, "id"),
    conversationId: readString(row, "conversation_id"),
    senderId: readString(row, "sender_id"),
    content: parseContent(readString(row, "content")),
    createdAt: readNumber(row, "created_at"),
  };
}

function parseContent(raw: string): MessageContent {
  const parsed: unknown = JSON.parse(raw);
  if (isRecord(parsed)) {
    if (parsed.kind === "text" && typeof parsed.text === "string") {
      return { kind: "text", text: parsed.text };
    }
    if (
      parsed.kind === "media" &&
      typeof parsed.mediaId === "string" &&
      (parsed.mediaType === "image" ||
        parsed.mediaType === "audio" ||
        parsed.mediaType === "video" ||
        parsed.mediaType === "document")
    ) {
      return {
        kind: "media",
        mediaType: parsed.mediaType,
        mediaId: parsed.mediaId,
        ...(typeof parsed.caption === "string" ? { caption: parsed.caption } : {}),
      };
    }
  }
  throw new Error("RelayStore: unreadable message content");
}

function toRecipientDelivery(row: unknown): RecipientDelivery {
  return {
    recipientId: readString(row, "recipient_id"),
    status: readStatus(row),
    sentAt: readNumber(row, "sent_at"),
    deliveredAt: readNullableNumber(row, "delivered_at"),
    readAt: readNullableNumber(row, "read_at"),
  };
}

function toConversationSummary(row: unknown): ConversationSummary {
  const kind = readString(row, "kind");
  const lastMessageAt = isRecord(row) ? row.last_message_at : null;
  return {
    id: readString(row, "id"),
    kind: kind === "group" ? "group" : "direct",
    firstSeenAt: readString(row, "first_seen_at"),
    lastMessageAt: typeof lastMessageAt === "string" ? lastMessageAt : null,
    messageCount: readNumber(row, "message_count"),
  };
}
