import { EventEmitter } from "events";
import type { Connection, UserId } from "../types";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface ConnectedEvent {
  userId: UserId;
  connection: Connection;
  /** True when this is the user's only live connection. */
  first: boolean;
}

export type DisconnectReason = "closed" | "heartbeat" | "push_failed" | "shutdown";

export interface DisconnectedEvent {
  userId: UserId;
  connection: Connection;
  /** True when the user has no live connection left. */
  last: boolean;
  reason: DisconnectReason;
}

export interface ConnectionRegistryOptions {
  /** How often live connections are pinged and checked. */
  heartbeatIntervalMs: number;
  /** Silence longer than this unregisters the connection. */
  heartbeatTimeoutMs: number;
  clock?: () => number;
}

interface LiveConnection {
  connection: Connection;
  lastHeartbeat: number;
}

export interface ConnectionRegistry {
  on(event: "connected", listener: (e: ConnectedEvent) => void): this;
  on(event: "disconnected", listener: (e: DisconnectedEvent) => void): this;
  emit(event: "connected", e: ConnectedEvent): boolean;
  emit(event: "disconnected", e: DisconnectedEvent): boolean;
}

// ---------------------------------------------------------------------------
// ConnectionRegistry — user -> live connections, process-local
//
// Per-user entries are created on first connect and reaped on the last
// disconnect. Listeners run synchronously inside register/unregister, so a
// "connected" listener can queue work on the connection before any other
// push reaches it.
// ---------------------------------------------------------------------------

export class ConnectionRegistry extends EventEmitter {
  private readonly users = new Map<UserId, Map<string, LiveConnection>>();
  private readonly options: Required<ConnectionRegistryOptions>;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ConnectionRegistryOptions) {
    super();
    this.options = { ...options, clock: options.clock ?? (() => Date.now()) };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Start periodic liveness probing. Idempotent. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.probe(), this.options.heartbeatIntervalMs);
    this.timer.unref();
  }

  /** Stop probing, then unregister and close every live connection. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const { connection } of this.allConnections()) {
      this.unregister(connection.userId, connection, "shutdown");
      connection.close();
    }
  }

  // -----------------------------------------------------------------------
  // Contract
  // -----------------------------------------------------------------------

  register(userId: UserId, connection: Connection): void {
    let connections = this.users.get(userId);
    if (!connections) {
      connections = new Map();
      this.users.set(userId, connections);
    }
    if (connections.has(connection.id)) return;

    connections.set(connection.id, {
      connection,
      lastHeartbeat: this.options.clock(),
    });
    console.log(`[registry] ${userId} connected (${connection.id}, ${connections.size} live)`);
    this.emit("connected", { userId, connection, first: connections.size === 1 });
  }

  unregister(
    userId: UserId,
    connection: Connection,
    reason: DisconnectReason = "closed",
  ): void {
    const connections = this.users.get(userId);
    if (!connections || !connections.delete(connection.id)) return;

    const last = connections.size === 0;
    if (last) {
      this.users.delete(userId);
    }
    console.log(`[registry] ${userId} disconnected (${connection.id}, ${reason})`);
    this.emit("disconnected", { userId, connection, last, reason });
  }

  connectionsFor(userId: UserId): Set<Connection> {
    const connections = this.users.get(userId);
    return new Set(connections ? [...connections.values()].map((l) => l.connection) : []);
  }

  isOnline(userId: UserId): boolean {
    return this.users.has(userId);
  }

  // -----------------------------------------------------------------------
  // Liveness
  // -----------------------------------------------------------------------

  /** Record a heartbeat (pong or any inbound frame) for a connection. */
  touch(connection: Connection): void {
    const live = this.users.get(connection.userId)?.get(connection.id);
    if (live) {
      live.lastHeartbeat = this.options.clock();
    }
  }

  /**
   * Unregister and close every connection silent for longer than the
   * timeout; ping the rest.
   */
  probe(): void {
    const now = this.options.clock();
    for (const live of this.allConnections()) {
      const { connection } = live;
      if (now - live.lastHeartbeat > this.options.heartbeatTimeoutMs) {
        console.warn(`[registry] heartbeat timeout for ${connection.userId} (${connection.id})`);
        this.unregister(connection.userId, connection, "heartbeat");
        connection.close();
      } else {
        connection.ping?.();
      }
    }
  }

  // -----------------------------------------------------------------------
  // Observability
  // -----------------------------------------------------------------------

  onlineUsers(): UserId[] {
    return [...this.users.keys()];
  }

  connectionCount(userId?: UserId): number {
    if (userId !== undefined) {
      return this.users.get(userId)?.size ?? 0;
    }
    let total = 0;
    for (const connections of this.users.values()) {
      total += connections.size;
    }
    return total;
  }

  private allConnections(): LiveConnection[] {
    return [...this.users.values()].flatMap((connections) => [...connections.values()]);
  }
}
