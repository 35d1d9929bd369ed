// ---------------------------------------------------------------------------
// WebSocket adapter — attaches to the HTTP server and bridges the service
// ---------------------------------------------------------------------------

import type { IncomingMessage, Server as HttpServer } from "http";
import { WebSocketServer, WebSocket } from "ws";
import type { RawData } from "ws";
import { ulid } from "ulidx";
import type { IRelayService } from "../service";
import type { Connection, PushEvent, UserId } from "../types";
import { RelayError, errorMessage } from "../errors";
import { describeIssues } from "../schemas";
import { clientFrameSchema } from "./protocol";
import type { WsError, WsRequest, WsResponse, WsServerFrame } from "./protocol";

// ---------------------------------------------------------------------------
// WsConnection — one socket as the relay sees it
// ---------------------------------------------------------------------------

export class WsConnection implements Connection {
  readonly id: string;

  constructor(
    readonly userId: UserId,
    private readonly ws: WebSocket,
  ) {
    this.id = `${userId}/${ulid()}`;
  }

  /** Resolves once the frame has been handed to the socket. */
  send(event: PushEvent): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new Error("socket is not open"));
        return;
      }
      this.ws.send(JSON.stringify(event), (err) => (err ? reject(err) : resolve()));
    });
  }

  ping(): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.ping();
    }
  }

  close(): void {
    this.ws.terminate();
  }
}

// ---------------------------------------------------------------------------
// attachWebSocket
// ---------------------------------------------------------------------------

export function attachWebSocket(server: HttpServer, service: IRelayService): WebSocketServer {
  const wss = new WebSocketServer({ server, path: "/ws" });

  // -----------------------------------------------------------------------
  // Connection handling
  // -----------------------------------------------------------------------

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const userId = new URL(req.url ?? "/", "http://localhost").searchParams.get("user");
    if (!userId) {
      ws.close(1008, "user query parameter is required");
      return;
    }

    const connection = new WsConnection(userId, ws);

    // Frames are handled only after the connection is registered, so a
    // response can never overtake the backlog replay it might depend on.
    const ready = service.connect(userId, connection).then(
      () => {
        console.log(`[ws] ${connection.id} connected`);
        return true;
      },
      (err: unknown) => {
        console.error(`[ws] ${connection.id} could not connect: ${errorMessage(err)}`);
        ws.close(1011, "connect failed");
        return false;
      },
    );

    ws.on("message", (raw: RawData) => {
      service.touch(connection);
      void ready.then((ok) => {
        if (ok) handleMessage(ws, raw, userId, service);
      });
    });

    ws.on("pong", () => service.touch(connection));

    ws.on("close", () => {
      service.disconnect(userId, connection);
      console.log(`[ws] ${connection.id} disconnected`);
    });

    ws.on("error", (err: Error) => {
      console.error(`[ws] socket error on ${connection.id}:`, err.message);
    });
  });

  console.log("[ws] WebSocket adapter attached on /ws");
  return wss;
}

// ---------------------------------------------------------------------------
// Request dispatcher
// ---------------------------------------------------------------------------

function handleMessage(
  ws: WebSocket,
  raw: RawData,
  userId: UserId,
  service: IRelayService,
): void {
  let json: unknown;
  try {
    json = JSON.parse(rawToString(raw));
  } catch {
    sendError(ws, { code: "validation_error", message: "malformed JSON", retryable: false });
    return;
  }

  const parsed = clientFrameSchema.safeParse(json);
  if (!parsed.success) {
    sendError(ws, {
      requestId: requestIdOf(json),
      code: "validation_error",
      message: `invalid frame: ${describeIssues(parsed.error)}`,
      retryable: false,
    });
    return;
  }

  const frame = parsed.data;
  void handleRequest(frame, userId, service).then(
    (data) => {
      const msg: WsResponse = {
        type: "response",
        requestType: frame.type,
        requestId: frame.requestId,
        data,
      };
      send(ws, msg);
    },
    (err: unknown) => {
      sendError(ws, { requestType: frame.type, requestId: frame.requestId, ...describeError(err) });
    },
  );
}

async function handleRequest(req: WsRequest, userId: UserId, service: IRelayService): Promise<unknown> {
  switch (req.type) {
    case "submit":
      return service.submit(req.conversationId, userId, req.content);
    case "ack_delivered":
      return { outcome: await service.acknowledgeDelivered(req.messageId, userId) };
    case "ack_read":
      return { outcome: await service.acknowledgeRead(req.messageId, userId) };
    case "read_conversation":
      return { updated: await service.markConversationRead(req.conversationId, userId) };
    case "typing_start":
      await service.setTyping(userId, req.conversationId, req.ttlMs);
      return null;
    case "typing_stop":
      service.clearTyping(userId, req.conversationId);
      return null;
    case "history":
      return service.page(req.conversationId, userId, {
        cursor: req.cursor,
        limit: req.limit,
        direction: req.direction,
      });
    case "presence":
      return service.presenceOf(req.userIds);
    case "conversations":
      return service.listConversations(userId);
    case "health":
      return service.healthCheck();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Best-effort request id from a frame that failed validation. */
function requestIdOf(json: unknown): string | undefined {
  if (typeof json === "object" && json !== null && "requestId" in json) {
    const { requestId } = json;
    return typeof requestId === "string" ? requestId : undefined;
  }
  return undefined;
}

function rawToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf-8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf-8");
  return Buffer.from(raw).toString("utf-8");
}

function describeError(err: unknown): Pick<WsError, "code" | "message" | "retryable"> {
  if (err instanceof RelayError) {
    return { code: err.code, message: err.message, retryable: err.retryable };
  }
  console.error("[ws] unhandled error:", err);
  return { code: "internal_error", message: "internal error", retryable: true };
}

function send(ws: WebSocket, frame: WsServerFrame): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(frame));
  }
}

function sendError(ws: WebSocket, error: Omit<WsError, "type">): void {
  send(ws, { type: "error", ...error });
}
