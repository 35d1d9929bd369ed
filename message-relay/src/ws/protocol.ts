// ---------------------------------------------------------------------------
// WebSocket JSON protocol
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { PushEvent } from "../types";
import type { RelayErrorCode } from "../errors";
import { contentSchema, directionSchema, idSchema as id } from "../schemas";

// ---------------------------------------------------------------------------
// Client -> Server requests
// ---------------------------------------------------------------------------

/** Echoed back on the response so clients can match replies. */
const requestId = z.string().max(64).optional();

export const clientFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("submit"), requestId, conversationId: id, content: contentSchema }),
  z.object({ type: z.literal("ack_delivered"), requestId, messageId: id }),
  z.object({ type: z.literal("ack_read"), requestId, messageId: id }),
  z.object({ type: z.literal("read_conversation"), requestId, conversationId: id }),
  z.object({
    type: z.literal("typing_start"),
    requestId,
    conversationId: id,
    ttlMs: z.number().int().positive().max(60_000).optional(),
  }),
  z.object({ type: z.literal("typing_stop"), requestId, conversationId: id }),
  z.object({
    type: z.literal("history"),
    requestId,
    conversationId: id,
    cursor: z.string().min(1).nullable().optional(),
    limit: z.number().int().positive().optional(),
    direction: directionSchema.optional(),
  }),
  z.object({ type: z.literal("presence"), requestId, userIds: z.array(id).min(1).max(200) }),
  z.object({ type: z.literal("conversations"), requestId }),
  z.object({ type: z.literal("health"), requestId }),
]);

export type WsRequest = z.infer<typeof clientFrameSchema>;

// ---------------------------------------------------------------------------
// Server -> Client responses (to a request)
// ---------------------------------------------------------------------------

export interface WsResponse {
  type: "response";
  requestType: WsRequest["type"];
  requestId?: string;
  data: unknown;
}

// ---------------------------------------------------------------------------
// Server -> Client error
// ---------------------------------------------------------------------------

export type WsErrorCode = RelayErrorCode | "internal_error";

export interface WsError {
  type: "error";
  requestType?: string;
  requestId?: string;
  code: WsErrorCode;
  message: string;
  retryable: boolean;
}

/** Everything the server writes to a socket. Pushes are the PushEvent union. */
export type WsServerFrame = PushEvent | WsResponse | WsError;
