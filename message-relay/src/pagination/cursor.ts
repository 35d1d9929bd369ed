import { z } from "zod";
import type { ConversationId, MessageAnchor, PageDirection } from "../types";
import { InvalidCursor } from "../errors";

// ---------------------------------------------------------------------------
// Cursor — opaque to callers, anchored to a message, never to an offset
// ---------------------------------------------------------------------------

export interface CursorPayload {
  conversationId: ConversationId;
  anchor: MessageAnchor;
  direction: PageDirection;
}

const wireSchema = z.object({
  v: z.literal(1),
  c: z.string().min(1),
  m: z.string().min(1),
  t: z.number().int().nonnegative(),
  d: z.enum(["backward", "forward"]),
});

export function encodeCursor(payload: CursorPayload): string {
  const wire: z.infer<typeof wireSchema> = {
    v: 1,
    c: payload.conversationId,
    m: payload.anchor.id,
    t: payload.anchor.createdAt,
    d: payload.direction,
  };
  return Buffer.from(JSON.stringify(wire), "utf-8").toString("base64url");
}

export function decodeCursor(token: string): CursorPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, "base64url").toString("utf-8"));
  } catch {
    throw new InvalidCursor("cursor is not decodable");
  }

  const parsed = wireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidCursor("cursor is malformed");
  }

  const { c, m, t, d } = parsed.data;
  return { conversationId: c, anchor: { id: m, createdAt: t }, direction: d };
}
