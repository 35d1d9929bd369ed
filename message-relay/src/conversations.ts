import type { ConversationId, ConversationRef, UserId } from "./types";
import { ValidationError } from "./errors";

const DIRECT_PREFIX = "dm:";
const GROUP_PREFIX = "group:";

/** Stable id for the direct conversation between two users, in either order. */
export function directConversationId(a: UserId, b: UserId): ConversationId {
  if (!a || !b) {
    throw new ValidationError("direct conversation needs two participants");
  }
  if (a === b) {
    throw new ValidationError("direct conversation participants must differ");
  }
  if (a.includes(":") || b.includes(":")) {
    throw new ValidationError("user ids may not contain ':'");
  }
  const [first, second] = a < b ? [a, b] : [b, a];
  return `${DIRECT_PREFIX}${first}:${second}`;
}

export function groupConversationId(groupId: string): ConversationId {
  if (!groupId) {
    throw new ValidationError("groupId is required");
  }
  return `${GROUP_PREFIX}${groupId}`;
}

/** Parse an identifier back into its tagged variant. */
export function parseConversationId(id: ConversationId): ConversationRef {
  if (id.startsWith(DIRECT_PREFIX)) {
    const parts = id.slice(DIRECT_PREFIX.length).split(":");
    if (parts.length === 2 && parts[0] && parts[1] && parts[0] < parts[1]) {
      return { kind: "direct", id, participants: [parts[0], parts[1]] };
    }
  } else if (id.startsWith(GROUP_PREFIX)) {
    const groupId = id.slice(GROUP_PREFIX.length);
    if (groupId) {
      return { kind: "group", id, groupId };
    }
  }
  throw new ValidationError(`malformed conversation id: ${id}`);
}
