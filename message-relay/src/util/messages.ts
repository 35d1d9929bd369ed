import type { Message, MessageAnchor } from "../types";

/** Total order within a conversation: creation time, then id. */
export function compareMessages(a: MessageAnchor, b: MessageAnchor): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function cloneMessage(message: Message): Message {
  return {
    ...message,
    content: { ...message.content },
    deliveries: message.deliveries.map((d) => ({ ...d })),
  };
}
