import { z } from "zod";

// ---------------------------------------------------------------------------
// Shared request schemas for the HTTP and WebSocket surfaces
// ---------------------------------------------------------------------------

export const idSchema = z.string().min(1);

export const directionSchema = z.enum(["backward", "forward"]);

export const contentSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), text: z.string().min(1).max(10_000) }),
  z.object({
    kind: z.literal("media"),
    mediaType: z.enum(["image", "audio", "video", "document"]),
    mediaId: idSchema,
    caption: z.string().max(1_000).optional(),
  }),
]);

/** First issue of a failed parse, prefixed with its path. */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid input";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
