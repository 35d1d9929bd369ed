import { Router, Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import type { IRelayService } from "../service";
import type { UserId } from "../types";
import { ValidationError } from "../errors";
import { groupConversationId } from "../conversations";
import { contentSchema, describeIssues, directionSchema, idSchema } from "../schemas";

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const submitBody = z.object({ content: contentSchema });

const historyQuery = z.object({
  cursor: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
  direction: directionSchema.optional(),
});

const cursorQuery = z.object({ direction: directionSchema.default("backward") });

const presenceQuery = z.object({ users: z.string().min(1) });

const createGroupBody = z.object({
  groupId: idSchema,
  members: z.array(idSchema).max(1_000).default([]),
});

const addMemberBody = z.object({ userId: idSchema });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

/** The acting user, set by the authentication layer in front of the relay. */
function actingUser(req: Request): UserId {
  const userId = req.get("x-user-id");
  if (!userId) {
    throw new ValidationError("X-User-Id header is required");
  }
  return userId;
}

/** Forward rejections to the global error handler. */
function route(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

/**
 * Creates an Express Router that maps HTTP endpoints to IRelayService
 * methods. The service is injected as a parameter.
 */
export function createApiRouter(service: IRelayService): Router {
  const router = Router();

  // POST /conversations/:id/messages — submit a message
  router.post(
    "/conversations/:id/messages",
    route(async (req, res) => {
      const { content } = parse(submitBody, req.body);
      const message = await service.submit(req.params.id, actingUser(req), content);
      res.status(201).json(message);
    }),
  );

  // GET /conversations — the caller's conversations, most recent first
  router.get(
    "/conversations",
    route((req, res) => {
      res.status(200).json(service.listConversations(actingUser(req)));
    }),
  );

  // GET /conversations/:id/messages — one page of history
  router.get(
    "/conversations/:id/messages",
    route(async (req, res) => {
      const query = parse(historyQuery, req.query);
      const page = await service.page(req.params.id, actingUser(req), query);
      res.status(200).json(page);
    }),
  );

  // GET /conversations/:id/messages/:messageId/cursor — jump into history
  router.get(
    "/conversations/:id/messages/:messageId/cursor",
    route(async (req, res) => {
      const { direction } = parse(cursorQuery, req.query);
      const cursor = await service.cursorAt(
        req.params.id,
        actingUser(req),
        req.params.messageId,
        direction,
      );
      res.status(200).json({ cursor });
    }),
  );

  // POST /conversations/:id/read — mark everything read
  router.post(
    "/conversations/:id/read",
    route(async (req, res) => {
      const updated = await service.markConversationRead(req.params.id, actingUser(req));
      res.status(200).json({ updated });
    }),
  );

  // POST /messages/:id/delivered and /messages/:id/read — acknowledgements
  router.post(
    "/messages/:id/delivered",
    route(async (req, res) => {
      const outcome = await service.acknowledgeDelivered(req.params.id, actingUser(req));
      res.status(200).json({ outcome });
    }),
  );

  router.post(
    "/messages/:id/read",
    route(async (req, res) => {
      const outcome = await service.acknowledgeRead(req.params.id, actingUser(req));
      res.status(200).json({ outcome });
    }),
  );

  // GET /presence?users=a,b — presence snapshot
  router.get(
    "/presence",
    route((req, res) => {
      const { users } = parse(presenceQuery, req.query);
      const userIds = users
        .split(",")
        .map((u) => u.trim())
        .filter((u) => u.length > 0);
      res.status(200).json(service.presenceOf(userIds));
    }),
  );

  // POST /groups — create a group with the caller as first member
  router.post(
    "/groups",
    route((req, res) => {
      const { groupId, members } = parse(createGroupBody, req.body);
      const summary = service.createGroup(groupId, actingUser(req), members);
      res.status(201).json(summary);
    }),
  );

  router.post(
    "/groups/:groupId/members",
    route((req, res) => {
      const { userId } = parse(addMemberBody, req.body);
      console.log(`[api] ${actingUser(req)} adds ${userId} to ${req.params.groupId}`);
      const added = service.addMember(groupConversationId(req.params.groupId), userId);
      res.status(added ? 201 : 200).json({ added });
    }),
  );

  router.delete(
    "/groups/:groupId/members/:userId",
    route((req, res) => {
      console.log(`[api] ${actingUser(req)} removes ${req.params.userId} from ${req.params.groupId}`);
      const removed = service.removeMember(
        groupConversationId(req.params.groupId),
        req.params.userId,
      );
      res.status(200).json({ removed });
    }),
  );

  // GET /health — health check
  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json(service.healthCheck());
  });

  return router;
}
