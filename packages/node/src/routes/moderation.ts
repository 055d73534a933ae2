/**
 * Moderation routes. Every route requires a session.
 *
 * POST   /api/v1/action/timeout/:userId      Time a user out
 * DELETE /api/v1/action/timeout/:userId      Lift a timeout
 * GET    /api/v1/action/timeout              List timed-out users
 * DELETE /api/v1/action/deactivate/:userId   Deactivate a user
 * POST   /api/v1/action/activate/:userId     Activate a user
 * POST   /api/v1/action/ban/:userId          Ban (deactivates, deletes posts)
 * POST   /api/v1/action/unban/:userId        Unban
 * DELETE /api/v1/action/comment/:commentId   Delete a comment
 * DELETE /api/v1/action/post/:postId         Delete a post
 */

import { Hono } from "hono";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import {
  CommentIdParamSchema,
  PageQuerySchema,
  PostIdParamSchema,
  TimeoutSchema,
  UserIdParamSchema,
} from "../types/dto.js";
import {
  validateBody,
  validateParams,
  validateQuery,
} from "../middleware/validate.js";
import type { ModerationService } from "../services/moderation-service.js";

export interface ModerationRouteDeps {
  readonly moderation: ModerationService;
  readonly session: MiddlewareHandler<AppEnv>;
  readonly logger: Logger;
}

export function createModerationRoutes(deps: ModerationRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { moderation, logger } = deps;

  routes.use("*", deps.session);

  // POST /timeout/:userId
  routes.post(
    "/timeout/:userId",
    validateParams(UserIdParamSchema),
    validateBody(TimeoutSchema),
    async (c) => {
      const actor = c.get("user");
      const { userId } = c.req.valid("param");
      const { timeoutDuration } = c.req.valid("json");

      const timeoutUntil = await moderation.timeout(actor, userId, timeoutDuration);
      logger.info(
        { actorId: actor.id, targetId: userId, timeoutDuration, timeoutUntil },
        "User timed out",
      );
      return c.json({
        message: "User Timed Out Successfully",
        data: { userId, timeoutUntil },
      });
    },
  );

  // DELETE /timeout/:userId
  routes.delete("/timeout/:userId", validateParams(UserIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { userId } = c.req.valid("param");
    await moderation.removeTimeout(actor, userId);
    logger.info({ actorId: actor.id, targetId: userId }, "Timeout removed");
    return c.json({ message: "Timeout Removed Successfully" });
  });

  // GET /timeout
  routes.get("/timeout", validateQuery(PageQuerySchema), async (c) => {
    const page = await moderation.listTimedOut(c.get("user"), c.req.valid("query"));
    return c.json(page);
  });

  // DELETE /deactivate/:userId
  routes.delete("/deactivate/:userId", validateParams(UserIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { userId } = c.req.valid("param");
    await moderation.deactivate(actor, userId);
    logger.info({ actorId: actor.id, targetId: userId }, "User deactivated");
    return c.json({ message: "User Deactivated Successfully" });
  });

  // POST /activate/:userId
  routes.post("/activate/:userId", validateParams(UserIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { userId } = c.req.valid("param");
    await moderation.activate(actor, userId);
    logger.info({ actorId: actor.id, targetId: userId }, "User activated");
    return c.json({ message: "User Activated Successfully" });
  });

  // POST /ban/:userId
  routes.post("/ban/:userId", validateParams(UserIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { userId } = c.req.valid("param");
    await moderation.ban(actor, userId);
    logger.info({ actorId: actor.id, targetId: userId }, "User banned");
    return c.json({ message: "User Banned Successfully" });
  });

  // POST /unban/:userId
  routes.post("/unban/:userId", validateParams(UserIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { userId } = c.req.valid("param");
    await moderation.unban(actor, userId);
    logger.info({ actorId: actor.id, targetId: userId }, "User unbanned");
    return c.json({ message: "User Unbanned Successfully" });
  });

  // DELETE /comment/:commentId
  routes.delete("/comment/:commentId", validateParams(CommentIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { commentId } = c.req.valid("param");
    await moderation.deleteComment(actor, commentId);
    logger.info({ actorId: actor.id, commentId }, "Comment deleted");
    return c.json({ message: "Comment Deleted Successfully" });
  });

  // DELETE /post/:postId
  routes.delete("/post/:postId", validateParams(PostIdParamSchema), async (c) => {
    const actor = c.get("user");
    const { postId } = c.req.valid("param");
    await moderation.deletePost(actor, postId);
    logger.info({ actorId: actor.id, postId }, "Post deleted");
    return c.json({ message: "Post Deleted Successfully" });
  });

  return routes;
}
