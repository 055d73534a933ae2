/**
 * Moderation actions.
 *
 * Every action resolves its target first (missing → NOT_FOUND), asks the
 * permission policy once, then applies the effect through the
 * repositories.
 */

import type { PublicUser, User } from "@murmur/types";
import { toPublicUser } from "@murmur/types";
import { decide } from "@murmur/session";
import type { ModerationAction } from "@murmur/session";
import { ModerationError } from "./errors.js";
import type {
  ContentRepository,
  ModerationRepository,
  UserRepository,
} from "./repositories.js";
import { TIMEOUT_DURATIONS_MS } from "../types/dto.js";
import type { TimeoutDuration } from "../types/dto.js";
import { pageWindow, paginate } from "../types/pagination.js";
import type { PageQuery, PaginatedResponse } from "../types/pagination.js";

export interface ModerationServiceDeps {
  readonly users: UserRepository;
  readonly moderation: ModerationRepository;
  readonly content: ContentRepository;
  readonly now?: (() => number) | undefined;
}

export class ModerationService {
  private readonly _users: UserRepository;
  private readonly _moderation: ModerationRepository;
  private readonly _content: ContentRepository;
  private readonly _now: () => number;

  constructor(deps: ModerationServiceDeps) {
    this._users = deps.users;
    this._moderation = deps.moderation;
    this._content = deps.content;
    this._now = deps.now ?? Date.now;
  }

  // ─── Timeouts ────────────────────────────────────────────────────

  /**
   * @returns the ISO instant the timeout ends
   */
  async timeout(actor: User, targetId: string, duration: TimeoutDuration): Promise<string> {
    await this.authorizeOnUser(actor, targetId, "timeout");
    const until = new Date(this._now() + TIMEOUT_DURATIONS_MS[duration]).toISOString();
    await this._moderation.setTimeout(targetId, until);
    return until;
  }

  async removeTimeout(actor: User, targetId: string): Promise<void> {
    await this.authorizeOnUser(actor, targetId, "remove-timeout");
    await this._moderation.setTimeout(targetId, undefined);
  }

  async listTimedOut(
    actor: User,
    query: PageQuery,
  ): Promise<PaginatedResponse<PublicUser>> {
    authorize(actor, undefined, "list-timed-out");
    const now = new Date(this._now()).toISOString();
    const { users, total } = await this._moderation.listTimedOut(now, pageWindow(query));
    return paginate(users.map(toPublicUser), total, query);
  }

  // ─── Account state ───────────────────────────────────────────────

  async deactivate(actor: User, targetId: string): Promise<void> {
    await this.authorizeOnUser(actor, targetId, "deactivate");
    await this._moderation.setActive(targetId, false);
  }

  async activate(actor: User, targetId: string): Promise<void> {
    await this.authorizeOnUser(actor, targetId, "activate");
    await this._moderation.setActive(targetId, true);
  }

  async ban(actor: User, targetId: string): Promise<void> {
    await this.authorizeOnUser(actor, targetId, "ban");
    await this._moderation.ban(targetId);
  }

  async unban(actor: User, targetId: string): Promise<void> {
    await this.authorizeOnUser(actor, targetId, "unban");
    await this._moderation.unban(targetId);
  }

  // ─── Content ─────────────────────────────────────────────────────

  async deleteComment(actor: User, commentId: string): Promise<void> {
    const comment = await this._content.findComment(commentId);
    if (comment === undefined) {
      throw new ModerationError("NOT_FOUND", "comment not found");
    }
    authorize(actor, undefined, "delete-comment");
    await this._content.deleteComment(commentId);
  }

  async deletePost(actor: User, postId: string): Promise<void> {
    const post = await this._content.findPost(postId);
    if (post === undefined) {
      throw new ModerationError("NOT_FOUND", "post not found");
    }
    authorize(actor, undefined, "delete-post");
    await this._content.deletePost(postId);
  }

  // ─── Internals ───────────────────────────────────────────────────

  private async authorizeOnUser(
    actor: User,
    targetId: string,
    action: ModerationAction,
  ): Promise<User> {
    const target = await this._users.findById(targetId);
    if (target === undefined) {
      throw new ModerationError("NOT_FOUND", "user not found");
    }
    authorize(actor, target, action);
    return target;
  }
}

function authorize(
  actor: User,
  target: User | undefined,
  action: ModerationAction,
): void {
  const decision = decide(actor.role.level, target?.role.level, action);
  if (!decision.allow) {
    throw new ModerationError(decision.reason, decision.message);
  }
}
