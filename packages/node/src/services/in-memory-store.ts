/**
 * In-memory store.
 *
 * Implements every repository contract over plain Maps, with seeding
 * helpers and an outage switch for tests. Not durable; single process
 * only.
 */

import { randomUUID } from "node:crypto";
import type { RoleLevel, User } from "@murmur/types";
import { roleOf } from "@murmur/types";
import { RepositoryError } from "./errors.js";
import type {
  ContentRef,
  ContentRepository,
  ModerationRepository,
  NewUser,
  Pingable,
  TimedOutPage,
  UserRepository,
} from "./repositories.js";
import type { PageWindow } from "../types/pagination.js";

interface StoredComment extends ContentRef {
  readonly postId: string;
}

export class InMemoryStore
  implements UserRepository, ModerationRepository, ContentRepository, Pingable
{
  private readonly _users = new Map<string, User>();
  private readonly _posts = new Map<string, ContentRef>();
  private readonly _comments = new Map<string, StoredComment>();
  private readonly _now: () => number;
  private _available = true;

  constructor(now: () => number = Date.now) {
    this._now = now;
  }

  // ─── Users ───────────────────────────────────────────────────────

  findById(id: string): Promise<User | undefined> {
    return this.read(() => this._users.get(id));
  }

  findByIdentifier(identifier: string): Promise<User | undefined> {
    const needle = identifier.toLowerCase();
    return this.read(() =>
      [...this._users.values()].find(
        (u) => u.username.toLowerCase() === needle || u.email.toLowerCase() === needle,
      ),
    );
  }

  async create(input: NewUser): Promise<User> {
    const byName = await this.findByIdentifier(input.username);
    const byEmail = await this.findByIdentifier(input.email);
    if (byName !== undefined || byEmail !== undefined) {
      throw new RepositoryError("DUPLICATE_USER", "username or email already registered");
    }

    const now = this.timestamp();
    const user: User = {
      id: randomUUID(),
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      role: roleOf(1),
      banned: false,
      isActive: false,
      createdAt: now,
      updatedAt: now,
    };
    this._users.set(user.id, user);
    return user;
  }

  setActivationToken(userId: string, token: string, expiry: string): Promise<void> {
    return this.update(userId, { activationToken: token, activationTokenExpiry: expiry });
  }

  activate(userId: string): Promise<void> {
    return this.update(userId, {
      isActive: true,
      activationToken: undefined,
      activationTokenExpiry: undefined,
    });
  }

  setResetToken(userId: string, token: string, expiry: string): Promise<void> {
    return this.update(userId, { passwordResetToken: token, resetTokenExpiry: expiry });
  }

  updatePassword(userId: string, passwordHash: string): Promise<void> {
    return this.update(userId, {
      passwordHash,
      passwordResetToken: undefined,
      resetTokenExpiry: undefined,
    });
  }

  // ─── Moderation ──────────────────────────────────────────────────

  setTimeout(userId: string, until: string | undefined): Promise<void> {
    return this.update(userId, { timeoutUntil: until });
  }

  listTimedOut(now: string, window: PageWindow): Promise<TimedOutPage> {
    const cutoff = Date.parse(now);
    return this.read(() => {
      const matching = [...this._users.values()]
        .filter((u) => u.timeoutUntil !== undefined && Date.parse(u.timeoutUntil) > cutoff)
        .sort((a, b) => (a.timeoutUntil ?? "").localeCompare(b.timeoutUntil ?? ""));
      return {
        users: matching.slice(window.offset, window.offset + window.limit),
        total: matching.length,
      };
    });
  }

  setActive(userId: string, active: boolean): Promise<void> {
    return this.update(userId, { isActive: active });
  }

  async ban(userId: string): Promise<void> {
    await this.update(userId, { banned: true, isActive: false });
    for (const post of [...this._posts.values()]) {
      if (post.authorId === userId) this.removePost(post.id);
    }
  }

  unban(userId: string): Promise<void> {
    return this.update(userId, { banned: false });
  }

  // ─── Content ─────────────────────────────────────────────────────

  findPost(postId: string): Promise<ContentRef | undefined> {
    return this.read(() => this._posts.get(postId));
  }

  findComment(commentId: string): Promise<ContentRef | undefined> {
    return this.read(() => this._comments.get(commentId));
  }

  deletePost(postId: string): Promise<void> {
    return this.read(() => this.removePost(postId));
  }

  deleteComment(commentId: string): Promise<void> {
    return this.read(() => {
      this._comments.delete(commentId);
    });
  }

  // ─── Health ──────────────────────────────────────────────────────

  ping(): Promise<void> {
    return this.read(() => undefined);
  }

  // ─── Seeding (tests, local development) ──────────────────────────

  /**
   * Insert a fully-formed user, bypassing registration.
   */
  seedUser(fields: {
    readonly username: string;
    readonly passwordHash: string;
    readonly level?: RoleLevel | undefined;
    readonly isActive?: boolean | undefined;
  }): User {
    const now = this.timestamp();
    const user: User = {
      id: randomUUID(),
      username: fields.username,
      email: `${fields.username}@example.test`,
      passwordHash: fields.passwordHash,
      role: roleOf(fields.level ?? 1),
      banned: false,
      isActive: fields.isActive ?? true,
      createdAt: now,
      updatedAt: now,
    };
    this._users.set(user.id, user);
    return user;
  }

  seedPost(authorId: string): ContentRef {
    const post: ContentRef = { id: randomUUID(), authorId };
    this._posts.set(post.id, post);
    return post;
  }

  seedComment(postId: string, authorId: string): ContentRef {
    const comment: StoredComment = { id: randomUUID(), authorId, postId };
    this._comments.set(comment.id, comment);
    return comment;
  }

  /**
   * Simulate an outage: every call rejects until restored.
   */
  setAvailable(available: boolean): void {
    this._available = available;
  }

  get postCount(): number {
    return this._posts.size;
  }

  get commentCount(): number {
    return this._comments.size;
  }

  // ─── Internals ───────────────────────────────────────────────────

  private read<T>(fn: () => T): Promise<T> {
    if (!this._available) {
      return Promise.reject(
        new RepositoryError("STORE_UNAVAILABLE", "in-memory store is unavailable"),
      );
    }
    return Promise.resolve(fn());
  }

  private update(userId: string, patch: Partial<User>): Promise<void> {
    return this.read(() => {
      const current = this._users.get(userId);
      if (current === undefined) return;
      this._users.set(userId, withPatch(current, patch, this.timestamp()));
    });
  }

  private removePost(postId: string): void {
    this._posts.delete(postId);
    for (const comment of [...this._comments.values()]) {
      if (comment.postId === postId) this._comments.delete(comment.id);
    }
  }

  private timestamp(): string {
    return new Date(this._now()).toISOString();
  }
}

function withPatch(user: User, patch: Partial<User>, updatedAt: string): User {
  return { ...user, ...patch, updatedAt };
}
