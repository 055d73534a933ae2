/**
 * Postgres store.
 *
 * Implements the repository contracts over a shared `pg` pool. The pool
 * is injected; this class never creates or ends it. Schema lives in
 * `sql/schema.sql` and is applied by `migrate()`.
 */

import { readFile } from "node:fs/promises";
import pg from "pg";
import type { Pool } from "pg";
import type { RoleLevel, User } from "@murmur/types";
import { isRoleLevel } from "@murmur/types";
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

const SCHEMA_URL = new URL("../../sql/schema.sql", import.meta.url);

/** Postgres unique_violation */
const UNIQUE_VIOLATION = "23505";

// =============================================================================
// Transactions
// =============================================================================

/**
 * The part of a checked-out `pg` client a transaction uses.
 */
export interface TransactionClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Run `work` between BEGIN and COMMIT, then release the client.
 *
 * On failure the original error is rethrown. If ROLLBACK fails as well the
 * client is released with the rollback error and the pool discards it.
 */
export async function inTransaction(
  client: TransactionClient,
  work: (tx: TransactionClient) => Promise<void>,
): Promise<void> {
  try {
    await client.query("BEGIN");
    await work(client);
    await client.query("COMMIT");
  } catch (error) {
    let rollbackError: Error | undefined;
    try {
      await client.query("ROLLBACK");
    } catch (rollbackFailure) {
      rollbackError =
        rollbackFailure instanceof Error ? rollbackFailure : new Error(String(rollbackFailure));
    }
    client.release(rollbackError ?? false);
    throw error;
  }
  client.release();
}

// =============================================================================
// Rows
// =============================================================================

interface UserRow {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly password_hash: string;
  readonly role_level: number;
  readonly role_description: string;
  readonly timeout_until: Date | null;
  readonly banned: boolean;
  readonly is_active: boolean;
  readonly created_at: Date;
  readonly updated_at: Date;
  readonly password_reset_token: string | null;
  readonly reset_token_expiry: Date | null;
  readonly activation_token: string | null;
  readonly activation_token_expiry: Date | null;
}

interface ContentRow {
  readonly id: string;
  readonly author_id: string;
}

interface CountRow {
  readonly total: string;
}

const USER_SELECT = `
  SELECT u.id, u.username, u.email, u.password_hash,
         r.level AS role_level, r.description AS role_description,
         u.timeout_until, u.banned, u.is_active, u.created_at, u.updated_at,
         u.password_reset_token, u.reset_token_expiry,
         u.activation_token, u.activation_token_expiry
    FROM users u
    JOIN roles r ON r.level = u.role_level`;

function toUser(row: UserRow): User {
  const level: unknown = row.role_level;
  if (!isRoleLevel(level)) {
    throw new RepositoryError(
      "INVALID_ROW",
      `user ${row.id} has unknown role level ${String(level)}`,
    );
  }
  const roleLevel: RoleLevel = level;

  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: { level: roleLevel, description: row.role_description },
    banned: row.banned,
    isActive: row.is_active,
    timeoutUntil: iso(row.timeout_until),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    passwordResetToken: row.password_reset_token ?? undefined,
    resetTokenExpiry: iso(row.reset_token_expiry),
    activationToken: row.activation_token ?? undefined,
    activationTokenExpiry: iso(row.activation_token_expiry),
  };
}

function iso(value: Date | null): string | undefined {
  return value === null ? undefined : value.toISOString();
}

function toContent(row: ContentRow): ContentRef {
  return { id: row.id, authorId: row.author_id };
}

// =============================================================================
// Store
// =============================================================================

export class PostgresStore
  implements UserRepository, ModerationRepository, ContentRepository, Pingable
{
  private readonly _pool: Pool;

  constructor(pool: Pool) {
    this._pool = pool;
  }

  /**
   * Apply `sql/schema.sql`. Safe to run on every start.
   */
  async migrate(): Promise<void> {
    const sql = await readFile(SCHEMA_URL, "utf-8");
    await this._pool.query(sql);
  }

  // ─── Users ───────────────────────────────────────────────────────

  async findById(id: string): Promise<User | undefined> {
    const result = await this._pool.query<UserRow>(`${USER_SELECT} WHERE u.id = $1`, [id]);
    const row = result.rows[0];
    return row === undefined ? undefined : toUser(row);
  }

  async findByIdentifier(identifier: string): Promise<User | undefined> {
    const result = await this._pool.query<UserRow>(
      `${USER_SELECT} WHERE lower(u.username) = lower($1) OR lower(u.email) = lower($1)`,
      [identifier],
    );
    const row = result.rows[0];
    return row === undefined ? undefined : toUser(row);
  }

  async create(input: NewUser): Promise<User> {
    let id: string | undefined;
    try {
      const result = await this._pool.query<{ id: string }>(
        `INSERT INTO users (username, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING id`,
        [input.username, input.email, input.passwordHash],
      );
      id = result.rows[0]?.id;
    } catch (error) {
      if (error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new RepositoryError(
          "DUPLICATE_USER",
          "username or email already registered",
          { cause: error },
        );
      }
      throw error;
    }

    const user = id === undefined ? undefined : await this.findById(id);
    if (user === undefined) {
      throw new RepositoryError("INVALID_ROW", "inserted user could not be read back");
    }
    return user;
  }

  async setActivationToken(userId: string, token: string, expiry: string): Promise<void> {
    await this._pool.query(
      "UPDATE users SET activation_token = $2, activation_token_expiry = $3 WHERE id = $1",
      [userId, token, expiry],
    );
  }

  async activate(userId: string): Promise<void> {
    await this._pool.query(
      `UPDATE users
          SET is_active = TRUE, activation_token = NULL, activation_token_expiry = NULL
        WHERE id = $1`,
      [userId],
    );
  }

  async setResetToken(userId: string, token: string, expiry: string): Promise<void> {
    await this._pool.query(
      "UPDATE users SET password_reset_token = $2, reset_token_expiry = $3 WHERE id = $1",
      [userId, token, expiry],
    );
  }

  async updatePassword(userId: string, passwordHash: string): Promise<void> {
    await this._pool.query(
      `UPDATE users
          SET password_hash = $2, password_reset_token = NULL, reset_token_expiry = NULL
        WHERE id = $1`,
      [userId, passwordHash],
    );
  }

  // ─── Moderation ──────────────────────────────────────────────────

  async setTimeout(userId: string, until: string | undefined): Promise<void> {
    await this._pool.query("UPDATE users SET timeout_until = $2 WHERE id = $1", [
      userId,
      until ?? null,
    ]);
  }

  async listTimedOut(now: string, window: PageWindow): Promise<TimedOutPage> {
    const [page, count] = await Promise.all([
      this._pool.query<UserRow>(
        `${USER_SELECT}
          WHERE u.timeout_until > $1
          ORDER BY u.timeout_until ASC
          LIMIT $2 OFFSET $3`,
        [now, window.limit, window.offset],
      ),
      this._pool.query<CountRow>(
        "SELECT COUNT(*)::text AS total FROM users WHERE timeout_until > $1",
        [now],
      ),
    ]);

    return {
      users: page.rows.map(toUser),
      total: Number(count.rows[0]?.total ?? "0"),
    };
  }

  async setActive(userId: string, active: boolean): Promise<void> {
    await this._pool.query("UPDATE users SET is_active = $2 WHERE id = $1", [userId, active]);
  }

  async ban(userId: string): Promise<void> {
    const client = await this._pool.connect();
    await inTransaction(client, async (tx) => {
      await tx.query(
        "UPDATE users SET banned = TRUE, is_active = FALSE WHERE id = $1",
        [userId],
      );
      await tx.query("DELETE FROM posts WHERE author_id = $1", [userId]);
    });
  }

  async unban(userId: string): Promise<void> {
    await this._pool.query("UPDATE users SET banned = FALSE WHERE id = $1", [userId]);
  }

  // ─── Content ─────────────────────────────────────────────────────

  async findPost(postId: string): Promise<ContentRef | undefined> {
    const result = await this._pool.query<ContentRow>(
      "SELECT id, author_id FROM posts WHERE id = $1",
      [postId],
    );
    const row = result.rows[0];
    return row === undefined ? undefined : toContent(row);
  }

  async findComment(commentId: string): Promise<ContentRef | undefined> {
    const result = await this._pool.query<ContentRow>(
      "SELECT id, author_id FROM comments WHERE id = $1",
      [commentId],
    );
    const row = result.rows[0];
    return row === undefined ? undefined : toContent(row);
  }

  async deletePost(postId: string): Promise<void> {
    await this._pool.query("DELETE FROM posts WHERE id = $1", [postId]);
  }

  async deleteComment(commentId: string): Promise<void> {
    await this._pool.query("DELETE FROM comments WHERE id = $1", [commentId]);
  }

  // ─── Health ──────────────────────────────────────────────────────

  async ping(): Promise<void> {
    await this._pool.query("SELECT 1");
  }
}
