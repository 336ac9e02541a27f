import { Pool, type PoolClient } from "pg";
import { env } from "../config/env.js";
import { logger } from "../config/logger.js";
import { SUBGROUPS, USER_ROLES } from "../types/auth.js";
import type {
  AgentListFilter,
  AuthRepository,
  AuthUserRecord,
  NewIdentity,
  ResetTokenRecord,
  RosterEntry,
  SessionRecord,
  Subgroup,
  UserRole
} from "../types/auth.js";
import { StorageUnavailableError } from "./authErrors.js";

interface IdentityRow {
  id: number;
  username: string;
  password_hash: string;
  first_name: string;
  last_name: string | null;
  email: string | null;
  phone: string | null;
  zone: string | null;
  role: UserRole;
  subgroup: Subgroup | null;
  is_active: boolean;
  created_at: Date;
}

interface SessionRow {
  token: string;
  identity_id: number;
  created_at: Date;
  expires_at: Date;
}

export interface SeedUser {
  username: string;
  role: UserRole;
  subgroup?: Subgroup;
  email?: string;
  passwordHash: string;
}

const IDENTITY_COLUMNS =
  "id, username, password_hash, first_name, last_name, email, phone, zone, role, subgroup, is_active, created_at";

function mapIdentityRow(row: IdentityRow): AuthUserRecord {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name ?? undefined,
    email: row.email ?? undefined,
    phone: row.phone ?? undefined,
    zone: row.zone ?? undefined,
    role: row.role,
    subgroup: row.subgroup ?? undefined,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString()
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

function isSubgroup(value: string): value is Subgroup {
  return SUBGROUPS.some((subgroup) => subgroup === value);
}

/**
 * Parses `username:role:subgroup:email:bcryptHash` entries separated by `;`.
 * Entries with an unknown role or a missing hash are skipped.
 */
export function parseSeedUsers(raw: string): SeedUser[] {
  return raw
    .split(";")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .flatMap((entry): SeedUser[] => {
      const [username = "", role = "", subgroup = "", email = "", ...hashParts] = entry.split(":");
      const passwordHash = hashParts.join(":").trim();
      const normalizedRole = role.trim();
      if (!username.trim() || !passwordHash || !isUserRole(normalizedRole)) return [];
      const group = subgroup.trim();
      return [
        {
          username: username.trim(),
          role: normalizedRole,
          subgroup: isSubgroup(group) && (normalizedRole === "group_boss" || normalizedRole === "agent") ? group : undefined,
          email: email.trim().toLowerCase() || undefined,
          passwordHash
        }
      ];
    });
}

const log = logger.child({ component: "auth-store" });

export class AuthStore implements AuthRepository {
  private readonly pool: Pool;
  private readonly seedUsers: SeedUser[];
  private schemaReady: Promise<void> | null = null;

  constructor(pool: Pool = new Pool({ connectionString: env.DATABASE_URL }), seedUsers: SeedUser[] = parseSeedUsers(env.AUTH_SEED_USERS)) {
    this.pool = pool;
    this.seedUsers = seedUsers;
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = null;
        throw new StorageUnavailableError("ensure_schema", { cause: error });
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS identities (
        id SERIAL PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        first_name TEXT NOT NULL,
        last_name TEXT,
        email TEXT,
        phone TEXT,
        zone TEXT,
        role TEXT NOT NULL DEFAULT 'agent' CHECK (role IN ('administrator', 'boss', 'group_boss', 'agent')),
        subgroup TEXT CHECK (subgroup IN ('A', 'B')),
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CHECK (subgroup IS NULL OR role IN ('group_boss', 'agent'))
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS sessions (
        token TEXT PRIMARY KEY,
        identity_id INTEGER NOT NULL REFERENCES identities(id) ON DELETE CASCADE,
        created_at TIMESTAMPTZ NOT NULL,
        expires_at TIMESTAMPTZ NOT NULL
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS password_resets (
        id SERIAL PRIMARY KEY,
        identity_id INTEGER NOT NULL REFERENCES identities(id) ON DELETE CASCADE,
        token TEXT NOT NULL UNIQUE,
        expires_at TIMESTAMPTZ NOT NULL,
        used BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query("CREATE INDEX IF NOT EXISTS idx_identities_email ON identities(email);");
    await this.pool.query("CREATE INDEX IF NOT EXISTS idx_identities_subgroup ON identities(subgroup);");
    await this.pool.query("CREATE INDEX IF NOT EXISTS idx_sessions_expires_at ON sessions(expires_at);");
    await this.pool.query("CREATE INDEX IF NOT EXISTS idx_password_resets_token ON password_resets(token);");
    await this.pool.query("CREATE INDEX IF NOT EXISTS idx_password_resets_expires_at ON password_resets(expires_at);");

    for (const seed of this.seedUsers) {
      await this.pool.query(
        `
        INSERT INTO identities (username, password_hash, first_name, email, role, subgroup, is_active)
        VALUES ($1, $2, $1, $3, $4, $5, TRUE)
        ON CONFLICT (username) DO NOTHING
        `,
        [seed.username, seed.passwordHash, seed.email ?? null, seed.role, seed.subgroup ?? null]
      );
    }
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    await this.ensureSchema();
    try {
      return await work();
    } catch (error) {
      throw new StorageUnavailableError(operation, { cause: error });
    }
  }

  private async findUserWhere(operation: string, clause: string, value: string | number): Promise<AuthUserRecord | null> {
    return this.run(operation, async () => {
      const { rows } = await this.pool.query<IdentityRow>(
        `
        SELECT ${IDENTITY_COLUMNS}
        FROM identities
        WHERE ${clause} = $1
        ORDER BY id ASC
        LIMIT 1
        `,
        [value]
      );
      return rows[0] ? mapIdentityRow(rows[0]) : null;
    });
  }

  async findUserByUsername(username: string): Promise<AuthUserRecord | null> {
    return this.findUserWhere("find_user_by_username", "username", username);
  }

  async findUserByEmail(email: string): Promise<AuthUserRecord | null> {
    return this.findUserWhere("find_user_by_email", "email", email);
  }

  async findUserById(userId: number): Promise<AuthUserRecord | null> {
    return this.findUserWhere("find_user_by_id", "id", userId);
  }

  async insertUser(input: NewIdentity): Promise<AuthUserRecord | null> {
    await this.ensureSchema();
    try {
      const { rows } = await this.pool.query<IdentityRow>(
        `
        INSERT INTO identities (username, password_hash, first_name, last_name, email, phone, role, subgroup, is_active)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING ${IDENTITY_COLUMNS}
        `,
        [
          input.username,
          input.passwordHash,
          input.firstName,
          input.lastName ?? null,
          input.email ?? null,
          input.phone ?? null,
          input.role,
          input.subgroup ?? null,
          input.isActive
        ]
      );
      return rows[0] ? mapIdentityRow(rows[0]) : null;
    } catch (error) {
      if (isUniqueViolation(error)) return null;
      throw new StorageUnavailableError("insert_user", { cause: error });
    }
  }

  async listRoster(filter?: { subgroup: Subgroup; includeUserId: number }): Promise<RosterEntry[]> {
    return this.run("list_roster", async () => {
      const { rows } = filter
        ? await this.pool.query<{ id: number; subgroup: Subgroup | null }>(
            "SELECT id, subgroup FROM identities WHERE subgroup = $1 OR id = $2 ORDER BY id ASC",
            [filter.subgroup, filter.includeUserId]
          )
        : await this.pool.query<{ id: number; subgroup: Subgroup | null }>("SELECT id, subgroup FROM identities ORDER BY id ASC");
      return rows.map((row) => ({ id: row.id, subgroup: row.subgroup ?? undefined }));
    });
  }

  async listUsers(filter: AgentListFilter): Promise<AuthUserRecord[]> {
    if (filter.ids.length === 0) return [];
    return this.run("list_users", async () => {
      const params: Array<string | boolean | number[]> = [filter.ids];
      const clauses: string[] = ["id = ANY($1::int[])"];

      if (filter.q) {
        params.push(`%${filter.q}%`);
        const index = params.length;
        clauses.push(`(first_name ILIKE $${index} OR last_name ILIKE $${index} OR email ILIKE $${index} OR zone ILIKE $${index})`);
      }
      if (filter.zone) {
        params.push(filter.zone);
        clauses.push(`zone = $${params.length}`);
      }
      if (typeof filter.active === "boolean") {
        params.push(filter.active);
        clauses.push(`is_active = $${params.length}`);
      }

      const { rows } = await this.pool.query<IdentityRow>(
        `
        SELECT ${IDENTITY_COLUMNS}
        FROM identities
        WHERE ${clauses.join(" AND ")}
        ORDER BY first_name ASC, id ASC
        `,
        params
      );
      return rows.map(mapIdentityRow);
    });
  }

  async insertSession(session: SessionRecord): Promise<void> {
    await this.run("insert_session", async () => {
      await this.pool.query(
        `
        INSERT INTO sessions (token, identity_id, created_at, expires_at)
        VALUES ($1, $2, $3::timestamptz, $4::timestamptz)
        `,
        [session.token, session.userId, session.createdAt.toISOString(), session.expiresAt.toISOString()]
      );
    });
  }

  async getSession(token: string): Promise<SessionRecord | null> {
    return this.run("get_session", async () => {
      const { rows } = await this.pool.query<SessionRow>(
        `
        SELECT token, identity_id, created_at, expires_at
        FROM sessions
        WHERE token = $1
        LIMIT 1
        `,
        [token]
      );
      const row = rows[0];
      if (!row) return null;
      return {
        token: row.token,
        userId: row.identity_id,
        createdAt: row.created_at,
        expiresAt: row.expires_at
      };
    });
  }

  async deleteSession(token: string): Promise<void> {
    await this.run("delete_session", async () => {
      await this.pool.query("DELETE FROM sessions WHERE token = $1", [token]);
    });
  }

  async deleteSessionsExpiredBefore(now: Date): Promise<number> {
    return this.run("delete_expired_sessions", async () => {
      const { rowCount } = await this.pool.query("DELETE FROM sessions WHERE expires_at < $1::timestamptz", [now.toISOString()]);
      return rowCount ?? 0;
    });
  }

  async insertResetToken(record: ResetTokenRecord): Promise<void> {
    await this.run("insert_reset_token", async () => {
      await this.pool.query(
        `
        INSERT INTO password_resets (identity_id, token, expires_at, used, created_at)
        VALUES ($1, $2, $3::timestamptz, $4, $5::timestamptz)
        `,
        [record.userId, record.token, record.expiresAt.toISOString(), record.used, record.createdAt.toISOString()]
      );
    });
  }

  async consumeResetToken(token: string, newPasswordHash: string, now: Date): Promise<number | null> {
    await this.ensureSchema();
    const client = await this.pool.connect().catch((error: unknown) => {
      throw new StorageUnavailableError("consume_reset_token", { cause: error });
    });
    try {
      const userId = await this.consumeWithin(client, token, newPasswordHash, now);
      client.release();
      return userId;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        log.warn({ err: rollbackError }, "Rollback failed after reset token error");
      }
      // Never hand a client with an unknown transaction state back to the pool.
      client.release(true);
      throw new StorageUnavailableError("consume_reset_token", { cause: error });
    }
  }

  private async consumeWithin(client: PoolClient, token: string, newPasswordHash: string, now: Date): Promise<number | null> {
    await client.query("BEGIN");
    const consumed = await client.query<{ identity_id: number }>(
      `
      UPDATE password_resets
      SET used = TRUE
      WHERE token = $1
        AND used = FALSE
        AND expires_at > $2::timestamptz
      RETURNING identity_id
      `,
      [token, now.toISOString()]
    );
    const row = consumed.rows[0];
    if (!row) {
      await client.query("ROLLBACK");
      return null;
    }

    const updated = await client.query("UPDATE identities SET password_hash = $2 WHERE id = $1", [row.identity_id, newPasswordHash]);
    if ((updated.rowCount ?? 0) === 0) {
      await client.query("ROLLBACK");
      return null;
    }

    await client.query("COMMIT");
    return row.identity_id;
  }

  async deleteStaleResetTokens(cutoff: Date): Promise<number> {
    return this.run("delete_stale_reset_tokens", async () => {
      const { rowCount } = await this.pool.query(
        "DELETE FROM password_resets WHERE expires_at < $1::timestamptz OR (used = TRUE AND created_at < $1::timestamptz)",
        [cutoff.toISOString()]
      );
      return rowCount ?? 0;
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export const authStore = new AuthStore();
