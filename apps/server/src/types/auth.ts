export type UserRole = "administrator" | "boss" | "group_boss" | "agent";

export type Subgroup = "A" | "B";

export const USER_ROLES = ["administrator", "boss", "group_boss", "agent"] as const satisfies readonly UserRole[];
export const SUBGROUPS = ["A", "B"] as const satisfies readonly Subgroup[];

export interface AuthUser {
  id: number;
  username: string;
  firstName: string;
  lastName?: string;
  email?: string;
  phone?: string;
  zone?: string;
  role: UserRole;
  subgroup?: Subgroup;
  isActive: boolean;
}

export interface AuthUserRecord extends AuthUser {
  passwordHash: string;
  createdAt: string;
}

export interface NewIdentity {
  username: string;
  passwordHash: string;
  firstName: string;
  lastName?: string;
  email?: string;
  phone?: string;
  role: UserRole;
  subgroup?: Subgroup;
  isActive: boolean;
}

export interface SessionRecord {
  token: string;
  userId: number;
  createdAt: Date;
  expiresAt: Date;
}

export interface ResetTokenRecord {
  token: string;
  userId: number;
  expiresAt: Date;
  used: boolean;
  createdAt: Date;
}

export interface AuthContext {
  user: AuthUser;
  sessionToken: string;
}

export interface RosterEntry {
  id: number;
  subgroup?: Subgroup;
}

export interface AgentListFilter {
  ids: number[];
  q?: string;
  zone?: string;
  active?: boolean;
}

/**
 * Durable storage for identities, sessions and reset tokens.
 * Single-row operations are atomic by key; `consumeResetToken` runs in one transaction.
 */
export interface AuthRepository {
  findUserByUsername(username: string): Promise<AuthUserRecord | null>;
  findUserByEmail(email: string): Promise<AuthUserRecord | null>;
  findUserById(userId: number): Promise<AuthUserRecord | null>;
  /** Returns null when the username is already taken. */
  insertUser(input: NewIdentity): Promise<AuthUserRecord | null>;
  /** Without a filter, every identity; with one, the subgroup's members plus `includeUserId`. */
  listRoster(filter?: { subgroup: Subgroup; includeUserId: number }): Promise<RosterEntry[]>;
  listUsers(filter: AgentListFilter): Promise<AuthUserRecord[]>;

  insertSession(session: SessionRecord): Promise<void>;
  getSession(token: string): Promise<SessionRecord | null>;
  deleteSession(token: string): Promise<void>;
  deleteSessionsExpiredBefore(now: Date): Promise<number>;

  insertResetToken(record: ResetTokenRecord): Promise<void>;
  /**
   * Marks an unused, unexpired token as used and stores the new password hash
   * in the same transaction. Returns the owning user id, or null when no row qualified.
   */
  consumeResetToken(token: string, newPasswordHash: string, now: Date): Promise<number | null>;
  /** Removes tokens that expired, or were used, before `cutoff`. */
  deleteStaleResetTokens(cutoff: Date): Promise<number>;
}
