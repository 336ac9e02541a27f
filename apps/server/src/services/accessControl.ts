import type { AuthRepository, AuthUser, RosterEntry } from "../types/auth.js";
import { authStore } from "./authStore.js";

export type VisibilityCaller = Pick<AuthUser, "id" | "role" | "subgroup">;

/**
 * Visibility table:
 * - administrator, boss: everyone
 * - group_boss: own subgroup plus self
 * - agent: self only
 */
export function resolveVisibleIds(caller: VisibilityCaller, roster: RosterEntry[]): number[] {
  switch (caller.role) {
    case "administrator":
    case "boss":
      return roster.map((entry) => entry.id);
    case "group_boss": {
      const ids = roster
        .filter((entry) => entry.id === caller.id || (caller.subgroup !== undefined && entry.subgroup === caller.subgroup))
        .map((entry) => entry.id);
      return ids.includes(caller.id) ? ids : [...ids, caller.id];
    }
    case "agent":
      return [caller.id];
    default: {
      const unreachable: never = caller.role;
      throw new Error(`unknown_role:${String(unreachable)}`);
    }
  }
}

export class AccessControlResolver {
  private readonly repository: AuthRepository;

  constructor(repository: AuthRepository) {
    this.repository = repository;
  }

  // Reads only the slice of the roster the caller's role can reach.
  private async rosterFor(caller: VisibilityCaller): Promise<RosterEntry[]> {
    switch (caller.role) {
      case "administrator":
      case "boss":
        return this.repository.listRoster();
      case "group_boss":
        return caller.subgroup ? this.repository.listRoster({ subgroup: caller.subgroup, includeUserId: caller.id }) : [];
      case "agent":
        return [];
      default: {
        const unreachable: never = caller.role;
        throw new Error(`unknown_role:${String(unreachable)}`);
      }
    }
  }

  async visibleIdentityIds(caller: VisibilityCaller): Promise<number[]> {
    return resolveVisibleIds(caller, await this.rosterFor(caller));
  }

  async canView(caller: VisibilityCaller, targetId: number): Promise<boolean> {
    if (targetId === caller.id) return true;
    const ids = await this.visibleIdentityIds(caller);
    return ids.includes(targetId);
  }
}

export const accessControl = new AccessControlResolver(authStore);
