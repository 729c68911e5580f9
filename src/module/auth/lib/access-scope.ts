import type { AuthUser } from "../types/auth.types";

/**
 * Capability handed to every shipment / tour query. Nothing filters rows
 * implicitly: repositories render the scope into their WHERE clause.
 */
export type AccessScope =
  | { kind: "all" }
  | { kind: "agent"; userId: number }
  | { kind: "chauffeur"; userId: number };

export const ALL_ACCESS: AccessScope = { kind: "all" };

export function scopeForUser(user: Pick<AuthUser, "id" | "role">): AccessScope {
  switch (user.role) {
    case "admin":
      return ALL_ACCESS;
    case "agent":
      return { kind: "agent", userId: user.id };
    case "chauffeur":
      return { kind: "chauffeur", userId: user.id };
  }
}

type Push = (v: unknown) => string;

/** Predicate on an `expedition` alias, or null when unrestricted. */
export function expeditionScopeSql(scope: AccessScope, push: Push, alias = "e"): string | null {
  switch (scope.kind) {
    case "all":
      return null;
    case "agent": {
      const p = push(scope.userId);
      return `(${alias}.agent_responsable_id = ${p} OR ${alias}.client_id IN (SELECT c.id FROM clients c WHERE c.created_by = ${p}))`;
    }
    case "chauffeur": {
      const p = push(scope.userId);
      return `${alias}.tournee_id IN (SELECT t.id FROM tournee t JOIN chauffeurs ch ON ch.id = t.chauffeur_id WHERE ch.user_id = ${p})`;
    }
  }
}

/** Predicate on a `tournee` alias. Agents plan tours, so only drivers are restricted. */
export function tourneeScopeSql(scope: AccessScope, push: Push, alias = "t"): string | null {
  if (scope.kind !== "chauffeur") return null;
  const p = push(scope.userId);
  return `${alias}.chauffeur_id IN (SELECT ch.id FROM chauffeurs ch WHERE ch.user_id = ${p})`;
}
