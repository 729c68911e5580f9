import jwt from "jsonwebtoken";

import type { AuthUser, UserRole } from "../../module/auth/types/auth.types";

const USERS: Record<UserRole, AuthUser> = {
  admin: { id: 1, username: "admin", email: "admin@example.test", role: "admin" },
  agent: { id: 4, username: "agent", email: "agent@example.test", role: "agent" },
  chauffeur: { id: 7, username: "chauffeur", email: "chauffeur@example.test", role: "chauffeur" },
};

export const userFor = (role: UserRole): AuthUser => USERS[role];

/** Authorization header value signed with the test secret. */
export function bearer(role: UserRole): string {
  return `Bearer ${jwt.sign(USERS[role], "test-secret", { expiresIn: "1h" })}`;
}
