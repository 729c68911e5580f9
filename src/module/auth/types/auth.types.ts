export const USER_ROLES = ["admin", "agent", "chauffeur"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export type AuthUser = {
  id: number;
  username: string;
  email: string;
  role: UserRole;
};

/** Who performs a state change. Background jobs and cascades act as "system". */
export type Actor =
  | { kind: "user"; id: number; role: UserRole }
  | { kind: "system"; reason: string };

/** Actor as carried by domain events. */
export type EventActor = "system" | { user_id: number };

export const systemActor = (reason: string): Actor => ({ kind: "system", reason });

export const userActor = (user: Pick<AuthUser, "id" | "role">): Actor => ({
  kind: "user",
  id: user.id,
  role: user.role,
});

export function toEventActor(actor: Actor): EventActor {
  return actor.kind === "system" ? "system" : { user_id: actor.id };
}
