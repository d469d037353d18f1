export type Role = "primary" | "replica" | "unknown";

export type RoleSource = "psql" | "ps" | "pgdata" | "none";

export interface RoleResult {
  readonly role: Role;
  readonly alive: boolean;
  readonly source: RoleSource;
}

export function unknownRole(alive: boolean): RoleResult {
  return { role: "unknown", alive, source: "none" };
}
