export const ROLES = ['admin', 'operator', 'viewer'] as const;

export type Role = (typeof ROLES)[number];

/** Authenticated dashboard identity attached to a request. */
export interface Principal {
  readonly username: string;
  readonly role: Role;
}

export interface User {
  readonly username: string;
  readonly password_hash: string;
  readonly role: Role;
  readonly created_at: string; // ISO-8601
}
