/**
 * Error taxonomy shared by the hub and the spoke agent.
 *
 * Every rejected action carries a distinguishable `kind` so an operator
 * can tell "re-authenticate" from "wait" from "re-provision".
 */
export type ErrorKind =
  | 'Unauthenticated'
  | 'Unauthorized'
  | 'ForbiddenSourceIP'
  | 'NotFound'
  | 'SpokeUnreachable'
  | 'Conflict'
  | 'ValidationError'
  | 'RateLimited'
  | 'InternalFault';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  Unauthenticated: 401,
  Unauthorized: 403,
  ForbiddenSourceIP: 403,
  NotFound: 404,
  SpokeUnreachable: 409,
  Conflict: 409,
  ValidationError: 400,
  RateLimited: 429,
  InternalFault: 500,
};

export class ControlPlaneError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ControlPlaneError';
    this.kind = kind;
    this.statusCode = STATUS_BY_KIND[kind];
  }
}

export function isControlPlaneError(err: unknown): err is ControlPlaneError {
  return err instanceof ControlPlaneError;
}
