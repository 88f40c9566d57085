// backend/leaderboard/errors.ts

export type LeaderboardErrorKind = "validation" | "not_found" | "store";

export class ValidationError extends Error {
  readonly kind = "validation" as const;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error {
  readonly kind = "not_found" as const;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class StoreError extends Error {
  readonly kind = "store" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export type LeaderboardError = ValidationError | NotFoundError | StoreError;

export type LeaderboardResult<T, E extends LeaderboardError = LeaderboardError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends LeaderboardError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
