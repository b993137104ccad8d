export type BlogErrorKind = "not_found" | "conflict" | "forbidden" | "invalid_state" | "validation";

/**
 * Base class for every failure the blog core surfaces. Callers branch on `kind`;
 * the message is for humans and logs only.
 */
export abstract class BlogError extends Error {
  abstract readonly kind: BlogErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends BlogError {
  readonly kind = "not_found";
}

export class ConflictError extends BlogError {
  readonly kind = "conflict";
}

export class ForbiddenError extends BlogError {
  readonly kind = "forbidden";
}

export class InvalidStateError extends BlogError {
  readonly kind = "invalid_state";
}

export class ValidationError extends BlogError {
  readonly kind = "validation";
}

export function isBlogError(error: unknown): error is BlogError {
  return error instanceof BlogError;
}
