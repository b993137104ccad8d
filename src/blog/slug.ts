export const SLUG_MAX_LENGTH = 200;
export const SLUG_FALLBACK = "untitled";

const SLUG_PATTERN = /^[a-z0-9-]*$/;
const COMBINING_MARKS = /\p{M}/gu;

export function generateSlug(text: string): string {
  const slug = text
    .toLowerCase()
    .normalize("NFD")
    .replace(COMBINING_MARKS, "")
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug.length > 0 ? slug : SLUG_FALLBACK;
}

/** A blank explicit slug counts as absent, so the slug derives from `name`. */
export function explicitSlugOr(slug: string | undefined, name: string): string {
  return slug !== undefined && slug.trim().length > 0 ? slug : name;
}

export function isWellFormedSlug(value: string): boolean {
  return value.length <= SLUG_MAX_LENGTH && SLUG_PATTERN.test(value);
}

/**
 * Candidate for the nth collision of `base`: `base`, `base-1`, `base-2`, ...
 * The base is shortened so the candidate fits the slug column.
 */
export function suffixedSlugCandidate(base: string, attempt: number): string {
  if (attempt === 0) {
    return base.slice(0, SLUG_MAX_LENGTH);
  }

  const suffix = `-${attempt}`;
  const room = SLUG_MAX_LENGTH - suffix.length;
  const trimmedBase = base.length > room ? base.slice(0, room).replace(/-+$/, "") : base;
  return `${trimmedBase}${suffix}`;
}
