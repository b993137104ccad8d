import { ValidationError } from "./errors";
import { SLUG_MAX_LENGTH, isWellFormedSlug } from "./slug";

export const TITLE_MAX_LENGTH = 200;
export const SUMMARY_MAX_LENGTH = 500;
export const COVER_IMAGE_URL_MAX_LENGTH = 255;
export const CATEGORY_NAME_MAX_LENGTH = 100;
export const CATEGORY_DESCRIPTION_MAX_LENGTH = 500;
export const TAG_NAME_MAX_LENGTH = 50;
export const COMMENT_MAX_LENGTH = 1000;
export const CONTENT_MAX_LENGTH = 100_000;

function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

function requireBoundedText(field: string, value: string, maxLength: number): string {
  if (value.length === 0 || value.length > maxLength) {
    throw new ValidationError(`${field} must be between 1 and ${maxLength} characters`);
  }
  return value;
}

export function sanitizeTitle(input: string): string {
  return requireBoundedText("title", normalizeWhitespace(input), TITLE_MAX_LENGTH);
}

export function sanitizeContent(input: string): string {
  return requireBoundedText("content", input.trim(), CONTENT_MAX_LENGTH);
}

export function sanitizeSummary(input: string): string {
  const value = input.trim();
  if (value.length > SUMMARY_MAX_LENGTH) {
    throw new ValidationError(`summary must be ${SUMMARY_MAX_LENGTH} characters or less`);
  }
  return value;
}

export function sanitizeCoverImageUrl(input: string | null): string | null {
  if (input === null) {
    return null;
  }

  const value = input.trim();
  if (value.length === 0) {
    return null;
  }

  if (value.length > COVER_IMAGE_URL_MAX_LENGTH) {
    throw new ValidationError(`cover_image_url must be ${COVER_IMAGE_URL_MAX_LENGTH} characters or less`);
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ValidationError("cover_image_url must be a valid absolute URL");
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError("cover_image_url must use http or https");
  }

  return value;
}

export function sanitizeCategoryName(input: string): string {
  return requireBoundedText("name", normalizeWhitespace(input), CATEGORY_NAME_MAX_LENGTH);
}

export function sanitizeCategoryDescription(input: string | null): string | null {
  if (input === null) {
    return null;
  }

  const value = input.trim();
  if (value.length > CATEGORY_DESCRIPTION_MAX_LENGTH) {
    throw new ValidationError(`description must be ${CATEGORY_DESCRIPTION_MAX_LENGTH} characters or less`);
  }
  return value.length > 0 ? value : null;
}

export function sanitizeTagName(input: string): string {
  return requireBoundedText("name", input.trim().toLowerCase(), TAG_NAME_MAX_LENGTH);
}

export function sanitizeCommentContent(input: string): string {
  return requireBoundedText("content", input.trim(), COMMENT_MAX_LENGTH);
}

export function assertSlugShape(input: string): string {
  const value = input.trim();
  if (!isWellFormedSlug(value)) {
    throw new ValidationError(
      `slug must be at most ${SLUG_MAX_LENGTH} characters of lowercase letters, numbers, and hyphens`
    );
  }
  return value;
}
