import { ConflictError, NotFoundError } from "./errors";
import type { TagPatch, TagRepository } from "./repository";
import { explicitSlugOr, generateSlug } from "./slug";
import type { TagRecord, TagWithPostCount } from "./types";
import { assertSlugShape, sanitizeTagName } from "./validation";

export const DEFAULT_POPULAR_TAG_LIMIT = 10;

export interface CreateTagInput {
  name: string;
  slug?: string;
}

export type UpdateTagInput = Partial<CreateTagInput>;

export class TagService {
  constructor(private readonly tags: TagRepository) {}

  async create(input: CreateTagInput): Promise<TagRecord> {
    const name = sanitizeTagName(input.name);
    const slug = assertSlugShape(generateSlug(explicitSlugOr(input.slug, name)));

    if (!(await this.tags.isSlugUnique(slug))) {
      throw new ConflictError(`tag slug "${slug}" already exists`);
    }

    return this.tags.insert({ name, slug });
  }

  async update(tagId: string, input: UpdateTagInput): Promise<TagRecord> {
    const current = await this.getById(tagId);
    const patch: TagPatch = {};

    if (input.name !== undefined) {
      patch.name = sanitizeTagName(input.name);
    }

    const requestedSlug =
      input.slug !== undefined && input.slug.trim().length > 0
        ? generateSlug(input.slug)
        : patch.name !== undefined && patch.name !== current.name
          ? generateSlug(patch.name)
          : current.slug;

    if (requestedSlug !== current.slug) {
      patch.slug = assertSlugShape(requestedSlug);
      if (!(await this.tags.isSlugUnique(patch.slug))) {
        throw new ConflictError(`tag slug "${patch.slug}" already exists`);
      }
    }

    const updated = await this.tags.update(tagId, patch);
    if (!updated) {
      throw new NotFoundError("tag not found");
    }
    return updated;
  }

  async delete(tagId: string): Promise<void> {
    if (!(await this.tags.delete(tagId))) {
      throw new NotFoundError("tag not found");
    }
  }

  async getById(tagId: string): Promise<TagRecord> {
    const tag = await this.tags.findById(tagId);
    if (!tag) {
      throw new NotFoundError("tag not found");
    }
    return tag;
  }

  async getBySlug(slug: string): Promise<TagRecord> {
    const tag = await this.tags.findBySlug(slug);
    if (!tag) {
      throw new NotFoundError("tag not found");
    }
    return tag;
  }

  list(): Promise<TagRecord[]> {
    return this.tags.list();
  }

  listWithPostCount(): Promise<TagWithPostCount[]> {
    return this.tags.listWithPostCount();
  }

  // Ties break by name so the ranking is stable.
  async listPopular(limit = DEFAULT_POPULAR_TAG_LIMIT): Promise<TagWithPostCount[]> {
    const tags = await this.tags.listWithPostCount();
    return tags
      .sort((left, right) => right.postCount - left.postCount || left.name.localeCompare(right.name))
      .slice(0, Math.max(0, limit));
  }
}
