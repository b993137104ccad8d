import { ConflictError, NotFoundError } from "./errors";
import type { CategoryPatch, CategoryRepository } from "./repository";
import { explicitSlugOr, generateSlug } from "./slug";
import type { CategoryRecord, CategoryWithPostCount } from "./types";
import { assertSlugShape, sanitizeCategoryDescription, sanitizeCategoryName } from "./validation";

export interface CreateCategoryInput {
  name: string;
  slug?: string;
  description?: string | null;
}

export type UpdateCategoryInput = Partial<CreateCategoryInput>;

/**
 * Categories never auto-suffix: a slug collision is a Conflict. The uniqueness check keeps
 * the common case cheap; the repository's unique constraint still decides races.
 */
export class CategoryService {
  constructor(private readonly categories: CategoryRepository) {}

  async create(input: CreateCategoryInput): Promise<CategoryRecord> {
    const name = sanitizeCategoryName(input.name);
    const slug = assertSlugShape(generateSlug(explicitSlugOr(input.slug, name)));

    if (!(await this.categories.isSlugUnique(slug))) {
      throw new ConflictError(`category slug "${slug}" already exists`);
    }

    return this.categories.insert({
      name,
      slug,
      description: sanitizeCategoryDescription(input.description ?? null)
    });
  }

  async update(categoryId: string, input: UpdateCategoryInput): Promise<CategoryRecord> {
    const current = await this.getById(categoryId);
    const patch: CategoryPatch = {};

    if (input.name !== undefined) {
      patch.name = sanitizeCategoryName(input.name);
    }
    if (input.description !== undefined) {
      patch.description = sanitizeCategoryDescription(input.description);
    }

    const requestedSlug =
      input.slug !== undefined && input.slug.trim().length > 0
        ? generateSlug(input.slug)
        : patch.name !== undefined && patch.name !== current.name
          ? generateSlug(patch.name)
          : current.slug;

    if (requestedSlug !== current.slug) {
      patch.slug = assertSlugShape(requestedSlug);
      if (!(await this.categories.isSlugUnique(patch.slug))) {
        throw new ConflictError(`category slug "${patch.slug}" already exists`);
      }
    }

    const updated = await this.categories.update(categoryId, patch);
    if (!updated) {
      throw new NotFoundError("category not found");
    }
    return updated;
  }

  async delete(categoryId: string): Promise<void> {
    if (!(await this.categories.delete(categoryId))) {
      throw new NotFoundError("category not found");
    }
  }

  async getById(categoryId: string): Promise<CategoryRecord> {
    const category = await this.categories.findById(categoryId);
    if (!category) {
      throw new NotFoundError("category not found");
    }
    return category;
  }

  async getBySlug(slug: string): Promise<CategoryRecord> {
    const category = await this.categories.findBySlug(slug);
    if (!category) {
      throw new NotFoundError("category not found");
    }
    return category;
  }

  list(): Promise<CategoryRecord[]> {
    return this.categories.list();
  }

  listWithPostCount(): Promise<CategoryWithPostCount[]> {
    return this.categories.listWithPostCount();
  }
}
