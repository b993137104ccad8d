import { ConflictError } from "./errors";
import type { CategoryRepository, PostRepository, TagRepository } from "./repository";
import { generateSlug } from "./slug";
import type { TagRecord } from "./types";
import { sanitizeTagName } from "./validation";

export interface TaxonomySelection {
  categoryIds?: string[];
  tags?: string[];
}

export function normalizeTagName(name: string): string {
  return name.trim().toLowerCase();
}

/** Rejects over-long tag names before anything is written; blank names are skipped later. */
export function assertTagNames(tagNames: string[] | undefined): void {
  for (const name of tagNames ?? []) {
    if (normalizeTagName(name).length > 0) {
      sanitizeTagName(name);
    }
  }
}

/**
 * Builds a post's category and tag association sets. Each supplied dimension is
 * replaced wholesale: the existing rows are cleared and the requested set is
 * inserted, so two concurrent updates resolve as last-writer-wins.
 */
export class TaxonomyReconciler {
  constructor(
    private readonly posts: PostRepository,
    private readonly categories: CategoryRepository,
    private readonly tags: TagRepository
  ) {}

  async apply(postId: string, selection: TaxonomySelection): Promise<void> {
    if (selection.categoryIds !== undefined) {
      await this.replaceCategories(postId, selection.categoryIds);
    }

    if (selection.tags !== undefined) {
      await this.replaceTags(postId, selection.tags);
    }
  }

  async replaceCategories(postId: string, categoryIds: string[]): Promise<void> {
    const resolved = await this.resolveCategoryIds(categoryIds);
    await this.posts.replaceCategories(postId, resolved);
  }

  async replaceTags(postId: string, tagNames: string[]): Promise<void> {
    assertTagNames(tagNames);
    const tagIds: string[] = [];

    for (const name of tagNames) {
      const tag = await this.findOrCreateTag(name);
      if (tag && !tagIds.includes(tag.id)) {
        tagIds.push(tag.id);
      }
    }

    await this.posts.replaceTags(postId, tagIds);
  }

  /** Unknown ids are dropped without error; order and uniqueness follow the request. */
  async resolveCategoryIds(categoryIds: string[]): Promise<string[]> {
    const requested = [...new Set(categoryIds)];
    if (requested.length === 0) {
      return [];
    }

    const found = new Set((await this.categories.findByIds(requested)).map((category) => category.id));
    return requested.filter((id) => found.has(id));
  }

  /**
   * Find-or-create by normalized slug. Blank names yield null. A creation that
   * loses a race against another writer re-reads the tag that won.
   */
  async findOrCreateTag(rawName: string): Promise<TagRecord | null> {
    const name = normalizeTagName(rawName);
    if (name.length === 0) {
      return null;
    }
    sanitizeTagName(name);

    const slug = generateSlug(name);
    const existing = await this.tags.findBySlug(slug);
    if (existing) {
      return existing;
    }

    try {
      return await this.tags.insert({ name, slug });
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }

      const winner = await this.tags.findBySlug(slug);
      if (!winner) {
        throw error;
      }
      return winner;
    }
  }
}
