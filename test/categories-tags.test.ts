import { beforeEach, describe, expect, it } from "vitest";
import { CategoryService } from "../src/blog/categories";
import { ConflictError, NotFoundError, ValidationError } from "../src/blog/errors";
import {
  InMemoryBlogStore,
  InMemoryCategoryRepository,
  createInMemoryRepositories
} from "../src/blog/memory-repository";
import type { BlogRepositories } from "../src/blog/repository";
import { TagService } from "../src/blog/tags";
import { AUTHOR_ID, MISSING_ID, createSeededStore } from "./support/fixtures";

// The uniqueness check says the slug is free, but a concurrent writer commits it first.
class StaleUniquenessCategoryRepository extends InMemoryCategoryRepository {
  async isSlugUnique(): Promise<boolean> {
    return true;
  }
}

describe("CategoryService", () => {
  let store: InMemoryBlogStore;
  let categories: CategoryService;

  beforeEach(() => {
    store = createSeededStore();
    categories = new CategoryService(new InMemoryCategoryRepository(store));
  });

  it("derives the slug from the name when the given slug is blank", async () => {
    const category = await categories.create({ name: "Technology & Innovation", slug: "" });
    const spaced = await categories.create({ name: "Open Source", slug: "   " });

    expect(spaced.slug).toBe("open-source");

    expect(category.slug).toBe("technology-innovation");
    expect(category.description).toBeNull();
  });

  it("normalizes an explicit slug", async () => {
    const category = await categories.create({ name: "Guides", slug: "How To Guides", description: "  Docs  " });

    expect(category.slug).toBe("how-to-guides");
    expect(category.description).toBe("Docs");
  });

  it("rejects a duplicate slug and creates nothing", async () => {
    await categories.create({ name: "News" });

    await expect(categories.create({ name: "NEWS!" })).rejects.toBeInstanceOf(ConflictError);
    expect(store.categories).toHaveLength(1);
  });

  it("maps a lost insert race to a conflict", async () => {
    const racing = new CategoryService(new StaleUniquenessCategoryRepository(store));
    await racing.create({ name: "News" });

    await expect(racing.create({ name: "News" })).rejects.toBeInstanceOf(ConflictError);
    expect(store.categories).toHaveLength(1);
  });

  it("follows a rename with a new slug unless one is given", async () => {
    const category = await categories.create({ name: "News" });

    const renamed = await categories.update(category.id, { name: "Company News" });
    expect(renamed.slug).toBe("company-news");

    const pinned = await categories.update(category.id, { name: "Press", slug: "company-news" });
    expect(pinned.name).toBe("Press");
    expect(pinned.slug).toBe("company-news");

    const blankSlug = await categories.update(category.id, { slug: "" });
    expect(blankSlug.slug).toBe("company-news");

    const renamedWithBlankSlug = await categories.update(category.id, { name: "Press Room", slug: " " });
    expect(renamedWithBlankSlug.slug).toBe("press-room");
  });

  it("rejects a rename onto a taken slug", async () => {
    await categories.create({ name: "News" });
    const other = await categories.create({ name: "Events" });

    await expect(categories.update(other.id, { name: "News" })).rejects.toBeInstanceOf(ConflictError);
    expect((await categories.getById(other.id)).name).toBe("Events");
  });

  it("validates names", async () => {
    await expect(categories.create({ name: "  " })).rejects.toBeInstanceOf(ValidationError);
    await expect(categories.create({ name: "x".repeat(101) })).rejects.toBeInstanceOf(ValidationError);
  });

  it("looks up by id and slug and deletes", async () => {
    const category = await categories.create({ name: "News" });

    expect((await categories.getBySlug("news")).id).toBe(category.id);
    await categories.delete(category.id);
    await expect(categories.getById(category.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(categories.delete(category.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(categories.getBySlug("news")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists by name with post counts", async () => {
    const repositories = createInMemoryRepositories(store);
    const zeta = await categories.create({ name: "Zeta" });
    await categories.create({ name: "Alpha" });
    const post = await repositories.posts.insert({
      title: "Counted",
      slug: "counted",
      content: "Body",
      summary: "",
      coverImageUrl: null,
      status: "draft",
      publishedAt: null,
      allowComments: true,
      authorId: AUTHOR_ID
    });
    await repositories.posts.replaceCategories(post.id, [zeta.id]);

    expect((await categories.list()).map((category) => category.name)).toEqual(["Alpha", "Zeta"]);
    expect(
      (await categories.listWithPostCount()).map((category) => [category.slug, category.postCount])
    ).toEqual([
      ["alpha", 0],
      ["zeta", 1]
    ]);
  });
});

describe("TagService", () => {
  let repositories: BlogRepositories;
  let tags: TagService;

  beforeEach(() => {
    repositories = createInMemoryRepositories(createSeededStore());
    tags = new TagService(repositories.tags);
  });

  it("stores names lowercased and rejects duplicates", async () => {
    const tag = await tags.create({ name: "  TypeScript " });

    expect(tag.name).toBe("typescript");
    expect(tag.slug).toBe("typescript");
    await expect(tags.create({ name: "TYPESCRIPT" })).rejects.toBeInstanceOf(ConflictError);
  });

  it("derives the slug from the name when the given slug is blank", async () => {
    const tag = await tags.create({ name: "Rust Lang", slug: "" });

    expect(tag.slug).toBe("rust-lang");
    expect((await tags.update(tag.id, { slug: "" })).slug).toBe("rust-lang");
  });

  it("renames with a new slug", async () => {
    const tag = await tags.create({ name: "js" });

    const renamed = await tags.update(tag.id, { name: "JavaScript" });

    expect(renamed.name).toBe("javascript");
    expect(renamed.slug).toBe("javascript");
    await expect(tags.update(MISSING_ID, { name: "x" })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("ranks popular tags by post count, then name", async () => {
    const post = (slug: string) =>
      repositories.posts.insert({
        title: slug,
        slug,
        content: "Body",
        summary: "",
        coverImageUrl: null,
        status: "published",
        publishedAt: "2026-03-01T09:00:00.000Z",
        allowComments: true,
        authorId: AUTHOR_ID
      });
    const ops = await tags.create({ name: "ops" });
    const api = await tags.create({ name: "api" });
    const web = await tags.create({ name: "web" });
    await tags.create({ name: "unused" });
    const first = await post("first");
    const second = await post("second");
    await repositories.posts.replaceTags(first.id, [ops.id, api.id, web.id]);
    await repositories.posts.replaceTags(second.id, [web.id]);

    const popular = await tags.listPopular(3);

    expect(popular.map((tag) => [tag.name, tag.postCount])).toEqual([
      ["web", 2],
      ["api", 1],
      ["ops", 1]
    ]);
  });
});
