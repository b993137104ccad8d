import { beforeEach, describe, expect, it } from "vitest";
import { ForbiddenError, NotFoundError, ValidationError } from "../src/blog/errors";
import { InMemoryBlogStore, createInMemoryRepositories } from "../src/blog/memory-repository";
import { PostService } from "../src/blog/posts";
import type { BlogRepositories } from "../src/blog/repository";
import { InMemoryViewMarkerStore } from "../src/blog/view-tracker";
import {
  ADMIN_ID,
  AUTHOR_ID,
  FakeClock,
  MISSING_ID,
  OTHER_AUTHOR_ID,
  createSeededStore
} from "./support/fixtures";

const PAGE = { limit: 10, offset: 0 };

describe("PostService", () => {
  let store: InMemoryBlogStore;
  let repositories: BlogRepositories;
  let viewMarkers: InMemoryViewMarkerStore;
  let clock: FakeClock;
  let posts: PostService;

  beforeEach(() => {
    store = createSeededStore();
    repositories = createInMemoryRepositories(store);
    viewMarkers = new InMemoryViewMarkerStore();
    clock = new FakeClock();
    posts = new PostService(repositories, viewMarkers, { now: clock.now, viewThrottleWindowMs: 30 * 60_000 });
  });

  describe("create", () => {
    it("suffixes colliding slugs", async () => {
      const first = await posts.create(AUTHOR_ID, { title: "Release Notes", content: "v1" });
      const second = await posts.create(AUTHOR_ID, { title: "Release Notes", content: "v2" });
      const third = await posts.create(OTHER_AUTHOR_ID, { title: "Release   notes", content: "v3" });

      expect(first.slug).toBe("release-notes");
      expect(second.slug).toBe("release-notes-1");
      expect(third.slug).toBe("release-notes-2");
    });

    it("defaults to an unpublished draft that accepts comments", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Draft", content: "Body" });

      expect(post.status).toBe("draft");
      expect(post.publishedAt).toBeNull();
      expect(post.allowComments).toBe(true);
      expect(post.isFeatured).toBe(false);
      expect(post.viewCount).toBe(0);
      expect(post.author).toEqual({ id: AUTHOR_ID, username: "author", displayName: "author" });
    });

    it("stamps publishedAt when created as published", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Live", content: "Body", isDraft: false });

      expect(post.status).toBe("published");
      expect(post.publishedAt).toBe(clock.iso());
    });

    it("attaches categories and tags in one call", async () => {
      const news = await repositories.categories.insert({ name: "News", slug: "news", description: null });

      const post = await posts.create(AUTHOR_ID, {
        title: "Tagged",
        content: "Body",
        categoryIds: [news.id, MISSING_ID],
        tags: ["Release", "release", "Ops"]
      });

      expect(post.categories.map((category) => category.slug)).toEqual(["news"]);
      expect(post.tags.map((tag) => tag.name)).toEqual(["ops", "release"]);
    });

    it("rejects over-long tag names before creating the post", async () => {
      const prefix = "x".repeat(50);

      await expect(
        posts.create(AUTHOR_ID, { title: "Tagged", content: "Body", tags: [`${prefix}alpha`, `${prefix}beta`] })
      ).rejects.toThrow("name must be between 1 and 50 characters");
      expect(store.posts).toHaveLength(0);
      expect(store.tags).toHaveLength(0);
    });

    it("rejects an unknown author", async () => {
      await expect(posts.create(MISSING_ID, { title: "Orphan", content: "Body" })).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(store.posts).toHaveLength(0);
    });

    it("validates title and cover image", async () => {
      await expect(posts.create(AUTHOR_ID, { title: "   ", content: "Body" })).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(
        posts.create(AUTHOR_ID, { title: "Cover", content: "Body", coverImageUrl: "javascript:alert(1)" })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("update", () => {
    it("regenerates the slug only when the title changes", async () => {
      const original = await posts.create(AUTHOR_ID, { title: "Release Notes", content: "Body" });
      const other = await posts.create(AUTHOR_ID, { title: "Other", content: "Body" });

      const retitled = await posts.update(other.id, { title: "Release Notes" });
      const touched = await posts.update(original.id, { title: "Release Notes!" });
      const contentOnly = await posts.update(original.id, { content: "Edited" });

      expect(retitled.slug).toBe("release-notes-1");
      expect(touched.slug).toBe("release-notes");
      expect(contentOnly.slug).toBe("release-notes");
      expect(contentOnly.content).toBe("Edited");
    });

    it("replaces tags when supplied and keeps them otherwise", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Tags", content: "Body", tags: ["one", "two"] });

      const untouched = await posts.update(post.id, { summary: "New summary" });
      const cleared = await posts.update(post.id, { tags: [] });

      expect(untouched.tags.map((tag) => tag.name)).toEqual(["one", "two"]);
      expect(cleared.tags).toEqual([]);
    });

    it("fails for a missing post", async () => {
      await expect(posts.update(MISSING_ID, { title: "Nope" })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("state transitions", () => {
    it("moves publishedAt on every publish", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Lifecycle", content: "Body" });

      clock.advanceMinutes(10);
      const published = await posts.publish(post.id);
      expect(published.status).toBe("published");
      expect(published.publishedAt).toBe("2026-03-01T09:10:00.000Z");

      clock.advanceMinutes(5);
      const republished = await posts.publish(post.id);
      expect(republished.publishedAt).toBe("2026-03-01T09:15:00.000Z");
    });

    it("keeps publishedAt when unpublishing", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Lifecycle", content: "Body", isDraft: false });

      const draft = await posts.unpublish(post.id);

      expect(draft.status).toBe("draft");
      expect(draft.publishedAt).toBe("2026-03-01T09:00:00.000Z");
    });

    it("toggles the featured flag independently of status", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Feature me", content: "Body" });

      const featured = await posts.feature(post.id);
      expect(featured.isFeatured).toBe(true);
      expect(featured.status).toBe("draft");

      const plain = await posts.unfeature(post.id);
      expect(plain.isFeatured).toBe(false);
    });

    it("fails transitions on a missing post", async () => {
      await expect(posts.publish(MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
      await expect(posts.feature(MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("getBySlug", () => {
    it("hides drafts", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Hidden", content: "Body" });

      await expect(posts.getBySlug(post.slug, "session:a")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("counts one view per session inside the throttle window", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Popular", content: "Body", isDraft: false });

      expect((await posts.getBySlug(post.slug, "session:a")).viewCount).toBe(1);
      clock.advanceMinutes(10);
      expect((await posts.getBySlug(post.slug, "session:a")).viewCount).toBe(1);
      clock.advanceMinutes(21);
      expect((await posts.getBySlug(post.slug, "session:a")).viewCount).toBe(2);
    });

    it("does not count a repeat view at exactly the window boundary", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Boundary", content: "Body", isDraft: false });

      await posts.getBySlug(post.slug, "session:a");
      clock.advanceMinutes(30);

      expect((await posts.getBySlug(post.slug, "session:a")).viewCount).toBe(1);
    });

    it("counts distinct sessions separately", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Shared", content: "Body", isDraft: false });

      await posts.getBySlug(post.slug, "session:a");
      const second = await posts.getBySlug(post.slug, "session:b");

      expect(second.viewCount).toBe(2);
    });
  });

  describe("delete", () => {
    it("removes the post and its view markers", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Short lived", content: "Body", isDraft: false });
      await posts.getBySlug(post.slug, "session:a");

      await posts.delete(post.id);

      await expect(posts.getById(post.id)).rejects.toBeInstanceOf(NotFoundError);
      expect(await viewMarkers.getLastViewedAt("session:a", post.id)).toBeNull();
      await expect(posts.delete(post.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("listing", () => {
    it("orders published posts by publication time, newest first", async () => {
      const older = await posts.create(AUTHOR_ID, { title: "Older", content: "Body", isDraft: false });
      clock.advanceMinutes(1);
      const newer = await posts.create(AUTHOR_ID, { title: "Newer", content: "Body", isDraft: false });
      await posts.create(AUTHOR_ID, { title: "Draft", content: "Body" });

      const listed = await posts.listPublished(PAGE);

      expect(listed.map((post) => post.id)).toEqual([newer.id, older.id]);
    });

    it("pages with limit and offset", async () => {
      await posts.create(AUTHOR_ID, { title: "One", content: "Body", isDraft: false });
      clock.advanceMinutes(1);
      await posts.create(AUTHOR_ID, { title: "Two", content: "Body", isDraft: false });
      clock.advanceMinutes(1);
      await posts.create(AUTHOR_ID, { title: "Three", content: "Body", isDraft: false });

      const page = await posts.listPublished({ limit: 1, offset: 1 });

      expect(page.map((post) => post.slug)).toEqual(["two"]);
    });

    it("includes drafts in an author listing only when asked", async () => {
      await posts.create(AUTHOR_ID, { title: "Live", content: "Body", isDraft: false });
      await posts.create(AUTHOR_ID, { title: "Pending", content: "Body" });
      await posts.create(OTHER_AUTHOR_ID, { title: "Someone else", content: "Body", isDraft: false });

      const publicView = await posts.listByAuthor(AUTHOR_ID, { includeDrafts: false });
      const ownerView = await posts.listByAuthor(AUTHOR_ID, { includeDrafts: true });

      expect(publicView.map((post) => post.slug)).toEqual(["live"]);
      expect(ownerView.map((post) => post.slug).sort()).toEqual(["live", "pending"]);
    });

    it("lists featured posts that are published", async () => {
      const live = await posts.create(AUTHOR_ID, { title: "Live", content: "Body", isDraft: false });
      const draft = await posts.create(AUTHOR_ID, { title: "Draft", content: "Body" });
      await posts.feature(live.id);
      await posts.feature(draft.id);

      const featured = await posts.listFeatured();

      expect(featured.map((post) => post.id)).toEqual([live.id]);
    });

    it("searches title, summary and content without case sensitivity", async () => {
      await posts.create(AUTHOR_ID, { title: "Deploying", content: "Notes on KUBERNETES rollouts", isDraft: false });
      await posts.create(AUTHOR_ID, { title: "Cooking", content: "Bread", isDraft: false });
      await posts.create(AUTHOR_ID, { title: "Kubernetes draft", content: "Body" });

      const hits = await posts.search("kubernetes", PAGE);

      expect(hits.map((post) => post.slug)).toEqual(["deploying"]);
      expect(await posts.search("   ", PAGE)).toEqual([]);
    });

    it("filters by category and tag and rejects unknown ones", async () => {
      const news = await repositories.categories.insert({ name: "News", slug: "news", description: null });
      await posts.create(AUTHOR_ID, {
        title: "In news",
        content: "Body",
        isDraft: false,
        categoryIds: [news.id],
        tags: ["infra"]
      });
      await posts.create(AUTHOR_ID, { title: "Elsewhere", content: "Body", isDraft: false });
      const infra = store.tags.find((tag) => tag.slug === "infra");

      expect((await posts.listByCategory(news.id, PAGE)).map((post) => post.slug)).toEqual(["in-news"]);
      expect((await posts.listByTag(infra?.id ?? MISSING_ID, PAGE)).map((post) => post.slug)).toEqual(["in-news"]);
      await expect(posts.listByCategory(MISSING_ID, PAGE)).rejects.toBeInstanceOf(NotFoundError);
      await expect(posts.listByTag(MISSING_ID, PAGE)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("assertCanManage", () => {
    it("allows the owner and admins and forbids everyone else", async () => {
      const post = await posts.create(AUTHOR_ID, { title: "Mine", content: "Body" });

      await expect(posts.assertCanManage(post.id, { userId: AUTHOR_ID, role: "AUTHOR" })).resolves.toMatchObject({
        id: post.id
      });
      await expect(posts.assertCanManage(post.id, { userId: ADMIN_ID, role: "ADMIN" })).resolves.toMatchObject({
        id: post.id
      });
      await expect(
        posts.assertCanManage(post.id, { userId: OTHER_AUTHOR_ID, role: "AUTHOR" })
      ).rejects.toBeInstanceOf(ForbiddenError);
    });

    it("reports a missing post before checking ownership", async () => {
      await expect(
        posts.assertCanManage(MISSING_ID, { userId: OTHER_AUTHOR_ID, role: "READER" })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
