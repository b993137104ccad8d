import { beforeEach, describe, expect, it } from "vitest";
import { CommentService } from "../src/blog/comments";
import { NotFoundError } from "../src/blog/errors";
import { createInMemoryRepositories } from "../src/blog/memory-repository";
import { PostService } from "../src/blog/posts";
import type { BlogRepositories } from "../src/blog/repository";
import { UserDirectory } from "../src/blog/users";
import { InMemoryViewMarkerStore } from "../src/blog/view-tracker";
import { AUTHOR_ID, MISSING_ID, READER_ID, createSeededStore } from "./support/fixtures";

describe("UserDirectory", () => {
  let repositories: BlogRepositories;
  let users: UserDirectory;
  let posts: PostService;
  let comments: CommentService;

  beforeEach(() => {
    repositories = createInMemoryRepositories(createSeededStore());
    users = new UserDirectory(repositories);
    posts = new PostService(repositories, new InMemoryViewMarkerStore());
    comments = new CommentService(repositories, { requireModeration: true });
  });

  it("aggregates post and comment statistics", async () => {
    const live = await posts.create(AUTHOR_ID, { title: "Live", content: "Body", isDraft: false });
    await posts.create(AUTHOR_ID, { title: "Pending", content: "Body" });
    const approved = await comments.create(AUTHOR_ID, { postId: live.id, content: "Approved" });
    await comments.create(AUTHOR_ID, { postId: live.id, content: "Waiting" });
    await comments.approve(approved.id);

    expect(await users.statistics(AUTHOR_ID)).toEqual({
      totalPosts: 2,
      publishedPosts: 1,
      draftPosts: 1,
      totalComments: 2,
      approvedComments: 1,
      pendingComments: 1
    });
    await expect(users.statistics(MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("returns profiles with counts by id and username", async () => {
    await posts.create(AUTHOR_ID, { title: "Live", content: "Body", isDraft: false });

    const byId = await users.getById(AUTHOR_ID);
    const byName = await users.getByUsername("author");

    expect(byId.postCount).toBe(1);
    expect(byId.commentCount).toBe(0);
    expect(byName.id).toBe(AUTHOR_ID);
    await expect(users.getByUsername("nobody")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("changes role and active status", async () => {
    const promoted = await users.updateRole(READER_ID, "AUTHOR");
    const suspended = await users.updateStatus(READER_ID, false);

    expect(promoted.role).toBe("AUTHOR");
    expect(suspended.isActive).toBe(false);
    await expect(users.updateRole(MISSING_ID, "ADMIN")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("anonymises instead of removing so authored posts keep their owner", async () => {
    const post = await posts.create(AUTHOR_ID, { title: "Legacy", content: "Body", isDraft: false });

    const deleted = await users.delete(AUTHOR_ID);

    expect(deleted).toMatchObject({
      id: AUTHOR_ID,
      username: `deleted_user_${AUTHOR_ID}`,
      email: `deleted_${AUTHOR_ID}@example.invalid`,
      displayName: "Deleted User",
      isActive: false
    });
    expect((await posts.getById(post.id)).author?.displayName).toBe("Deleted User");
    await expect(users.getByUsername("author")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists users by username", async () => {
    expect((await users.list()).map((user) => user.username)).toEqual(["admin", "author", "other-author", "reader"]);
  });
});
