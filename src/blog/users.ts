import type { UserRole } from "../types/context";
import { NotFoundError } from "./errors";
import type { BlogRepositories, UserPatch } from "./repository";
import type { UserRecord } from "./types";

export interface UserProfile extends UserRecord {
  postCount: number;
  commentCount: number;
}

export interface UserStatistics {
  totalPosts: number;
  publishedPosts: number;
  draftPosts: number;
  totalComments: number;
  approvedComments: number;
  pendingComments: number;
}

/**
 * Read and admin operations over identity records. Records are created by the
 * identity subsystem; deletion anonymises instead of removing so authored
 * content keeps its owner.
 */
export class UserDirectory {
  constructor(private readonly repositories: BlogRepositories) {}

  async getById(userId: string): Promise<UserProfile> {
    return this.toProfile(await this.requireUser(userId));
  }

  async getByUsername(username: string): Promise<UserProfile> {
    const user = await this.repositories.users.findByUsername(username.trim());
    if (!user) {
      throw new NotFoundError("user not found");
    }
    return this.toProfile(user);
  }

  list(): Promise<UserRecord[]> {
    return this.repositories.users.list();
  }

  async statistics(userId: string): Promise<UserStatistics> {
    await this.requireUser(userId);

    const posts = await this.repositories.posts.countByAuthor(userId);
    const comments = await this.repositories.comments.listByAuthor(userId);
    const approvedComments = comments.filter((comment) => comment.isApproved).length;

    return {
      totalPosts: posts.total,
      publishedPosts: posts.published,
      draftPosts: posts.draft,
      totalComments: comments.length,
      approvedComments,
      pendingComments: comments.length - approvedComments
    };
  }

  updateRole(userId: string, role: UserRole): Promise<UserRecord> {
    return this.persist(userId, { role });
  }

  updateStatus(userId: string, isActive: boolean): Promise<UserRecord> {
    return this.persist(userId, { isActive });
  }

  async delete(userId: string): Promise<UserRecord> {
    await this.requireUser(userId);
    return this.persist(userId, {
      username: `deleted_user_${userId}`,
      email: `deleted_${userId}@example.invalid`,
      displayName: "Deleted User",
      isActive: false
    });
  }

  private async requireUser(userId: string): Promise<UserRecord> {
    const user = await this.repositories.users.findById(userId);
    if (!user) {
      throw new NotFoundError("user not found");
    }
    return user;
  }

  private async persist(userId: string, patch: UserPatch): Promise<UserRecord> {
    const updated = await this.repositories.users.update(userId, patch);
    if (!updated) {
      throw new NotFoundError("user not found");
    }
    return updated;
  }

  private async toProfile(user: UserRecord): Promise<UserProfile> {
    const posts = await this.repositories.posts.countByAuthor(user.id);
    const comments = await this.repositories.comments.listByAuthor(user.id);
    return { ...user, postCount: posts.total, commentCount: comments.length };
  }
}
