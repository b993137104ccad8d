import { ConflictError, ForbiddenError, InvalidStateError, NotFoundError } from "./errors";
import type { BlogRepositories } from "./repository";
import type { CommentRecord } from "./types";
import { sanitizeCommentContent } from "./validation";

export interface CreateCommentInput {
  postId: string;
  content: string;
  parentCommentId?: string | null;
}

export interface ReplyInput {
  content: string;
}

export interface CommentServiceOptions {
  requireModeration: boolean;
}

export class CommentService {
  constructor(
    private readonly repositories: BlogRepositories,
    private readonly options: CommentServiceOptions
  ) {}

  async create(actorId: string, input: CreateCommentInput): Promise<CommentRecord> {
    const content = sanitizeCommentContent(input.content);

    if (!(await this.repositories.users.findById(actorId))) {
      throw new NotFoundError("user not found");
    }

    const post = await this.repositories.posts.findById(input.postId);
    if (!post) {
      throw new NotFoundError("post not found");
    }
    if (!post.allowComments) {
      throw new InvalidStateError("comments are disabled for this post");
    }

    const parentCommentId = input.parentCommentId ?? null;
    if (parentCommentId !== null) {
      const parent = await this.repositories.comments.findById(parentCommentId);
      if (!parent) {
        throw new NotFoundError("parent comment not found");
      }
      if (parent.postId !== post.id) {
        throw new ConflictError("parent comment belongs to a different post");
      }
    }

    return this.repositories.comments.insert({
      content,
      isApproved: !this.options.requireModeration,
      postId: post.id,
      authorId: actorId,
      parentCommentId
    });
  }

  /** The reply always lands on the parent's post, whatever the caller asked for. */
  async reply(parentId: string, actorId: string, input: ReplyInput): Promise<CommentRecord> {
    const parent = await this.requireComment(parentId);
    return this.create(actorId, {
      content: input.content,
      postId: parent.postId,
      parentCommentId: parent.id
    });
  }

  async update(commentId: string, actorId: string, content: string): Promise<CommentRecord> {
    const comment = await this.requireComment(commentId);
    if (comment.authorId !== actorId) {
      throw new ForbiddenError("only the author can edit this comment");
    }

    const updated = await this.repositories.comments.update(commentId, {
      content: sanitizeCommentContent(content),
      isApproved: this.options.requireModeration ? false : comment.isApproved
    });
    if (!updated) {
      throw new NotFoundError("comment not found");
    }
    return updated;
  }

  async delete(commentId: string, actorId: string, isAdmin: boolean): Promise<void> {
    const comment = await this.requireComment(commentId);
    if (!isAdmin && comment.authorId !== actorId) {
      throw new ForbiddenError("only the author or an admin can delete this comment");
    }
    await this.repositories.comments.delete(commentId);
  }

  async approve(commentId: string): Promise<CommentRecord> {
    const updated = await this.repositories.comments.update(commentId, { isApproved: true });
    if (!updated) {
      throw new NotFoundError("comment not found");
    }
    return updated;
  }

  async reject(commentId: string): Promise<void> {
    const deleted = await this.repositories.comments.delete(commentId);
    if (!deleted) {
      throw new NotFoundError("comment not found");
    }
  }

  getById(commentId: string): Promise<CommentRecord> {
    return this.requireComment(commentId);
  }

  async listByPost(postId: string, includePending: boolean): Promise<CommentRecord[]> {
    if (!(await this.repositories.posts.findById(postId))) {
      throw new NotFoundError("post not found");
    }
    return this.repositories.comments.listByPost({ postId, includePending });
  }

  listByUser(userId: string): Promise<CommentRecord[]> {
    return this.repositories.comments.listByAuthor(userId);
  }

  listPending(): Promise<CommentRecord[]> {
    return this.repositories.comments.listPending();
  }

  private async requireComment(commentId: string): Promise<CommentRecord> {
    const comment = await this.repositories.comments.findById(commentId);
    if (!comment) {
      throw new NotFoundError("comment not found");
    }
    return comment;
  }
}
