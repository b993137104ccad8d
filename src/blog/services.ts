import type { AppConfig } from "../config";
import { CategoryService } from "./categories";
import { CommentService } from "./comments";
import { PostService } from "./posts";
import type { BlogRepositories } from "./repository";
import { TagService } from "./tags";
import { UserDirectory } from "./users";
import type { ViewMarkerStore } from "./view-tracker";

export interface BlogServices {
  posts: PostService;
  comments: CommentService;
  categories: CategoryService;
  tags: TagService;
  users: UserDirectory;
}

export function createBlogServices(
  config: AppConfig,
  repositories: BlogRepositories,
  viewMarkers: ViewMarkerStore,
  now?: () => number
): BlogServices {
  return {
    posts: new PostService(repositories, viewMarkers, {
      now,
      viewThrottleWindowMs: (config.views?.throttleMinutes ?? 30) * 60_000
    }),
    comments: new CommentService(repositories, {
      requireModeration: config.comments?.requireModeration ?? true
    }),
    categories: new CategoryService(repositories.categories),
    tags: new TagService(repositories.tags),
    users: new UserDirectory(repositories)
  };
}
