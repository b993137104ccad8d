import type { AppConfig } from "../../src/config";
import { InMemoryBlogStore } from "../../src/blog/memory-repository";
import type { UserRecord } from "../../src/blog/types";
import type { UserRole } from "../../src/types/context";

export const ADMIN_ID = "00000000-0000-4000-8000-0000000000a1";
export const AUTHOR_ID = "00000000-0000-4000-8000-0000000000a2";
export const READER_ID = "00000000-0000-4000-8000-0000000000a3";
export const OTHER_AUTHOR_ID = "00000000-0000-4000-8000-0000000000a4";
export const MISSING_ID = "00000000-0000-4000-8000-0000000000ff";

export const CSRF_TOKEN = "csrf-token-123456";

export function buildUser(id: string, username: string, role: UserRole): UserRecord {
  return {
    id,
    username,
    email: `${username}@example.com`,
    displayName: username,
    role,
    isActive: true,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z"
  };
}

export function createSeededStore(): InMemoryBlogStore {
  return new InMemoryBlogStore({
    users: [
      buildUser(ADMIN_ID, "admin", "ADMIN"),
      buildUser(AUTHOR_ID, "author", "AUTHOR"),
      buildUser(READER_ID, "reader", "READER"),
      buildUser(OTHER_AUTHOR_ID, "other-author", "AUTHOR")
    ]
  });
}

export function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 3000,
    devAuthBypassEnabled: false,
    devAuthBypassUserId: ADMIN_ID,
    devAuthBypassUserRole: "ADMIN",
    securityHeaders: { isProduction: false },
    ...overrides
  };
}

export class FakeClock {
  constructor(public nowMs = Date.parse("2026-03-01T09:00:00.000Z")) {}

  readonly now = (): number => this.nowMs;

  advanceMinutes(minutes: number): void {
    this.nowMs += minutes * 60_000;
  }

  iso(): string {
    return new Date(this.nowMs).toISOString();
  }
}
