import type { SqlClient } from "../db/connection";

export const DEFAULT_VIEW_THROTTLE_WINDOW_MS = 30 * 60_000;
const DEFAULT_MAX_ENTRIES = 50_000;

/**
 * Last-seen timestamps per (viewing session, post). Owned by the session layer;
 * the post service only reads and refreshes markers through this capability.
 */
export interface ViewMarkerStore {
  getLastViewedAt(sessionId: string, postId: string): Promise<number | null>;
  setLastViewedAt(sessionId: string, postId: string, viewedAtMs: number): Promise<void>;
  forgetPost(postId: string): Promise<void>;
}

export function shouldCountView(lastViewedAtMs: number | null, nowMs: number, windowMs: number): boolean {
  return lastViewedAtMs === null || nowMs - lastViewedAtMs > windowMs;
}

export class InMemoryViewMarkerStore implements ViewMarkerStore {
  private readonly markers = new Map<string, number>();
  private readonly maxEntries: number;

  constructor(maxEntries = DEFAULT_MAX_ENTRIES) {
    this.maxEntries = Math.max(100, maxEntries);
  }

  async getLastViewedAt(sessionId: string, postId: string): Promise<number | null> {
    return this.markers.get(markerKey(sessionId, postId)) ?? null;
  }

  async setLastViewedAt(sessionId: string, postId: string, viewedAtMs: number): Promise<void> {
    const key = markerKey(sessionId, postId);
    if (!this.markers.has(key) && this.markers.size >= this.maxEntries) {
      this.evictOldest();
    }

    // Re-insert so iteration order tracks recency.
    this.markers.delete(key);
    this.markers.set(key, viewedAtMs);
  }

  async forgetPost(postId: string): Promise<void> {
    const suffix = `\u0000${postId}`;
    for (const key of [...this.markers.keys()]) {
      if (key.endsWith(suffix)) {
        this.markers.delete(key);
      }
    }
  }

  private evictOldest(): void {
    const oldest = this.markers.keys().next();
    if (!oldest.done) {
      this.markers.delete(oldest.value);
    }
  }
}

export class PostgresViewMarkerStore implements ViewMarkerStore {
  constructor(private readonly pool: SqlClient) {}

  async getLastViewedAt(sessionId: string, postId: string): Promise<number | null> {
    const result = await this.pool.query<{ last_viewed_at: Date }>(
      `
        SELECT last_viewed_at
        FROM post_view_markers
        WHERE session_id = $1 AND post_id = $2
      `,
      [sessionId, postId]
    );

    const row = result.rows[0];
    return row ? row.last_viewed_at.getTime() : null;
  }

  async setLastViewedAt(sessionId: string, postId: string, viewedAtMs: number): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO post_view_markers (session_id, post_id, last_viewed_at)
        VALUES ($1, $2, $3::timestamptz)
        ON CONFLICT (session_id, post_id)
        DO UPDATE SET last_viewed_at = EXCLUDED.last_viewed_at
      `,
      [sessionId, postId, new Date(viewedAtMs).toISOString()]
    );
  }

  async forgetPost(postId: string): Promise<void> {
    await this.pool.query("DELETE FROM post_view_markers WHERE post_id = $1", [postId]);
  }
}

function markerKey(sessionId: string, postId: string): string {
  return `${sessionId}\u0000${postId}`;
}
