import { createHash } from "node:crypto";
import type { Request, Response } from "express";

export interface PublicCachePolicy {
  maxAgeSeconds: number;
  staleWhileRevalidateSeconds: number;
}

export const TAXONOMY_CACHE_POLICY: PublicCachePolicy = {
  maxAgeSeconds: 30,
  staleWhileRevalidateSeconds: 60
};

export function buildWeakEtag(payload: unknown): string {
  const digest = createHash("sha256").update(JSON.stringify(payload)).digest("base64url");
  return `W/"${digest}"`;
}

/** Anonymous, viewer-independent reads only; the payload must not vary by caller. */
export function sendPublicCachedReadJson(
  req: Request,
  res: Response,
  payload: unknown,
  policy: PublicCachePolicy = TAXONOMY_CACHE_POLICY
): void {
  res.set({
    "Cache-Control": `public, max-age=${policy.maxAgeSeconds}, stale-while-revalidate=${policy.staleWhileRevalidateSeconds}`,
    ETag: buildWeakEtag(payload)
  });

  if (req.fresh) {
    res.status(304).end();
    return;
  }

  res.status(200).json(payload);
}
