import crypto from "node:crypto";
import type { DocumentIdentity } from "../types";

export const DIGEST_LENGTH = 24;

export function digestUrl(url: string): string {
  return crypto.createHash("sha256").update(url).digest("hex").slice(0, DIGEST_LENGTH);
}

function pathSegments(url: string): string[] {
  let pathname: string;
  try {
    pathname = new URL(url, "http://relative.invalid").pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  return pathname.split("/").filter((segment) => segment.length > 0);
}

/**
 * Derives the dedup key of an attachment URL. URLs shaped like
 * `.../<marker>/<caseGuid>/<docGuid>/<filename>` yield the GUID pair; anything
 * else falls back to a digest of the full URL string.
 */
export function identityFromUrl(url: string, marker: string): DocumentIdentity {
  const segments = pathSegments(url);
  const markerIndex = segments.indexOf(marker);
  if (markerIndex >= 0) {
    const caseGuid = segments[markerIndex + 1];
    const docGuid = segments[markerIndex + 2];
    const filename = segments[markerIndex + 3];
    if (caseGuid && docGuid && filename) {
      return { kind: "guid", key: `${caseGuid}/${docGuid}`, caseGuid, docGuid };
    }
  }

  const digest = digestUrl(url);
  return { kind: "digest", key: `sha256:${digest}`, digest };
}

/** File-system stem for an identity key: the docGuid, or the digest. */
export function identityFileStem(key: string): string {
  const stem = key.startsWith("sha256:") ? key.slice("sha256:".length) : key.slice(key.lastIndexOf("/") + 1);
  return stem.replace(/[^\w.-]/g, "_");
}

export function filenameFromUrl(url: string): string {
  const segments = pathSegments(url);
  const last = segments[segments.length - 1] ?? "";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
