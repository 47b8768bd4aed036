import type { AttachmentRecord, MediaKind, OwnerKind } from "../types.js";
import { MEDIA_KINDS, OWNER_KINDS } from "../types.js";

/**
 * Identity equality for attachment records.
 *
 * Two records are the same record when they are the same object, or when both
 * carry an assigned id and the ids match. Records without ids are never equal
 * by value.
 */
export function sameRecord(a: AttachmentRecord, b: AttachmentRecord): boolean {
  if (a === b) {
    return true;
  }
  return a.id !== undefined && b.id !== undefined && a.id === b.id;
}

/**
 * `image/*` is a photo, `video/*` a video. Logos are only ever chosen by the
 * caller.
 *
 * @example
 * ```typescript
 * mediaKindFromContentType("image/png");       // "photo"
 * mediaKindFromContentType("video/mp4");       // "video"
 * mediaKindFromContentType("application/pdf"); // undefined
 * ```
 */
export function mediaKindFromContentType(contentType: string): MediaKind | undefined {
  const normalized = contentType.trim().toLowerCase();
  if (normalized.startsWith("image/")) {
    return "photo";
  }
  if (normalized.startsWith("video/")) {
    return "video";
  }
  return undefined;
}

export function isMediaKind(value: unknown): value is MediaKind {
  return typeof value === "string" && MEDIA_KINDS.some((kind) => kind === value);
}

export function isOwnerKind(value: unknown): value is OwnerKind {
  return typeof value === "string" && OWNER_KINDS.some((kind) => kind === value);
}

export function copyRecord(record: AttachmentRecord): AttachmentRecord {
  return { ...record };
}

/**
 * Stable sort by `sortKey`; ties keep their input order.
 */
export function sortBySortKey(records: ReadonlyArray<AttachmentRecord>): AttachmentRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => a.record.sortKey - b.record.sortKey || a.index - b.index)
    .map(({ record }) => record);
}
