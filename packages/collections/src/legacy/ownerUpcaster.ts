/**
 * ## Owner Upcaster - Legacy Row Normalization
 *
 * Owner documents stored before the single-primary invariant existed
 * (`stateVersion: 1`) use the legacy record shape:
 *
 * | Legacy field | Current field | Null handling |
 * |--------------|---------------|---------------|
 * | `sortOrder` | `sortKey` | null → 0 |
 * | `isPrimary` | `primary` | null → false |
 * | `mediaType` (`PHOTO`/`VIDEO`/`LOGO`) | `mediaKind` | lower-cased |
 * | `filePath` | `storedPath` | |
 * | `fileName` | `originalName` | |
 * | `fileType` | `contentType` | |
 * | `fileSize` | `size` | |
 *
 * When several legacy records are flagged primary only the first in sort
 * order keeps the flag. A legacy collection with no primary is left as-is;
 * `OwnedCollection.getPrimary` falls back to the first record.
 *
 * @example
 * ```typescript
 * const { document: owner, wasUpcasted } = upcastOwner(row);
 * ```
 */

import { z } from "zod";
import { createUpcaster, DocumentUpcasterError, type DocumentLoadResult } from "@atrium/core";
import type { AttachmentRecord, Owner } from "../types.js";
import { MEDIA_KINDS, OWNER_KINDS, OWNER_STATE_VERSION } from "../types.js";
import { sortBySortKey } from "../record/index.js";

const LegacyRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value)),
  sortOrder: z.number().int().nullish(),
  isPrimary: z.boolean().nullish(),
  mediaType: z.enum(["PHOTO", "VIDEO", "LOGO"]),
  filePath: z.string().min(1),
  fileName: z.string().nullish(),
  fileType: z.string().nullish(),
  fileSize: z.number().int().nonnegative().nullish(),
  createdAt: z.number().int().nullish(),
});

export const LegacyOwnerSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value)),
  kind: z.enum(OWNER_KINDS),
  stateVersion: z.literal(1),
  version: z.number().int().nonnegative().default(0),
  attachments: z.array(LegacyRecordSchema).default([]),
});

export type LegacyOwner = z.input<typeof LegacyOwnerSchema>;

const AttachmentRecordSchema = z.object({
  id: z.string().optional(),
  sortKey: z.number().int(),
  primary: z.boolean(),
  mediaKind: z.enum(MEDIA_KINDS),
  storedPath: z.string(),
  originalName: z.string(),
  contentType: z.string(),
  size: z.number().int().nonnegative(),
  createdAt: z.number(),
});

export const OwnerSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(OWNER_KINDS),
  stateVersion: z.literal(OWNER_STATE_VERSION),
  version: z.number().int().nonnegative(),
  attachments: z.array(AttachmentRecordSchema),
});

export function isOwner(value: unknown): value is Owner {
  return OwnerSchema.safeParse(value).success;
}

/**
 * Migrate a version 1 owner document to version 2.
 *
 * @throws DocumentUpcasterError INVALID_STATE if the document does not have
 * the legacy shape
 */
export function migrateLegacyOwner(state: unknown): Owner {
  const parsed = LegacyOwnerSchema.safeParse(state);
  if (!parsed.success) {
    throw new DocumentUpcasterError("INVALID_STATE", "Legacy owner document is malformed", {
      errors: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  const legacy = parsed.data;

  const records: AttachmentRecord[] = legacy.attachments.map((row) => ({
    id: row.id,
    sortKey: row.sortOrder ?? 0,
    primary: row.isPrimary ?? false,
    mediaKind: row.mediaType === "PHOTO" ? "photo" : row.mediaType === "VIDEO" ? "video" : "logo",
    storedPath: row.filePath,
    originalName: row.fileName ?? row.filePath,
    contentType: row.fileType ?? "application/octet-stream",
    size: row.fileSize ?? 0,
    createdAt: row.createdAt ?? 0,
  }));

  let primaryKept = false;
  for (const record of sortBySortKey(records)) {
    if (record.primary) {
      record.primary = !primaryKept;
      primaryKept = true;
    }
  }

  return {
    id: legacy.id,
    kind: legacy.kind,
    stateVersion: OWNER_STATE_VERSION,
    version: legacy.version,
    attachments: records,
  };
}

const upcaster = createUpcaster<Owner>({
  currentVersion: OWNER_STATE_VERSION,
  migrations: {
    1: migrateLegacyOwner,
  },
  validate: isOwner,
});

/**
 * Load an owner document of any supported schema version.
 *
 * @throws DocumentUpcasterError for null, unversioned, future-version or
 * invalid documents
 */
export function upcastOwner(raw: unknown): DocumentLoadResult<Owner> {
  return upcaster(raw);
}
