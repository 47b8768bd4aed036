/**
 * Declarative rules over an owner's attachment list.
 *
 * `collectionInvariants` must hold before every save; the parameterised rules
 * are checked against incoming assets before anything is written.
 */

import { createInvariant, createInvariantSet } from "@atrium/core";
import type { AttachmentRecord, MediaKind, OwnerKind } from "../types.js";
import { CollectionErrorCodes, CollectionInvariantError, type CollectionErrorCode } from "../errors.js";

type Records = ReadonlyArray<AttachmentRecord>;

function countPrimaries(records: Records): number {
  return records.filter((record) => record.primary).length;
}

/**
 * Exactly one primary in a non-empty collection, none in an empty one.
 */
export const hasSinglePrimary = createInvariant<Records, CollectionErrorCode>(
  {
    name: "hasSinglePrimary",
    code: CollectionErrorCodes.SINGLE_PRIMARY_VIOLATED,
    check: (records) => countPrimaries(records) === (records.length === 0 ? 0 : 1),
    message: (records) =>
      `Expected ${records.length === 0 ? "no" : "exactly one"} primary attachment, found ${countPrimaries(records)}`,
    context: (records) => ({
      size: records.length,
      primaries: records.filter((record) => record.primary).map((record) => record.id ?? null),
    }),
  },
  CollectionInvariantError
);

/**
 * Assigned ids are unique within the collection.
 */
export const recordIdsAreUnique = createInvariant<Records, CollectionErrorCode>(
  {
    name: "recordIdsAreUnique",
    code: CollectionErrorCodes.DUPLICATE_RECORD,
    check: (records) => {
      const ids = records.flatMap((record) => (record.id === undefined ? [] : [record.id]));
      return new Set(ids).size === ids.length;
    },
    message: () => "Attachment ids must be unique within a collection",
  },
  CollectionInvariantError
);

export const collectionInvariants = createInvariantSet<Records, CollectionErrorCode>([
  hasSinglePrimary,
  recordIdsAreUnique,
]);

/**
 * Room for `incoming` more attachments under `limit`.
 */
export const collectionHasRoom = createInvariant<Records, CollectionErrorCode, [number, number]>(
  {
    name: "collectionHasRoom",
    code: CollectionErrorCodes.COLLECTION_FULL,
    check: (records, incoming, limit) => records.length + incoming <= limit,
    message: (records, incoming, limit) =>
      `Cannot hold ${records.length + incoming} attachments (limit ${limit})`,
    context: (records, incoming, limit) => ({ current: records.length, incoming, limit }),
  },
  CollectionInvariantError
);

/**
 * The owner kind accepts the media kind.
 */
export const mediaKindAllowed = createInvariant<
  MediaKind,
  CollectionErrorCode,
  [OwnerKind, ReadonlyArray<MediaKind>]
>(
  {
    name: "mediaKindAllowed",
    code: CollectionErrorCodes.MEDIA_KIND_NOT_ALLOWED,
    check: (mediaKind, _ownerKind, accepted) => accepted.includes(mediaKind),
    message: (mediaKind, ownerKind) => `A ${ownerKind} does not accept ${mediaKind} attachments`,
    context: (mediaKind, ownerKind, accepted) => ({ mediaKind, ownerKind, accepted: [...accepted] }),
  },
  CollectionInvariantError
);
