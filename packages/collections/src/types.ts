/**
 * Core types for owned attachment collections.
 */

import type { BaseDocument } from "@atrium/core";

export const MEDIA_KINDS = ["photo", "video", "logo"] as const;

/**
 * Used for filtering and upload policy; never for invariant enforcement.
 */
export type MediaKind = (typeof MEDIA_KINDS)[number];

export const OWNER_KINDS = ["gallery-item", "photo-gallery-item", "project"] as const;

export type OwnerKind = (typeof OWNER_KINDS)[number];

/**
 * Current schema version of owner documents.
 * Version 1 is the legacy row shape handled by `upcastOwner`.
 */
export const OWNER_STATE_VERSION = 2;

/**
 * One asset reference inside an owner's collection.
 *
 * Records carry no back-reference to their owner: the owner's collection holds
 * them, and every engine call addresses a record through an `(owner, recordId)`
 * pair.
 */
export interface AttachmentRecord {
  /** Assigned by the persistence gateway; absent until the first save */
  id?: string;
  /** Relative order; not required to be contiguous or unique */
  sortKey: number;
  primary: boolean;
  mediaKind: MediaKind;
  /** Opaque handle returned by `FileStore.store` */
  storedPath: string;
  originalName: string;
  contentType: string;
  /** Size in bytes */
  size: number;
  /** Epoch milliseconds */
  createdAt: number;
}

/**
 * A content item holding an ordered attachment collection.
 *
 * When `attachments` is non-empty exactly one record has `primary = true`.
 */
export interface Owner extends BaseDocument {
  id: string;
  kind: OwnerKind;
  stateVersion: typeof OWNER_STATE_VERSION;
  /** Optimistic concurrency stamp, bumped on every save */
  version: number;
  attachments: AttachmentRecord[];
}

/**
 * An incoming asset to attach.
 */
export interface AssetInput {
  bytes: Uint8Array;
  originalName: string;
  contentType: string;
  /** Defaults to the kind implied by `contentType`; `logo` must be explicit */
  mediaKind?: MediaKind;
  /** Take over the primary flag when attached to a non-empty collection */
  primary?: boolean;
}

/**
 * Physical byte storage behind attachment records.
 */
export interface FileStore {
  /**
   * @returns An opaque stored path
   */
  store(bytes: Uint8Array, suggestedName: string): Promise<string>;

  delete(storedPath: string): Promise<void>;
}

/**
 * Persistence of owners together with their attachment rows.
 *
 * Implementations must:
 * - assign ids to records that have none on `save`
 * - delete rows no longer referenced by the saved owner
 * - throw `VersionConflictError` when the owner's version is stale, and
 *   increment the version on success
 * - cascade every attachment row on `deleteOwner`
 */
export interface PersistenceGateway {
  findOwner(ownerId: string): Promise<Owner | null>;

  save(owner: Owner): Promise<Owner>;

  deleteOwner(ownerId: string): Promise<void>;
}
