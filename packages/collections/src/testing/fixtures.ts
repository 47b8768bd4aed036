import type { AssetInput, AttachmentRecord, Owner } from "../types.js";
import { OWNER_STATE_VERSION } from "../types.js";

let ownerCounter = 0;

export function createTestOwner(overrides: Partial<Owner> = {}): Owner {
  ownerCounter += 1;
  return {
    id: `owner-${ownerCounter}`,
    kind: "gallery-item",
    stateVersion: OWNER_STATE_VERSION,
    version: 0,
    attachments: [],
    ...overrides,
  };
}

export function createTestRecord(overrides: Partial<AttachmentRecord> = {}): AttachmentRecord {
  return {
    sortKey: 0,
    primary: false,
    mediaKind: "photo",
    storedPath: "mem/test.png",
    originalName: "test.png",
    contentType: "image/png",
    size: 4,
    createdAt: 1_700_000_000_000,
    ...overrides,
  };
}

/**
 * A small valid PNG asset; `bytes` defaults to four placeholder bytes.
 */
export function createTestAsset(overrides: Partial<AssetInput> = {}): AssetInput {
  return {
    bytes: new Uint8Array([1, 2, 3, 4]),
    originalName: "photo.png",
    contentType: "image/png",
    ...overrides,
  };
}

/**
 * `count` photo records with sort keys 0..count-1; the first is primary.
 * Stored paths are `mem/seed-<n>.png`.
 */
export function createTestRecords(count: number): AttachmentRecord[] {
  return Array.from({ length: count }, (_, index) =>
    createTestRecord({
      sortKey: index,
      primary: index === 0,
      storedPath: `mem/seed-${index}.png`,
      originalName: `seed-${index}.png`,
    })
  );
}
