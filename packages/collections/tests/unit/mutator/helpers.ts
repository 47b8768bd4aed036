import {
  createMockLogger,
  type MockLogger,
  type OperationFailed,
  type OperationRejected,
} from "@atrium/core";
import { CollectionMutator } from "../../../src/mutator/CollectionMutator.js";
import type { MutationResult, MutationSuccess } from "../../../src/mutator/types.js";
import type { FailureCode, RejectionCode } from "../../../src/errors.js";
import type { Owner, OwnerKind } from "../../../src/types.js";
import { InMemoryFileStore } from "../../../src/testing/InMemoryFileStore.js";
import { InMemoryPersistenceGateway } from "../../../src/testing/InMemoryPersistenceGateway.js";
import { createTestOwner, createTestRecords } from "../../../src/testing/fixtures.js";

export const NOW = 1_700_000_123_000;

export interface MutatorHarness {
  fileStore: InMemoryFileStore;
  gateway: InMemoryPersistenceGateway;
  logger: MockLogger;
  mutator: CollectionMutator;
}

export function createHarness(): MutatorHarness {
  const fileStore = new InMemoryFileStore();
  const gateway = new InMemoryPersistenceGateway();
  const logger = createMockLogger();
  const mutator = new CollectionMutator({ fileStore, gateway, logger, clock: () => NOW });
  return { fileStore, gateway, logger, mutator };
}

/**
 * A persisted owner with `count` photo records; the first is primary.
 */
export function seedOwner(
  gateway: InMemoryPersistenceGateway,
  count = 3,
  kind: OwnerKind = "gallery-item"
): Owner {
  return gateway.seed(createTestOwner({ kind, attachments: createTestRecords(count) }));
}

export function idAt(owner: Owner, index: number): string {
  const id = owner.attachments[index]?.id;
  if (id === undefined) {
    throw new Error(`owner ${owner.id} has no saved record at ${index}`);
  }
  return id;
}

export function primaryIds(owner: Owner): Array<string | undefined> {
  return owner.attachments.filter((record) => record.primary).map((record) => record.id);
}

export function expectSuccess<TData>(result: MutationResult<TData>): MutationSuccess<TData> {
  if (result.status !== "success") {
    throw new Error(`expected success, got ${result.status} ${result.code}: ${result.reason}`);
  }
  return result;
}

export function expectRejected<TData>(result: MutationResult<TData>): OperationRejected<RejectionCode> {
  if (result.status !== "rejected") {
    throw new Error(`expected rejected, got ${result.status}`);
  }
  return result;
}

export function expectFailed<TData>(result: MutationResult<TData>): OperationFailed<FailureCode> {
  if (result.status !== "failed") {
    throw new Error(`expected failed, got ${result.status}`);
  }
  return result;
}
