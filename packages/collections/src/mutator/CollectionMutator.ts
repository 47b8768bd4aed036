/**
 * ## CollectionMutator - Transactional Envelope
 *
 * Coordinates `OwnedCollection` changes with the `FileStore` and the
 * `PersistenceGateway` so that every call either lands completely or leaves
 * the persisted owner and the stored bytes as they were.
 *
 * ### Protocol
 *
 * | Operation | Order of side effects | On failure |
 * |-----------|----------------------|------------|
 * | `attach` | validate → store each → save | delete every byte written in the call |
 * | `detach` | remove → save → delete bytes | delete failure becomes a warning |
 * | `promote` | setPrimary → save | |
 * | `reorder` | reorder → save | |
 * | `purge` | clear → version check → save or deleteOwner → delete bytes | delete failures become warnings |
 *
 * Every operation works on a copy of the owner it is given; the argument is
 * never mutated. Results are values (`MutationResult`); only programmer errors
 * (a broken invariant, an illegal lifecycle transition) are thrown.
 *
 * @example
 * ```typescript
 * const mutator = new CollectionMutator({
 *   fileStore: new LocalDiskFileStore({ uploadDir: config.uploadDir }),
 *   gateway,
 *   policy: new UploadPolicy(config),
 *   logger: createScopedLogger("Collections:mutator", config.logLevel),
 * });
 *
 * const result = await mutator.attach(owner, [{ bytes, originalName, contentType }]);
 * if (result.status === "success") {
 *   render(result.data.owner);
 * }
 * ```
 */

import {
  InvariantError,
  VersionConflictError,
  assertNever,
  createNoOpLogger,
  errorMessage,
  failedResult,
  logOperationError,
  logOperationFailed,
  logOperationRejected,
  logOperationStart,
  logOperationSuccess,
  rejectedResult,
  successResult,
  type BaseOperationLogContext,
  type Logger,
  type OperationFailed,
} from "@atrium/core";
import type { AssetInput, AttachmentRecord, FileStore, Owner, PersistenceGateway } from "../types.js";
import { CollectionErrorCodes, type FailureCode } from "../errors.js";
import { OwnedCollection } from "../collection/index.js";
import { collectionInvariants } from "../invariants/index.js";
import { UploadPolicy } from "../policy/index.js";
import { defaultCollectionsConfig } from "../config/index.js";
import type {
  AttachData,
  CleanupWarning,
  CollectionMutatorOptions,
  DetachData,
  MutationResult,
  MutationSuccess,
  PromoteData,
  PurgeData,
  PurgeOptions,
  ReorderData,
} from "./types.js";

export class CollectionMutator {
  private readonly fileStore: FileStore;
  private readonly gateway: PersistenceGateway;
  private readonly policy: UploadPolicy;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: CollectionMutatorOptions) {
    this.fileStore = options.fileStore;
    this.gateway = options.gateway;
    this.policy = options.policy ?? new UploadPolicy(defaultCollectionsConfig());
    this.logger = options.logger ?? createNoOpLogger();
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Validate, store and attach assets, then save the owner once.
   *
   * Nothing is written when validation fails. A failed store deletes every
   * byte written earlier in the call; a failed save deletes every byte the
   * call wrote.
   */
  async attach(owner: Owner, assets: ReadonlyArray<AssetInput>): Promise<MutationResult<AttachData>> {
    return this.run<AttachData>(owner, "attach", async (context) => {
      const collection = OwnedCollection.fromOwner(owner);
      collection.normalizePrimary();

      const check = this.policy.check(owner.kind, collection.records, assets);
      if (!check.valid) {
        const { code, message, context: violationContext } = check.violation;
        return rejectedResult(code, message, { ...context, ...violationContext });
      }

      const storedPaths: string[] = [];
      for (const asset of check.assets) {
        let storedPath: string;
        try {
          storedPath = await this.fileStore.store(asset.bytes, asset.originalName);
        } catch (error) {
          const orphanedPaths = await this.compensate(storedPaths, context);
          return failedResult(
            CollectionErrorCodes.STORAGE_FAILURE,
            `Storing ${asset.originalName} failed: ${errorMessage(error)}`,
            { ...context, originalName: asset.originalName, rolledBack: storedPaths, orphanedPaths }
          );
        }
        storedPaths.push(storedPath);

        collection.add({
          sortKey: collection.nextSortKey(),
          primary: asset.primary ?? false,
          mediaKind: asset.mediaKind,
          storedPath,
          originalName: asset.originalName,
          contentType: asset.contentType,
          size: asset.bytes.byteLength,
          createdAt: this.clock(),
        });
      }

      collectionInvariants.assertAll(collection.records);

      const saved = await this.persist(collection, context, storedPaths);
      if (saved.status !== "success") {
        return saved;
      }

      const written = new Set(storedPaths);
      return this.success(
        {
          owner: saved.owner,
          attached: saved.owner.attachments.filter((record) => written.has(record.storedPath)),
        },
        saved.owner.version
      );
    });
  }

  /**
   * Remove one attachment, save, then delete its bytes. A failed delete is
   * reported as a warning; the removal stays durable.
   */
  async detach(owner: Owner, recordId: string): Promise<MutationResult<DetachData>> {
    return this.run<DetachData>(owner, "detach", async (context) => {
      const collection = OwnedCollection.fromOwner(owner);
      collection.normalizePrimary();

      const record = collection.get(recordId);
      if (!record || !collection.removeById(recordId)) {
        return rejectedResult(CollectionErrorCodes.NOT_FOUND, `Attachment ${recordId} not found`, {
          ...context,
          recordId,
        });
      }

      collectionInvariants.assertAll(collection.records);

      const saved = await this.persist(collection, context, []);
      if (saved.status !== "success") {
        return saved;
      }

      const warnings = await this.deleteBestEffort([record], context);
      return this.success({ owner: saved.owner, detached: record }, saved.owner.version, warnings);
    });
  }

  /**
   * Make one attachment the owner's only primary. Idempotent.
   */
  async promote(owner: Owner, recordId: string): Promise<MutationResult<PromoteData>> {
    return this.run<PromoteData>(owner, "promote", async (context) => {
      const collection = OwnedCollection.fromOwner(owner);
      collection.normalizePrimary();

      try {
        collection.setPrimaryById(recordId);
      } catch (error) {
        if (InvariantError.hasCode(error, CollectionErrorCodes.NOT_OWNED)) {
          return rejectedResult(CollectionErrorCodes.NOT_OWNED, error.message, {
            ...context,
            recordId,
          });
        }
        throw error;
      }

      collectionInvariants.assertAll(collection.records);

      const saved = await this.persist(collection, context, []);
      if (saved.status !== "success") {
        return saved;
      }

      const primary = saved.owner.attachments.find((record) => record.id === recordId);
      if (!primary) {
        throw new Error(`Saved owner ${owner.id} lost attachment ${recordId}`);
      }
      return this.success({ owner: saved.owner, primary }, saved.owner.version);
    });
  }

  /**
   * Rewrite sort keys to follow `idsInOrder`; unnamed attachments follow in
   * their current relative order.
   */
  async reorder(owner: Owner, idsInOrder: ReadonlyArray<string>): Promise<MutationResult<ReorderData>> {
    return this.run<ReorderData>(owner, "reorder", async (context) => {
      const collection = OwnedCollection.fromOwner(owner);
      collection.normalizePrimary();

      try {
        collection.reorder(idsInOrder);
      } catch (error) {
        if (InvariantError.hasCode(error, CollectionErrorCodes.INVALID_ORDER)) {
          return rejectedResult(CollectionErrorCodes.INVALID_ORDER, error.message, {
            ...context,
            ...error.context,
          });
        }
        throw error;
      }

      collectionInvariants.assertAll(collection.records);

      const saved = await this.persist(collection, context, []);
      if (saved.status !== "success") {
        return saved;
      }
      return this.success({ owner: saved.owner }, saved.owner.version);
    });
  }

  /**
   * Empty the collection, then save the emptied owner or, with `deleteOwner`,
   * delete the owner so its rows cascade. Bytes are deleted best-effort only
   * once the owner change is durable.
   *
   * The stored owner's version is checked before anything changes, so a purge
   * from a stale snapshot deletes neither rows nor bytes.
   */
  async purge(owner: Owner, options: PurgeOptions = {}): Promise<MutationResult<PurgeData>> {
    return this.run<PurgeData>(owner, "purge", async (context) => {
      const collection = OwnedCollection.fromOwner(owner);
      const purged = collection.clear();

      const conflict = await this.checkVersion(owner, context);
      if (conflict) {
        return conflict;
      }

      if (options.deleteOwner) {
        try {
          await this.gateway.deleteOwner(owner.id);
        } catch (error) {
          return failedResult(
            CollectionErrorCodes.PERSISTENCE_FAILURE,
            `Deleting owner ${owner.id} failed: ${errorMessage(error)}`,
            { ...context }
          );
        }
        const warnings = await this.deleteBestEffort(purged, context);
        return this.success({ owner: null, purged }, owner.version, warnings);
      }

      collectionInvariants.assertAll(collection.records);

      const saved = await this.persist(collection, context, []);
      if (saved.status !== "success") {
        return saved;
      }
      const warnings = await this.deleteBestEffort(purged, context);
      return this.success({ owner: saved.owner, purged }, saved.owner.version, warnings);
    });
  }

  /**
   * Log start and outcome around an operation body. Unexpected errors are
   * logged and rethrown.
   */
  private async run<TData>(
    owner: Owner,
    operation: string,
    body: (context: BaseOperationLogContext) => Promise<MutationResult<TData>>
  ): Promise<MutationResult<TData>> {
    const context: BaseOperationLogContext = { operation, ownerId: owner.id, ownerKind: owner.kind };
    logOperationStart(this.logger, context);

    let result: MutationResult<TData>;
    try {
      result = await body(context);
    } catch (error) {
      logOperationError(this.logger, context, error);
      throw error;
    }

    switch (result.status) {
      case "success":
        logOperationSuccess(this.logger, context, {
          version: result.version,
          warnings: result.warnings.length,
        });
        break;
      case "rejected":
        logOperationRejected(this.logger, context, { code: result.code, message: result.reason });
        break;
      case "failed":
        logOperationFailed(this.logger, context, { code: result.code, reason: result.reason });
        break;
      default:
        return assertNever(result);
    }
    return result;
  }

  /**
   * Save the collection's owner snapshot. On failure the given paths (bytes
   * written by this call) are deleted.
   */
  private async persist(
    collection: OwnedCollection,
    context: BaseOperationLogContext,
    writtenPaths: ReadonlyArray<string>
  ): Promise<{ status: "success"; owner: Owner } | OperationFailed<FailureCode>> {
    try {
      const owner = await this.gateway.save(collection.toOwner());
      return { status: "success", owner };
    } catch (error) {
      const orphanedPaths = await this.compensate(writtenPaths, context);
      const failureContext = { ...context, rolledBack: [...writtenPaths], orphanedPaths };

      if (VersionConflictError.isVersionConflictError(error)) {
        return failedResult(CollectionErrorCodes.VERSION_CONFLICT, error.message, {
          ...failureContext,
          expectedVersion: error.expectedVersion,
          actualVersion: error.actualVersion,
        });
      }
      return failedResult(
        CollectionErrorCodes.PERSISTENCE_FAILURE,
        `Saving owner ${collection.ownerId} failed: ${errorMessage(error)}`,
        failureContext
      );
    }
  }

  /**
   * Compare `owner.version` with the stored owner's (0 when none is stored).
   *
   * @returns a failed result on a mismatch or a failed lookup
   */
  private async checkVersion(
    owner: Owner,
    context: BaseOperationLogContext
  ): Promise<OperationFailed<FailureCode> | null> {
    let storedVersion: number;
    try {
      storedVersion = (await this.gateway.findOwner(owner.id))?.version ?? 0;
    } catch (error) {
      return failedResult(
        CollectionErrorCodes.PERSISTENCE_FAILURE,
        `Loading owner ${owner.id} failed: ${errorMessage(error)}`,
        { ...context }
      );
    }
    if (storedVersion === owner.version) {
      return null;
    }
    const conflict = new VersionConflictError("Owner", owner.id, owner.version, storedVersion);
    return failedResult(CollectionErrorCodes.VERSION_CONFLICT, conflict.message, {
      ...context,
      expectedVersion: conflict.expectedVersion,
      actualVersion: conflict.actualVersion,
    });
  }

  /**
   * Delete bytes written earlier in a failed call.
   *
   * @returns paths whose delete failed
   */
  private async compensate(
    paths: ReadonlyArray<string>,
    context: BaseOperationLogContext
  ): Promise<string[]> {
    const orphaned: string[] = [];
    for (const storedPath of paths) {
      try {
        await this.fileStore.delete(storedPath);
      } catch (error) {
        orphaned.push(storedPath);
        this.logger.error("Compensating delete failed", {
          ...context,
          storedPath,
          error: errorMessage(error),
        });
      }
    }
    return orphaned;
  }

  /**
   * Delete the bytes of records already removed durably (or about to be).
   * Failures become warnings.
   */
  private async deleteBestEffort(
    records: ReadonlyArray<AttachmentRecord>,
    context: BaseOperationLogContext
  ): Promise<CleanupWarning[]> {
    const warnings: CleanupWarning[] = [];
    for (const record of records) {
      try {
        await this.fileStore.delete(record.storedPath);
      } catch (error) {
        const message = `Stored file could not be deleted: ${errorMessage(error)}`;
        this.logger.warn("Stored file could not be deleted", {
          ...context,
          storedPath: record.storedPath,
          recordId: record.id ?? null,
          error: errorMessage(error),
        });
        warnings.push({
          code: CollectionErrorCodes.CLEANUP_WARNING,
          message,
          storedPath: record.storedPath,
          ...(record.id !== undefined && { recordId: record.id }),
        });
      }
    }
    return warnings;
  }

  private success<TData>(
    data: TData,
    version: number,
    warnings: CleanupWarning[] = []
  ): MutationSuccess<TData> {
    return { ...successResult(data, version), warnings };
  }
}
