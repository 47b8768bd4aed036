import { createScopedLogger, type Logger } from "@atrium/core";
import type { FileStore, PersistenceGateway } from "../types.js";
import { loadCollectionsConfig, type CollectionsConfig } from "../config/index.js";
import { UploadPolicy } from "../policy/index.js";
import { LocalDiskFileStore } from "../storage/index.js";
import { CollectionMutator } from "./CollectionMutator.js";

export const MUTATOR_LOG_SCOPE = "Collections:mutator";

export interface CreateCollectionMutatorOptions {
  gateway: PersistenceGateway;
  /** Defaults to `loadCollectionsConfig(process.env)` */
  config?: CollectionsConfig;
  /** Defaults to a `LocalDiskFileStore` over `config.uploadDir` */
  fileStore?: FileStore;
  /** Defaults to a scoped console logger at `config.logLevel` */
  logger?: Logger;
  clock?: () => number;
}

/**
 * Wire a mutator from configuration.
 *
 * @throws ConfigurationError if no config is given and the environment is invalid
 */
export function createCollectionMutator(options: CreateCollectionMutatorOptions): CollectionMutator {
  const config = options.config ?? loadCollectionsConfig();
  return new CollectionMutator({
    gateway: options.gateway,
    fileStore: options.fileStore ?? new LocalDiskFileStore({ uploadDir: config.uploadDir }),
    policy: new UploadPolicy(config),
    logger: options.logger ?? createScopedLogger(MUTATOR_LOG_SCOPE, config.logLevel),
    clock: options.clock,
  });
}
