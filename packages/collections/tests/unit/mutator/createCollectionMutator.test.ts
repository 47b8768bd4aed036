import { describe, it, expect, vi, afterEach } from "vitest";
import { createCollectionMutator } from "../../../src/mutator/createCollectionMutator.js";
import { defaultCollectionsConfig } from "../../../src/config/config.js";
import { InMemoryFileStore } from "../../../src/testing/InMemoryFileStore.js";
import { InMemoryPersistenceGateway } from "../../../src/testing/InMemoryPersistenceGateway.js";
import { createTestAsset, createTestOwner } from "../../../src/testing/fixtures.js";
import { expectRejected, expectSuccess } from "./helpers.js";

describe("createCollectionMutator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies the configured upload rules", async () => {
    const gateway = new InMemoryPersistenceGateway();
    const mutator = createCollectionMutator({
      gateway,
      fileStore: new InMemoryFileStore(),
      config: { ...defaultCollectionsConfig(), maxFilesPerItem: 1, logLevel: "ERROR" },
    });
    const owner = gateway.seed(createTestOwner());

    const result = expectRejected(await mutator.attach(owner, [createTestAsset(), createTestAsset()]));

    expect(result.reason).toBe("Cannot hold 2 attachments (limit 1)");
  });

  it("logs through a scoped console logger at the configured level", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const gateway = new InMemoryPersistenceGateway();
    const mutator = createCollectionMutator({
      gateway,
      fileStore: new InMemoryFileStore(),
      config: { ...defaultCollectionsConfig(), logLevel: "INFO" },
      clock: () => 42,
    });
    const owner = gateway.seed(createTestOwner());

    const result = expectSuccess(await mutator.attach(owner, [createTestAsset()]));

    expect(result.data.attached[0]?.createdAt).toBe(42);
    expect(info).toHaveBeenCalledWith(
      `[Collections:mutator] Operation started ${JSON.stringify({
        operation: "attach",
        ownerId: owner.id,
        ownerKind: "gallery-item",
      })}`
    );
  });

  it("stays quiet below the configured level", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const gateway = new InMemoryPersistenceGateway();
    const mutator = createCollectionMutator({
      gateway,
      fileStore: new InMemoryFileStore(),
      config: { ...defaultCollectionsConfig(), logLevel: "WARN" },
    });

    await mutator.purge(gateway.seed(createTestOwner()));

    expect(info).not.toHaveBeenCalled();
  });
});
