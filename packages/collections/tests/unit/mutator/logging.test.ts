import { describe, it, expect } from "vitest";
import { createMockLogger } from "@atrium/core";
import { CollectionMutator } from "../../../src/mutator/CollectionMutator.js";
import type { PersistenceGateway } from "../../../src/types.js";
import { InMemoryFileStore } from "../../../src/testing/InMemoryFileStore.js";
import { createTestOwner, createTestRecords } from "../../../src/testing/fixtures.js";
import { createHarness, expectSuccess, idAt, seedOwner } from "./helpers.js";

describe("CollectionMutator logging", () => {
  it("logs start and success with the new version", async () => {
    const { mutator, gateway, logger } = createHarness();
    const owner = seedOwner(gateway);

    expectSuccess(await mutator.promote(owner, idAt(owner, 1)));

    expect(logger.calls.map((call) => [call.level, call.message])).toEqual([
      ["INFO", "Operation started"],
      ["INFO", "Operation succeeded"],
    ]);
    expect(logger.getLastCallAt("INFO")?.data).toEqual({
      operation: "promote",
      ownerId: owner.id,
      ownerKind: "gallery-item",
      version: 1,
      warnings: 0,
    });
  });

  it("logs rejections at WARN", async () => {
    const { mutator, gateway, logger } = createHarness();
    const owner = seedOwner(gateway);

    await mutator.detach(owner, "zzz");

    expect(logger.getLastCallAt("WARN")).toMatchObject({
      message: "Operation rejected",
      data: { operation: "detach", rejectionCode: "NOT_FOUND", rejectionMessage: "Attachment zzz not found" },
    });
  });

  it("logs failures at ERROR", async () => {
    const { mutator, gateway, logger } = createHarness();
    const owner = seedOwner(gateway);
    gateway.failNextSave();

    await mutator.reorder(owner, []);

    expect(logger.getLastCallAt("ERROR")).toMatchObject({
      message: "Operation failed",
      data: { operation: "reorder", failureCode: "PERSISTENCE_FAILURE" },
    });
  });

  it("logs and rethrows unexpected errors", async () => {
    const logger = createMockLogger();
    const gateway: PersistenceGateway = {
      findOwner: async () => null,
      save: async (owner) => ({ ...owner, attachments: [] }),
      deleteOwner: async () => undefined,
    };
    const mutator = new CollectionMutator({ fileStore: new InMemoryFileStore(), gateway, logger });
    const owner = createTestOwner({
      attachments: createTestRecords(2).map((record, index) => ({ ...record, id: `r${index}` })),
    });

    await expect(mutator.promote(owner, "r1")).rejects.toThrow(`Saved owner ${owner.id} lost attachment r1`);
    expect(logger.hasLoggedAt("ERROR", "Operation errored")).toBe(true);
  });
});
