import { describe, it, expect } from "vitest";
import { NotFoundError, VersionConflictError } from "../../../src/repository/errors.js";

describe("NotFoundError", () => {
  it("names the entity and id", () => {
    const error = new NotFoundError("Owner", "project-1");

    expect(error.message).toBe("Owner not found: project-1");
    expect(error.entity).toBe("Owner");
    expect(error.id).toBe("project-1");
    expect(NotFoundError.isNotFoundError(error)).toBe(true);
    expect(NotFoundError.isNotFoundError(new Error("x"))).toBe(false);
  });
});

describe("VersionConflictError", () => {
  it("carries both versions", () => {
    const error = new VersionConflictError("Owner", "project-1", 3, 4);

    expect(error.message).toBe("Version conflict for Owner project-1: expected 3, got 4");
    expect(error.expectedVersion).toBe(3);
    expect(error.actualVersion).toBe(4);
    expect(VersionConflictError.isVersionConflictError(error)).toBe(true);
    expect(VersionConflictError.isVersionConflictError(new NotFoundError("Owner", "x"))).toBe(
      false
    );
  });
});
