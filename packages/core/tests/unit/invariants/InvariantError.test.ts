import { describe, it, expect } from "vitest";
import { InvariantError } from "../../../src/invariants/InvariantError.js";

type ShelfErrorCode = "SHELF_FULL" | "SHELF_LOCKED";

const ShelfInvariantError = InvariantError.forContext<ShelfErrorCode>("Shelf");

describe("InvariantError", () => {
  it("carries code, message and context", () => {
    const error = new InvariantError("ANY_CODE", "Something broke", { id: "x" });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("ANY_CODE");
    expect(error.message).toBe("Something broke");
    expect(error.context).toEqual({ id: "x" });
    expect(error.name).toBe("InvariantError");
  });

  it("leaves context undefined when not provided", () => {
    const error = new InvariantError("ANY_CODE", "Something broke");

    expect(error.context).toBeUndefined();
    expect("context" in error).toBe(false);
  });
});

describe("InvariantError.forContext", () => {
  it("names instances and the class after the context", () => {
    const error = new ShelfInvariantError("SHELF_FULL", "Shelf is full");

    expect(error.name).toBe("ShelfInvariantError");
    expect(ShelfInvariantError.name).toBe("ShelfInvariantError");
  });

  it("produces errors recognised by the base type guards", () => {
    const error = new ShelfInvariantError("SHELF_LOCKED", "Shelf is locked");

    expect(error).toBeInstanceOf(InvariantError);
    expect(InvariantError.isInvariantError(error)).toBe(true);
    expect(InvariantError.hasCode(error, "SHELF_LOCKED")).toBe(true);
    expect(InvariantError.hasCode(error, "SHELF_FULL")).toBe(false);
  });

  it("does not recognise plain errors", () => {
    expect(InvariantError.isInvariantError(new Error("plain"))).toBe(false);
    expect(InvariantError.hasCode("SHELF_FULL", "SHELF_FULL")).toBe(false);
  });
});
