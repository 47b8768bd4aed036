/**
 * Unit Tests for Document Upcaster
 *
 * - createUpcaster: chain-based migration
 * - DocumentUpcasterError: error handling
 * - getStateVersion: version extraction
 */
import { describe, it, expect } from "vitest";
import {
  createUpcaster,
  DocumentUpcasterError,
  getStateVersion,
} from "../../../src/documents/upcaster.js";
import type { BaseDocument } from "../../../src/documents/types.js";

interface NoteV3 extends BaseDocument {
  id: string;
  title: string;
  body: string;
  pinned: boolean;
  stateVersion: 3;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNoteV3(value: unknown): value is NoteV3 {
  return (
    isRecord(value) &&
    value["stateVersion"] === 3 &&
    typeof value["id"] === "string" &&
    typeof value["title"] === "string" &&
    typeof value["body"] === "string" &&
    typeof value["pinned"] === "boolean" &&
    typeof value["version"] === "number"
  );
}

const upcastNote = createUpcaster<NoteV3>({
  currentVersion: 3,
  migrations: {
    1: (state) => ({ ...(isRecord(state) ? state : {}), body: "", stateVersion: 2 }),
    2: (state) => ({ ...(isRecord(state) ? state : {}), pinned: false, stateVersion: 3 }),
  },
  validate: isNoteV3,
});

describe("createUpcaster", () => {
  it("returns current documents as-is", () => {
    const note: NoteV3 = {
      id: "n1",
      title: "Hello",
      body: "text",
      pinned: true,
      stateVersion: 3,
      version: 7,
    };

    const result = upcastNote(note);

    expect(result.wasUpcasted).toBe(false);
    expect(result.originalStateVersion).toBe(3);
    expect(result.document).toBe(note);
  });

  it("chains migrations from an old version", () => {
    const result = upcastNote({ id: "n1", title: "Hello", stateVersion: 1, version: 2 });

    expect(result.wasUpcasted).toBe(true);
    expect(result.originalStateVersion).toBe(1);
    expect(result.document).toEqual({
      id: "n1",
      title: "Hello",
      body: "",
      pinned: false,
      stateVersion: 3,
      version: 2,
    });
  });

  it("applies only the remaining migrations", () => {
    const result = upcastNote({ id: "n1", title: "Hi", body: "kept", stateVersion: 2, version: 1 });

    expect(result.document.body).toBe("kept");
    expect(result.document.pinned).toBe(false);
  });

  it("rejects null and undefined", () => {
    expect(() => upcastNote(null)).toThrow(DocumentUpcasterError);
    try {
      upcastNote(undefined);
    } catch (error) {
      expect(error).toBeInstanceOf(DocumentUpcasterError);
      if (error instanceof DocumentUpcasterError) {
        expect(error.code).toBe("NULL_STATE");
      }
    }
  });

  it("rejects future versions", () => {
    try {
      upcastNote({ id: "n1", stateVersion: 9, version: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DocumentUpcasterError);
      if (error instanceof DocumentUpcasterError) {
        expect(error.code).toBe("FUTURE_VERSION");
        expect(error.context).toEqual({ stateVersion: 9, currentVersion: 3 });
      }
    }
  });

  it("rejects current-version documents that fail validation", () => {
    try {
      upcastNote({ id: "n1", stateVersion: 3, version: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DocumentUpcasterError);
      if (error instanceof DocumentUpcasterError) {
        expect(error.code).toBe("INVALID_STATE");
      }
    }
  });

  it("reports a missing migration for unversioned documents", () => {
    try {
      upcastNote({ id: "n1", title: "Hi", version: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DocumentUpcasterError);
      if (error instanceof DocumentUpcasterError) {
        expect(error.code).toBe("MISSING_MIGRATION");
        expect(error.context).toEqual({ fromVersion: 0, toVersion: 1 });
      }
    }
  });

  it("rejects an incomplete chain at creation time", () => {
    expect(() =>
      createUpcaster<NoteV3>({
        currentVersion: 3,
        migrations: { 1: (state) => state },
        validate: isNoteV3,
      })
    ).toThrow("Missing migration for version 2");
  });
});

describe("getStateVersion", () => {
  it("reads numeric versions and defaults to zero", () => {
    expect(getStateVersion({ stateVersion: 2 })).toBe(2);
    expect(getStateVersion({ stateVersion: "2" })).toBe(0);
    expect(getStateVersion({})).toBe(0);
    expect(getStateVersion("text")).toBe(0);
  });
});
