import { describe, it, expect } from "vitest";
import { UploadPolicy } from "../../../src/policy/uploadPolicy.js";
import { defaultCollectionsConfig, type CollectionsConfig } from "../../../src/config/config.js";
import { createTestAsset, createTestRecords } from "../../../src/testing/fixtures.js";

function policyWith(overrides: Partial<CollectionsConfig> = {}): UploadPolicy {
  return new UploadPolicy({ ...defaultCollectionsConfig(), ...overrides });
}

describe("UploadPolicy", () => {
  describe("rulesFor", () => {
    it("caps photo galleries at 15", () => {
      expect(policyWith().rulesFor("photo-gallery-item")).toEqual({
        accepts: ["photo"],
        maxAttachments: 15,
      });
    });

    it("never lets the photo gallery cap exceed maxFilesPerItem", () => {
      expect(policyWith({ maxFilesPerItem: 3 }).rulesFor("photo-gallery-item").maxAttachments).toBe(3);
    });

    it("accepts logos only on projects", () => {
      expect(policyWith().rulesFor("project").accepts).toContain("logo");
      expect(policyWith().rulesFor("gallery-item").accepts).not.toContain("logo");
    });
  });

  describe("validateAsset", () => {
    it("normalises the content type and resolves the media kind", () => {
      const result = policyWith().validateAsset(createTestAsset({ contentType: " IMAGE/PNG " }));

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.asset.contentType).toBe("image/png");
        expect(result.asset.mediaKind).toBe("photo");
      }
    });

    it.each([
      [{ bytes: new Uint8Array() }, "Invalid upload: File is empty"],
      [{ originalName: "" }, "Invalid upload: File name is required"],
      [{ originalName: "../escape.png" }, "Invalid upload: File name must not contain '..'"],
      [{ contentType: "application/pdf" }, "Unsupported file type: application/pdf"],
      [{ contentType: "image/bmp" }, "Content type image/bmp is not allowed for photo"],
      [{ contentType: "image/svg+xml" }, "Content type image/svg+xml is not allowed for photo"],
    ])("rejects %o", (overrides, message) => {
      const result = policyWith().validateAsset(createTestAsset(overrides));

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.violation.code).toBe("UPLOAD_REJECTED");
        expect(result.violation.message).toBe(message);
      }
    });

    it("allows SVG for logos", () => {
      const result = policyWith().validateAsset(
        createTestAsset({ originalName: "mark.svg", contentType: "image/svg+xml", mediaKind: "logo" })
      );

      expect(result.valid).toBe(true);
    });

    it("enforces the size limit of the media kind", () => {
      const policy = policyWith({ maxImageSize: 8 });
      const result = policy.validateAsset(
        createTestAsset({ originalName: "big.png", bytes: new Uint8Array(9) })
      );

      expect(result).toEqual({
        valid: false,
        violation: {
          code: "UPLOAD_REJECTED",
          message: "File big.png is 9 bytes; the photo limit is 8",
          context: {
            originalName: "big.png",
            contentType: "image/png",
            mediaKind: "photo",
            size: 9,
            limit: 8,
          },
        },
      });
    });

    it("applies the video limit to videos", () => {
      const policy = policyWith({ maxImageSize: 8, maxVideoSize: 16 });

      expect(
        policy.validateAsset(
          createTestAsset({ originalName: "clip.mp4", contentType: "video/mp4", bytes: new Uint8Array(12) })
        ).valid
      ).toBe(true);
    });
  });

  describe("check", () => {
    it("returns every asset validated", () => {
      const result = policyWith().check("gallery-item", [], [
        createTestAsset(),
        createTestAsset({ originalName: "clip.mp4", contentType: "video/mp4" }),
      ]);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.assets.map((asset) => asset.mediaKind)).toEqual(["photo", "video"]);
      }
    });

    it("rejects a media kind the owner kind does not accept", () => {
      const result = policyWith().check("photo-gallery-item", [], [
        createTestAsset({ originalName: "clip.mp4", contentType: "video/mp4" }),
      ]);

      expect(result).toEqual({
        valid: false,
        violation: {
          code: "MEDIA_KIND_NOT_ALLOWED",
          message: "A photo-gallery-item does not accept video attachments",
          context: {
            mediaKind: "video",
            ownerKind: "photo-gallery-item",
            accepted: ["photo"],
            originalName: "clip.mp4",
          },
        },
      });
    });

    it("rejects a logo on a gallery item", () => {
      const result = policyWith().check("gallery-item", [], [createTestAsset({ mediaKind: "logo" })]);

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.violation.code).toBe("MEDIA_KIND_NOT_ALLOWED");
      }
    });

    it("rejects a batch that would overfill the collection", () => {
      const result = policyWith({ maxFilesPerItem: 3 }).check("gallery-item", createTestRecords(2), [
        createTestAsset(),
        createTestAsset(),
      ]);

      expect(result).toEqual({
        valid: false,
        violation: {
          code: "COLLECTION_FULL",
          message: "Cannot hold 4 attachments (limit 3)",
          context: { current: 2, incoming: 2, limit: 3 },
        },
      });
    });

    it("reports an invalid asset before capacity", () => {
      const result = policyWith({ maxFilesPerItem: 1 }).check("gallery-item", createTestRecords(1), [
        createTestAsset({ contentType: "application/pdf" }),
      ]);

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.violation.code).toBe("UPLOAD_REJECTED");
      }
    });
  });
});
