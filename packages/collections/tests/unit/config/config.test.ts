import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  DEFAULT_MAX_FILES_PER_ITEM,
  defaultCollectionsConfig,
  loadCollectionsConfig,
} from "../../../src/config/config.js";

describe("loadCollectionsConfig", () => {
  it("applies defaults for unset variables", () => {
    expect(loadCollectionsConfig({})).toEqual({
      uploadDir: "uploads",
      allowedImageTypes: ["image/jpeg", "image/png", "image/gif", "image/webp"],
      allowedVideoTypes: ["video/mp4", "video/webm", "video/ogg"],
      maxImageSize: 10_485_760,
      maxVideoSize: 52_428_800,
      maxFilesPerItem: DEFAULT_MAX_FILES_PER_ITEM,
      logLevel: "INFO",
    });
  });

  it("matches defaultCollectionsConfig", () => {
    expect(defaultCollectionsConfig()).toEqual(loadCollectionsConfig({}));
  });

  it("parses overrides", () => {
    const config = loadCollectionsConfig({
      ATRIUM_UPLOAD_DIR: "/var/atrium/uploads",
      ATRIUM_ALLOWED_IMAGE_TYPES: " Image/PNG, image/avif ,",
      ATRIUM_MAX_FILES_PER_ITEM: "5",
      ATRIUM_LOG_LEVEL: "DEBUG",
    });

    expect(config.uploadDir).toBe("/var/atrium/uploads");
    expect(config.allowedImageTypes).toEqual(["image/png", "image/avif"]);
    expect(config.maxFilesPerItem).toBe(5);
    expect(config.logLevel).toBe("DEBUG");
  });

  it("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadCollectionsConfig({ ATRIUM_MAX_IMAGE_SIZE: "-1", ATRIUM_LOG_LEVEL: "LOUD" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues.map((issue) => issue.path)).toEqual([
        "ATRIUM_MAX_IMAGE_SIZE",
        "ATRIUM_LOG_LEVEL",
      ]);
      expect(caught.message).toMatch(/^Invalid collections configuration: ATRIUM_MAX_IMAGE_SIZE: /);
    }
  });

  it("rejects an empty type list", () => {
    expect(() => loadCollectionsConfig({ ATRIUM_ALLOWED_VIDEO_TYPES: " , " })).toThrow(
      ConfigurationError
    );
  });

  it("rejects a malformed content type", () => {
    expect(() => loadCollectionsConfig({ ATRIUM_ALLOWED_IMAGE_TYPES: "png" })).toThrow(
      "ATRIUM_ALLOWED_IMAGE_TYPES.0: Invalid content type"
    );
  });
});
