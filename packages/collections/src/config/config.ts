/**
 * ## Collections Configuration
 *
 * Environment-driven settings for uploads and logging, parsed with zod.
 *
 * | Variable | Default |
 * |----------|---------|
 * | `ATRIUM_UPLOAD_DIR` | `uploads` |
 * | `ATRIUM_ALLOWED_IMAGE_TYPES` | `image/jpeg,image/png,image/gif,image/webp` |
 * | `ATRIUM_ALLOWED_VIDEO_TYPES` | `video/mp4,video/webm,video/ogg` |
 * | `ATRIUM_MAX_IMAGE_SIZE` | `10485760` (10 MiB) |
 * | `ATRIUM_MAX_VIDEO_SIZE` | `52428800` (50 MiB) |
 * | `ATRIUM_MAX_FILES_PER_ITEM` | `20` |
 * | `ATRIUM_LOG_LEVEL` | `INFO` |
 *
 * @example
 * ```typescript
 * const config = loadCollectionsConfig(process.env);
 * const logger = createScopedLogger("Collections:mutator", config.logLevel);
 * ```
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "@atrium/core";

export const DEFAULT_IMAGE_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"] as const;
export const DEFAULT_VIDEO_TYPES = ["video/mp4", "video/webm", "video/ogg"] as const;
export const DEFAULT_MAX_IMAGE_SIZE = 10 * 1024 * 1024;
export const DEFAULT_MAX_VIDEO_SIZE = 50 * 1024 * 1024;
export const DEFAULT_MAX_FILES_PER_ITEM = 20;

export interface CollectionsConfig {
  uploadDir: string;
  allowedImageTypes: string[];
  allowedVideoTypes: string[];
  /** Bytes; applies to photos and logos */
  maxImageSize: number;
  /** Bytes */
  maxVideoSize: number;
  maxFilesPerItem: number;
  logLevel: LogLevel;
}

const typeList = (fallback: ReadonlyArray<string>) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? [...fallback]
        : value
            .split(",")
            .map((entry) => entry.trim().toLowerCase())
            .filter((entry) => entry.length > 0)
    )
    .pipe(z.array(z.string().regex(/^[a-z]+\/[a-z0-9.+-]+$/, "Invalid content type")).min(1));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const CollectionsEnvSchema = z.object({
  ATRIUM_UPLOAD_DIR: z.string().min(1).default("uploads"),
  ATRIUM_ALLOWED_IMAGE_TYPES: typeList(DEFAULT_IMAGE_TYPES),
  ATRIUM_ALLOWED_VIDEO_TYPES: typeList(DEFAULT_VIDEO_TYPES),
  ATRIUM_MAX_IMAGE_SIZE: positiveInt(DEFAULT_MAX_IMAGE_SIZE),
  ATRIUM_MAX_VIDEO_SIZE: positiveInt(DEFAULT_MAX_VIDEO_SIZE),
  ATRIUM_MAX_FILES_PER_ITEM: positiveInt(DEFAULT_MAX_FILES_PER_ITEM),
  ATRIUM_LOG_LEVEL: z.enum(LOG_LEVELS).default("INFO"),
});

export class ConfigurationError extends Error {
  readonly issues: ReadonlyArray<{ path: string; message: string }>;

  constructor(issues: ReadonlyArray<{ path: string; message: string }>) {
    super(
      `Invalid collections configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Parse configuration from an environment map. Unset variables take their
 * defaults.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadCollectionsConfig(
  env: Record<string, string | undefined> = process.env
): CollectionsConfig {
  const result = CollectionsEnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }

  const parsed = result.data;
  return {
    uploadDir: parsed.ATRIUM_UPLOAD_DIR,
    allowedImageTypes: parsed.ATRIUM_ALLOWED_IMAGE_TYPES,
    allowedVideoTypes: parsed.ATRIUM_ALLOWED_VIDEO_TYPES,
    maxImageSize: parsed.ATRIUM_MAX_IMAGE_SIZE,
    maxVideoSize: parsed.ATRIUM_MAX_VIDEO_SIZE,
    maxFilesPerItem: parsed.ATRIUM_MAX_FILES_PER_ITEM,
    logLevel: parsed.ATRIUM_LOG_LEVEL,
  };
}

/**
 * Configuration with every default applied.
 */
export function defaultCollectionsConfig(): CollectionsConfig {
  return loadCollectionsConfig({});
}
