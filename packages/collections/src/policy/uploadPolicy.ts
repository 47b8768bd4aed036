/**
 * ## Upload Policy
 *
 * Validates incoming assets before any byte is written: structure (zod),
 * content type and size per media kind, and the owner kind's collection rules.
 *
 * | Owner kind | Accepts | Max attachments |
 * |------------|---------|-----------------|
 * | `gallery-item` | photo, video | `maxFilesPerItem` |
 * | `photo-gallery-item` | photo | 15 |
 * | `project` | photo, video, logo | `maxFilesPerItem` |
 */

import { z } from "zod";
import type { UnknownRecord } from "@atrium/core";
import type { AssetInput, AttachmentRecord, MediaKind, OwnerKind } from "../types.js";
import { MEDIA_KINDS } from "../types.js";
import type { CollectionsConfig } from "../config/index.js";
import { CollectionErrorCodes, type RejectionCode } from "../errors.js";
import { collectionHasRoom, mediaKindAllowed } from "../invariants/index.js";
import { mediaKindFromContentType } from "../record/index.js";

export const MAX_FILE_NAME_LENGTH = 255;
export const PHOTO_GALLERY_MAX_ATTACHMENTS = 15;
export const SVG_CONTENT_TYPE = "image/svg+xml";

export const AssetInputSchema = z.object({
  bytes: z.instanceof(Uint8Array).refine((bytes) => bytes.byteLength > 0, "File is empty"),
  originalName: z
    .string()
    .min(1, "File name is required")
    .max(MAX_FILE_NAME_LENGTH, `File name exceeds ${MAX_FILE_NAME_LENGTH} characters`)
    .refine((name) => !name.includes(".."), "File name must not contain '..'"),
  contentType: z.string().min(1, "Content type is required"),
  mediaKind: z.enum(MEDIA_KINDS).optional(),
  primary: z.boolean().optional(),
});

export interface CollectionRules {
  accepts: ReadonlyArray<MediaKind>;
  maxAttachments: number;
}

export interface PolicyViolation {
  code: RejectionCode;
  message: string;
  context?: UnknownRecord;
}

/**
 * An asset that passed validation, with its media kind resolved.
 */
export interface ValidatedAsset extends AssetInput {
  mediaKind: MediaKind;
}

export type PolicyCheck =
  | { valid: true; assets: ValidatedAsset[] }
  | { valid: false; violation: PolicyViolation };

export class UploadPolicy {
  private readonly config: CollectionsConfig;

  constructor(config: CollectionsConfig) {
    this.config = config;
  }

  rulesFor(ownerKind: OwnerKind): CollectionRules {
    switch (ownerKind) {
      case "gallery-item":
        return { accepts: ["photo", "video"], maxAttachments: this.config.maxFilesPerItem };
      case "photo-gallery-item":
        return {
          accepts: ["photo"],
          maxAttachments: Math.min(PHOTO_GALLERY_MAX_ATTACHMENTS, this.config.maxFilesPerItem),
        };
      case "project":
        return {
          accepts: ["photo", "video", "logo"],
          maxAttachments: this.config.maxFilesPerItem,
        };
    }
  }

  allowedContentTypes(mediaKind: MediaKind): ReadonlyArray<string> {
    switch (mediaKind) {
      case "photo":
        return this.config.allowedImageTypes;
      case "video":
        return this.config.allowedVideoTypes;
      case "logo":
        return [...this.config.allowedImageTypes, SVG_CONTENT_TYPE];
    }
  }

  maxSize(mediaKind: MediaKind): number {
    return mediaKind === "video" ? this.config.maxVideoSize : this.config.maxImageSize;
  }

  /**
   * Validate one asset on its own (no collection rules).
   */
  validateAsset(asset: AssetInput): { valid: true; asset: ValidatedAsset } | {
    valid: false;
    violation: PolicyViolation;
  } {
    const parsed = AssetInputSchema.safeParse(asset);
    if (!parsed.success) {
      const errors = parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }));
      return {
        valid: false,
        violation: {
          code: CollectionErrorCodes.UPLOAD_REJECTED,
          message: `Invalid upload: ${errors.map((error) => error.message).join(", ")}`,
          context: { originalName: asset.originalName, errors },
        },
      };
    }

    const contentType = asset.contentType.trim().toLowerCase();
    const mediaKind = asset.mediaKind ?? mediaKindFromContentType(contentType);
    if (!mediaKind) {
      return this.reject(`Unsupported file type: ${asset.contentType}`, asset);
    }

    if (!this.allowedContentTypes(mediaKind).includes(contentType)) {
      return this.reject(`Content type ${asset.contentType} is not allowed for ${mediaKind}`, asset, {
        mediaKind,
      });
    }

    const limit = this.maxSize(mediaKind);
    if (asset.bytes.byteLength > limit) {
      return this.reject(
        `File ${asset.originalName} is ${asset.bytes.byteLength} bytes; the ${mediaKind} limit is ${limit}`,
        asset,
        { mediaKind, size: asset.bytes.byteLength, limit }
      );
    }

    return { valid: true, asset: { ...asset, contentType, mediaKind } };
  }

  /**
   * Validate a batch against the owner's collection: every asset on its own,
   * then the media kinds the owner kind accepts, then capacity.
   *
   * @returns the first violation found
   */
  check(
    ownerKind: OwnerKind,
    current: ReadonlyArray<AttachmentRecord>,
    assets: ReadonlyArray<AssetInput>
  ): PolicyCheck {
    const rules = this.rulesFor(ownerKind);
    const validated: ValidatedAsset[] = [];

    for (const asset of assets) {
      const result = this.validateAsset(asset);
      if (!result.valid) {
        return result;
      }

      const allowed = mediaKindAllowed.validate(result.asset.mediaKind, ownerKind, rules.accepts);
      if (!allowed.valid) {
        return {
          valid: false,
          violation: {
            code: CollectionErrorCodes.MEDIA_KIND_NOT_ALLOWED,
            message: allowed.message,
            context: { ...allowed.context, originalName: asset.originalName },
          },
        };
      }
      validated.push(result.asset);
    }

    const room = collectionHasRoom.validate(current, assets.length, rules.maxAttachments);
    if (!room.valid) {
      return {
        valid: false,
        violation: {
          code: CollectionErrorCodes.COLLECTION_FULL,
          message: room.message,
          ...(room.context !== undefined && { context: room.context }),
        },
      };
    }

    return { valid: true, assets: validated };
  }

  private reject(
    message: string,
    asset: AssetInput,
    extra?: UnknownRecord
  ): { valid: false; violation: PolicyViolation } {
    return {
      valid: false,
      violation: {
        code: CollectionErrorCodes.UPLOAD_REJECTED,
        message,
        context: { originalName: asset.originalName, contentType: asset.contentType, ...extra },
      },
    };
  }
}
