import { v4 as uuidv4 } from "uuid";
import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { IMAGE_EXTENSIONS } from "../../lib/storage/index.js";
import { toJson, type ReviewDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { CreateReviewInput, Review, ReviewImage } from "../../types.js";
import {
  discardStored,
  storeUploads,
  type UploadedFile,
} from "../file/store-upload.js";
import { mapReviewFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:review");

/**
 * Submit a customer review. Reviews wait for moderation before they are
 * shown publicly. Uploaded photos are stored and appended to `images`.
 */
export async function createReview(
  ctx: DataContext,
  input: CreateReviewInput,
  photos: UploadedFile[] = [],
): Promise<Result<Review, Error>> {
  try {
    const stored = await storeUploads(ctx, "reviews", photos, IMAGE_EXTENSIONS);
    if (!stored.success) {
      return stored;
    }
    const images: ReviewImage[] = [
      ...(input.images ?? []),
      ...stored.data.map((file) => ({ url: file.url })),
    ];

    const now = Date.now();
    const row: ReviewDbRow = {
      id: uuidv4(),
      customer_name: input.customerName,
      customer_email: input.customerEmail,
      rating: input.rating,
      title: input.title ?? null,
      content: input.content,
      images: toJson(images),
      is_approved: false,
      is_featured: false,
      created_at: now,
      updated_at: now,
    };

    try {
      await ctx.db("review").insert(row);
    } catch (error) {
      await discardStored(
        ctx,
        stored.data.map((file) => file.key),
      );
      throw error;
    }

    logger.info("Created review", { id: row.id, rating: row.rating });
    return success(mapReviewFromDb(row));
  } catch (error) {
    logger.error("Failed to create review", { error });
    return failure(toError(error));
  }
}
