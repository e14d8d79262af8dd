import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { IMAGE_EXTENSIONS } from "../../lib/storage/index.js";
import type { ProjectDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Project } from "../../types.js";
import {
  discardStored,
  storeUpload,
  storeUploads,
  type UploadedFile,
} from "../file/store-upload.js";
import { mapProjectFromDb } from "../../mappers.js";
import { updateProject } from "./update-project.js";

const logger = createLogger("printhub:domain:project");

async function findProject(
  ctx: DataContext,
  id: string,
): Promise<ProjectDbRow | undefined> {
  return ctx.db<ProjectDbRow>("project").where("id", id).first();
}

/**
 * Store an STL model for a project, replacing the previous one
 */
export async function setProjectStl(
  ctx: DataContext,
  id: string,
  file: UploadedFile,
): Promise<Result<Project, Error>> {
  try {
    const existing = await findProject(ctx, id);
    if (!existing) {
      return failure(new NotFoundError("Project", id));
    }

    const stored = await storeUpload(ctx, `projects/${id}/stl`, file, [".stl"]);
    if (!stored.success) {
      return stored;
    }

    const updated = await updateProject(ctx, id, { stlFile: stored.data.key });
    if (updated.success && existing.stl_file) {
      await ctx.storage.delete(existing.stl_file).catch((error: unknown) => {
        logger.warn("Failed to delete replaced STL file", {
          id,
          key: existing.stl_file,
          error,
        });
      });
    }
    return updated;
  } catch (error) {
    logger.error("Failed to attach STL file", { error, id });
    return failure(toError(error));
  }
}

/**
 * Store images for a project and append their URLs to `images`
 */
export async function addProjectImages(
  ctx: DataContext,
  id: string,
  files: UploadedFile[],
): Promise<Result<Project, Error>> {
  try {
    const existing = await findProject(ctx, id);
    if (!existing) {
      return failure(new NotFoundError("Project", id));
    }

    const stored = await storeUploads(
      ctx,
      `projects/${id}/images`,
      files,
      IMAGE_EXTENSIONS,
    );
    if (!stored.success) {
      return stored;
    }

    const current = mapProjectFromDb(existing).images;
    const updated = await updateProject(ctx, id, {
      images: [...current, ...stored.data.map((file) => file.url)],
    });
    if (!updated.success) {
      await discardStored(
        ctx,
        stored.data.map((file) => file.key),
      );
    }
    return updated;
  } catch (error) {
    logger.error("Failed to attach project images", { error, id });
    return failure(toError(error));
  }
}
