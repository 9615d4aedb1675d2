import { copyFile, mkdir, rm } from "fs/promises";
import { basename, join } from "path";
import type { Logger } from "./config";
import { IOFailureError } from "./errors";
import { group_types, type GroupType } from "./group";
import type { ImageLabelPair } from "./pair";
import { images_dirname, labels_dirname } from "./source";

export function getGroupDirs(output_dir: string, group_type: GroupType) {
  return {
    images_dir: join(output_dir, images_dirname, group_type),
    labels_dir: join(output_dir, labels_dirname, group_type),
  };
}

/**
 * @description
 * - Create `{images,labels}/{train,val}` under `output_dir`.
 * - Leaf directories left by a previous run are emptied, the rest of `output_dir` is kept.
 *
 * @returns the created directories
 */
export async function createExportDatasetDirs(options: {
  output_dir: string;
  logger?: Logger;
}): Promise<string[]> {
  const { output_dir, logger = console } = options;
  const dirs = [images_dirname, labels_dirname].flatMap((type) =>
    group_types.map((group_type) => join(output_dir, type, group_type))
  );
  for (const dir of dirs) {
    try {
      await rm(dir, { recursive: true, force: true });
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new IOFailureError("failed to create directory", dir, error);
    }
  }
  logger.log(`Created YOLO directory structure in: ${output_dir}`);
  return dirs;
}

async function copyFileTo(src_file: string, dest_dir: string, kind: string) {
  try {
    await copyFile(src_file, join(dest_dir, basename(src_file)));
  } catch (error) {
    throw new IOFailureError(`failed to copy ${kind}`, src_file, error);
  }
}

/** Copy each image and its label into the group directories; the first failure stops the copy. */
export async function copyPairFiles(
  pairs: readonly ImageLabelPair[],
  options: {
    output_dir: string;
    group_type: GroupType;
    logger?: Logger;
  }
): Promise<void> {
  const { output_dir, group_type, logger = console } = options;
  const { images_dir, labels_dir } = getGroupDirs(output_dir, group_type);
  for (const pair of pairs) {
    await copyFileTo(pair.image_path, images_dir, "image");
    await copyFileTo(pair.label_path, labels_dir, "label");
  }
  logger.log(`Copied ${pairs.length} ${group_type} files`);
}
