import { existsSync, lstatSync } from "fs";
import { basename, extname, join } from "path";
import { getDirFilenamesSync } from "@beenotung/tslib/fs";
import type { Logger } from "./config";
import { IOFailureError } from "./errors";
import { images_dirname, labels_dirname } from "./source";

/** an image and the label file sharing its base name */
export type ImageLabelPair = {
  image_path: string;
  label_path: string;
};

export const image_extensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".bmp",
  ".tiff",
  ".webp",
];

export function isImageFile(filename: string): boolean {
  return image_extensions.includes(extname(filename).toLowerCase());
}

export function toLabelFilename(image_filename: string): string {
  return basename(image_filename, extname(image_filename)) + ".txt";
}

/** yield every file below `dir`, entries of each directory in name order */
function* walkFiles(dir: string): Generator<string> {
  let filenames: string[];
  try {
    filenames = getDirFilenamesSync(dir).sort();
  } catch (error) {
    throw new IOFailureError("error scanning images directory", dir, error);
  }
  for (const filename of filenames) {
    const file = join(dir, filename);
    let is_dir: boolean;
    try {
      is_dir = lstatSync(file).isDirectory();
    } catch (error) {
      throw new IOFailureError("error scanning images directory", file, error);
    }
    if (is_dir) {
      yield* walkFiles(file);
    } else {
      yield file;
    }
  }
}

/**
 * @description
 * - Images are searched recursively under `images/`.
 * - Labels are looked up flat in `labels/`, e.g. `images/a/cat.jpg` -> `labels/cat.txt`.
 * - Images without label are skipped with a warning.
 */
export function getImageLabelPairs(options: {
  source_dir: string;
  logger?: Logger;
}): ImageLabelPair[] {
  const { source_dir, logger = console } = options;
  const images_dir = join(source_dir, images_dirname);
  const labels_dir = join(source_dir, labels_dirname);

  const pairs: ImageLabelPair[] = [];
  for (const image_path of walkFiles(images_dir)) {
    const image_filename = basename(image_path);
    if (!isImageFile(image_filename)) continue;

    const label_path = join(labels_dir, toLabelFilename(image_filename));
    if (!existsSync(label_path)) {
      logger.warn(`Warning: No label file found for ${image_filename}`);
      continue;
    }
    pairs.push({ image_path, label_path });
  }

  logger.log(`Found ${pairs.length} image-label pairs`);
  return pairs;
}
