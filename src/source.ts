import { type Stats, statSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { extract_lines } from "@beenotung/tslib/string";
import type { Logger } from "./config";
import { getErrorCode, IOFailureError, MissingInputError } from "./errors";

export const images_dirname = "images";
export const labels_dirname = "labels";
export const classes_filename = "classes.txt";

function statEntry(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch (error) {
    // e.g. source_dir is a file
    if (getErrorCode(error) === "ENOTDIR") return undefined;
    throw new IOFailureError("failed to check source entry", path, error);
  }
}

/**
 * @description
 * - Check the layout of an annotation export before anything is read.
 * - Throws on the first missing entry (or a file where a directory is expected), in the order: `images/`, `labels/`, `classes.txt`.
 */
export function validateSourceDir(source_dir: string): void {
  const required_paths = [
    { path: join(source_dir, images_dirname), kind: "directory" },
    { path: join(source_dir, labels_dirname), kind: "directory" },
    { path: join(source_dir, classes_filename), kind: "file" },
  ] as const;
  for (const { path, kind } of required_paths) {
    const stats = statEntry(path);
    if (!stats || (kind === "directory" && !stats.isDirectory())) {
      throw new MissingInputError(path, kind);
    }
  }
}

/** one class name per non-blank line, index 0 is the first line */
export async function loadClassNames(options: {
  source_dir: string;
  logger?: Logger;
}): Promise<string[]> {
  const { source_dir, logger = console } = options;
  const file = join(source_dir, classes_filename);

  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      throw new MissingInputError(file, "file");
    }
    throw new IOFailureError(`failed to read ${classes_filename}`, file, error);
  }

  const class_names = extract_lines(content)
    .map((line) => line.trim())
    .filter((line) => line);

  logger.log(
    `Found ${class_names.length} classes: ${JSON.stringify(class_names)}`
  );
  return class_names;
}
