import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { vi } from "vitest";
import type { Logger } from "./config";

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "yolo-dataset-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** write files given as `{ "relative/path": content }` */
export async function writeFiles(
  dir: string,
  files: Record<string, string>
): Promise<void> {
  for (const [file, content] of Object.entries(files)) {
    const path = join(dir, file);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}

export function createLogger() {
  return {
    log: vi.fn(),
    warn: vi.fn(),
  } satisfies Logger;
}

/** 3 pairs holding 2, 1 and 2 annotations, with 2 classes */
export const sample_dataset_files: Record<string, string> = {
  "images/image1.jpg": "fake image data 1",
  "images/image2.png": "fake image data 2",
  "images/image3.jpeg": "fake image data 3",
  "labels/image1.txt": "0 0.5 0.5 0.3 0.3\n1 0.2 0.8 0.1 0.1\n",
  "labels/image2.txt": "0 0.4 0.6 0.2 0.4\n",
  "labels/image3.txt": "1 0.7 0.3 0.3 0.2\n0 0.1 0.9 0.1 0.1\n",
  "classes.txt": "book\nperson\n",
};
