import { existsSync, statSync } from "fs";
import { readdir, readFile } from "fs/promises";
import { basename, join, resolve } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { convertDataset } from "./convert";
import {
  EmptyDatasetError,
  InvalidConfigurationError,
  MissingInputError,
} from "./errors";
import {
  createLogger,
  createTempDir,
  removeDir,
  sample_dataset_files,
  writeFiles,
} from "./test-helpers";

let dir: string;
let source_dir: string;
let output_dir: string;

beforeEach(async () => {
  dir = await createTempDir();
  source_dir = join(dir, "export");
  output_dir = join(dir, "yolo_output");
});

afterEach(async () => {
  await removeDir(dir);
});

/** relative path -> content of every file below dir */
async function readTree(root: string): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  const entries = await readdir(root, { recursive: true });
  for (const entry of entries.sort()) {
    const path = join(root, entry);
    if (statSync(path).isFile()) {
      tree[entry] = await readFile(path, "utf-8");
    }
  }
  return tree;
}

describe("convertDataset", () => {
  it("converts the sample export", async () => {
    await writeFiles(source_dir, sample_dataset_files);

    const result = await convertDataset({
      source_dir,
      output_dir,
      train_split: 0.8,
      seed: 42,
      logger: createLogger(),
    });

    expect(result.class_names).toEqual(["book", "person"]);
    expect(result.stats).toEqual({
      total_files: 3,
      total_annotations: 5,
      files_with_annotations: 3,
      empty_files: 0,
      invalid_lines: 0,
      unreadable_files: 0,
      unknown_class_ids: 0,
    });
    expect(result.train).toHaveLength(2);
    expect(result.val).toHaveLength(1);

    for (const leaf of ["images/train", "images/val", "labels/train", "labels/val"]) {
      expect(statSync(join(output_dir, leaf)).isDirectory()).toBe(true);
    }

    const train_images = await readdir(join(output_dir, "images", "train"));
    const val_images = await readdir(join(output_dir, "images", "val"));
    const train_labels = await readdir(join(output_dir, "labels", "train"));
    const val_labels = await readdir(join(output_dir, "labels", "val"));
    expect(train_images).toHaveLength(2);
    expect(val_images).toHaveLength(1);
    expect([...train_images, ...val_images].sort()).toEqual([
      "image1.jpg",
      "image2.png",
      "image3.jpeg",
    ]);
    expect(train_labels.sort()).toEqual(
      train_images.map((name) => name.replace(/\.\w+$/, ".txt")).sort()
    );
    expect(val_labels).toEqual(
      val_images.map((name) => name.replace(/\.\w+$/, ".txt"))
    );

    expect(result.yaml_path).toBe(join(output_dir, "data.yaml"));
    expect(await readFile(result.yaml_path, "utf-8")).toBe(
      [
        `path: ${resolve(output_dir)}`,
        "train: images/train",
        "val: images/val",
        "",
        "nc: 2 # Number of classes",
        "# Class names",
        "names:",
        "  0: book",
        "  1: person",
        "",
      ].join("\n")
    );
  });

  it("produces the same tree when run twice", async () => {
    await writeFiles(source_dir, sample_dataset_files);
    const options = { source_dir, output_dir, train_split: 0.5, seed: 7 };

    const first = await convertDataset({ ...options, logger: createLogger() });
    const first_tree = await readTree(output_dir);
    const second = await convertDataset({ ...options, logger: createLogger() });
    const second_tree = await readTree(output_dir);

    expect(second.train).toEqual(first.train);
    expect(second.val).toEqual(first.val);
    expect(second_tree).toEqual(first_tree);
    expect(Object.keys(first_tree)).toHaveLength(7);
  });

  it("replaces the splits of a previous run with other settings", async () => {
    await writeFiles(source_dir, sample_dataset_files);
    await convertDataset({
      source_dir,
      output_dir,
      train_split: 0.34,
      seed: 1,
      logger: createLogger(),
    });
    const result = await convertDataset({
      source_dir,
      output_dir,
      train_split: 0.34,
      seed: 2,
      logger: createLogger(),
    });

    const train_images = await readdir(join(output_dir, "images", "train"));
    const val_images = await readdir(join(output_dir, "images", "val"));
    const val_labels = await readdir(join(output_dir, "labels", "val"));
    expect(train_images).toHaveLength(1);
    expect(val_images).toHaveLength(2);
    expect(val_labels).toHaveLength(2);
    expect(train_images.filter((name) => val_images.includes(name))).toEqual([]);
    expect([...train_images, ...val_images].sort()).toEqual([
      "image1.jpg",
      "image2.png",
      "image3.jpeg",
    ]);
    expect(train_images).toEqual(
      result.train.map((pair) => basename(pair.image_path))
    );
  });

  it("fails with EmptyDatasetError before creating any output", async () => {
    await writeFiles(source_dir, {
      "images/orphan.jpg": "no label",
      "labels/other.txt": "0 0.5 0.5 0.5 0.5\n",
      "classes.txt": "a\n",
    });
    const logger = createLogger();
    await expect(
      convertDataset({ source_dir, output_dir, logger })
    ).rejects.toThrow(EmptyDatasetError);
    expect(existsSync(output_dir)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      "Warning: No label file found for orphan.jpg"
    );
  });

  it("fails with MissingInputError on an incomplete export", async () => {
    await writeFiles(source_dir, { "images/a.jpg": "a" });
    await expect(
      convertDataset({ source_dir, output_dir, logger: createLogger() })
    ).rejects.toThrow(MissingInputError);
    expect(existsSync(output_dir)).toBe(false);
  });

  it("rejects an invalid fraction before touching the filesystem", async () => {
    await writeFiles(source_dir, sample_dataset_files);
    const logger = createLogger();
    await expect(
      convertDataset({ source_dir, output_dir, train_split: 1.2, logger })
    ).rejects.toThrow(InvalidConfigurationError);
    expect(logger.log).not.toHaveBeenCalled();
    expect(existsSync(output_dir)).toBe(false);
  });

  it("keeps going when labels are invalid", async () => {
    await writeFiles(source_dir, {
      "images/a.jpg": "a",
      "images/b.jpg": "b",
      "labels/a.txt": "0 1.5 0.5 0.5 0.5\n",
      "labels/b.txt": "3 0.5 0.5 0.5 0.5\n",
      "classes.txt": "only\n",
    });
    const result = await convertDataset({
      source_dir,
      output_dir,
      train_split: 1,
      logger: createLogger(),
    });
    expect(result.stats).toEqual({
      total_files: 2,
      total_annotations: 1,
      files_with_annotations: 1,
      empty_files: 1,
      invalid_lines: 1,
      unreadable_files: 0,
      unknown_class_ids: 1,
    });
    expect((await readdir(join(output_dir, "images", "train"))).sort()).toEqual([
      "a.jpg",
      "b.jpg",
    ]);
    expect(await readdir(join(output_dir, "images", "val"))).toEqual([]);
  });
});
