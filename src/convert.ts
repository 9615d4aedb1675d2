import {
  type ConvertOptions,
  type Logger,
  parseConvertOptions,
  type ResolvedConvertOptions,
} from "./config";
import { EmptyDatasetError } from "./errors";
import { copyPairFiles, createExportDatasetDirs } from "./fs";
import { validateLabelFiles, type ValidationStats } from "./label";
import { getImageLabelPairs, type ImageLabelPair } from "./pair";
import { SeededRandom } from "./random";
import { loadClassNames, validateSourceDir } from "./source";
import { splitDataset } from "./split";
import { saveDataYamlFile } from "./yaml";

export type ConvertDatasetOptions = ConvertOptions & {
  logger?: Logger;
};

export type ConvertResult = {
  options: ResolvedConvertOptions;
  class_names: string[];
  stats: ValidationStats;
  train: ImageLabelPair[];
  val: ImageLabelPair[];
  yaml_path: string;
};

/**
 * @description
 * Convert an annotation export into a YOLO detection dataset:
 * - `<source>/images/*`, `<source>/labels/*.txt`, `<source>/classes.txt`
 * - into `<output>/{images,labels}/{train,val}/*` and `<output>/data.yaml`
 *
 * Nothing is cleaned up when a step fails.
 *
 * @example
 * ```ts
 * await convertDataset({ source_dir: 'export', output_dir: 'yolo_dataset', train_split: 0.8, seed: 42 })
 * ```
 */
export async function convertDataset(
  options: ConvertDatasetOptions = {}
): Promise<ConvertResult> {
  const { logger = console, ...input } = options;
  const resolved = parseConvertOptions(input);
  const { source_dir, output_dir, train_split, seed } = resolved;

  logger.log("Starting conversion to YOLO dataset...");
  logger.log(`Source: ${source_dir}`);
  logger.log(`Output: ${output_dir}`);
  logger.log(`Train split: ${(train_split * 100).toFixed(1)}%`);

  validateSourceDir(source_dir);

  const class_names = await loadClassNames({ source_dir, logger });

  const pairs = getImageLabelPairs({ source_dir, logger });
  if (pairs.length === 0) {
    throw new EmptyDatasetError(source_dir);
  }

  logger.log("Validating labels...");
  const stats = await validateLabelFiles(pairs, {
    n_class: class_names.length > 0 ? class_names.length : undefined,
    logger,
  });
  logger.log(`Validation stats: ${JSON.stringify(stats)}`);

  const { train, val } = splitDataset(pairs, {
    train_split,
    random: new SeededRandom(seed),
  });
  logger.log(
    `Dataset split: ${train.length} training, ${val.length} validation`
  );

  await createExportDatasetDirs({ output_dir, logger });
  await copyPairFiles(train, { output_dir, group_type: "train", logger });
  await copyPairFiles(val, { output_dir, group_type: "val", logger });

  const yaml_path = await saveDataYamlFile({ output_dir, class_names, logger });

  logger.log("Conversion completed successfully!");
  logger.log(`Dataset ready for YOLO training at: ${output_dir}`);
  logger.log(`Training images: ${train.length}`);
  logger.log(`Validation images: ${val.length}`);
  logger.log(`Total annotations: ${stats.total_annotations}`);

  return { options: resolved, class_names, stats, train, val, yaml_path };
}
