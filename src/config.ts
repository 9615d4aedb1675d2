import { z } from "zod";
import { InvalidConfigurationError } from "./errors";

export type Logger = Pick<Console, "log" | "warn">;

export const default_source_dir = ".";
export const default_output_dir = "./yolo_dataset";
export const default_train_split = 0.8;
export const default_seed = 42;

export const convertOptionsSchema = z.object({
  /** directory holding `images/`, `labels/` and `classes.txt` */
  source_dir: z.string().min(1, "must not be empty").default(default_source_dir),
  /** directory where the YOLO dataset will be created */
  output_dir: z.string().min(1, "must not be empty").default(default_output_dir),
  /** fraction of the pairs used for training, the rest go to validation */
  train_split: z
    .number()
    .min(0, "must be within [0, 1]")
    .max(1, "must be within [0, 1]")
    .default(default_train_split),
  /** seed of the shuffle, same seed gives the same split */
  seed: z.number().int("must be an integer").default(default_seed),
});

export type ConvertOptions = z.input<typeof convertOptionsSchema>;

export type ResolvedConvertOptions = z.output<typeof convertOptionsSchema>;

export function parseConvertOptions(input: unknown): ResolvedConvertOptions {
  const parsed = convertOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
