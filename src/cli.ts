import { readFileSync } from "fs";
import { join } from "path";
import { parseArgs } from "util";
import {
  type ConvertOptions,
  default_output_dir,
  default_seed,
  default_source_dir,
  default_train_split,
} from "./config";
import { convertDataset } from "./convert";

export const program_name = "yolo-dataset-builder";

export type CliCommand =
  | { command: "help" }
  | { command: "version" }
  | { command: "convert"; options: ConvertOptions };

// single-dash long flags, e.g. `-source .`
const long_flags = ["source", "output", "train-split", "seed", "help", "version"];

function normalizeFlag(arg: string): string {
  const [name] = arg.slice(1).split("=");
  return /^-[^-]/.test(arg) && long_flags.includes(name) ? "-" + arg : arg;
}

export function parseCliArgs(args: string[]): CliCommand {
  const { values } = parseArgs({
    args: args.map(normalizeFlag),
    options: {
      source: { type: "string", short: "s" },
      output: { type: "string", short: "o" },
      "train-split": { type: "string" },
      seed: { type: "string" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    strict: true,
  });

  if (values.version) return { command: "version" };
  if (values.help) return { command: "help" };

  const options: ConvertOptions = {};
  if (values.source !== undefined) options.source_dir = values.source;
  if (values.output !== undefined) options.output_dir = values.output;
  if (values["train-split"] !== undefined) {
    options.train_split = Number(values["train-split"]);
  }
  if (values.seed !== undefined) options.seed = Number(values.seed);
  return { command: "convert", options };
}

export function getVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(join(__dirname, "..", "package.json"), "utf-8")
  );
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "unknown";
}

export function getHelpText(): string {
  return [
    "Annotation export to YOLO dataset converter",
    "",
    "Converts an images/ + labels/ + classes.txt export to YOLO training data format.",
    "",
    "Usage:",
    `  ${program_name} [options]`,
    "",
    "Options:",
    `  -s, --source <dir>       path to the annotation export (default: "${default_source_dir}")`,
    `  -o, --output <dir>       path where the YOLO dataset will be created (default: "${default_output_dir}")`,
    `      --train-split <f>    fraction of data for training (default: ${default_train_split})`,
    `      --seed <n>           random seed for reproducible splits (default: ${default_seed})`,
    "  -h, --help               show this help message",
    "  -v, --version            show version information",
    "",
    "Examples:",
    `  ${program_name} --source . --output ./yolo_dataset`,
    `  ${program_name} --source /path/to/export --output /path/to/yolo --train-split 0.7`,
    `  ${program_name} -source . -output ./yolo_dataset -train-split 0.8`,
  ].join("\n");
}

/** @returns the process exit code */
export async function main(args: string[]): Promise<number> {
  try {
    const cli = parseCliArgs(args);
    if (cli.command === "help") {
      console.log(getHelpText());
    } else if (cli.command === "version") {
      console.log(`${program_name} version ${getVersion()}`);
      console.log(`Node.js version: ${process.versions.node}`);
    } else {
      await convertDataset(cli.options);
    }
    return 0;
  } catch (error) {
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    return 1;
  }
}
