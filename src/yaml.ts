import { writeFile } from "fs/promises";
import { join, resolve } from "path";
import type { Logger } from "./config";
import { IOFailureError } from "./errors";
import { getGroupDirs } from "./fs";

export const data_yaml_filename = "data.yaml";

const plain_scalar_pattern = /^[A-Za-z_/][\w/. -]*$/;

// would be read back as boolean or null
const reserved_words = ["true", "false", "yes", "no", "on", "off", "y", "n", "null"];

/** quote the value unless it reads back as the same string */
function toYamlScalar(value: string): string {
  return plain_scalar_pattern.test(value) &&
    !reserved_words.includes(value.toLowerCase())
    ? value
    : JSON.stringify(value);
}

function toString(data: string[]): string {
  return "[" + data.map((item) => JSON.stringify(item)).join(", ") + "]";
}

class YamlBuilder {
  lines: string[] = [];

  addLine(line: string) {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.join("\n").trim() + "\n";
  }
}

export type DetectYamlOptions = {
  /** absolute dataset root */
  path: string;
  /** relative to `path` */
  train_path: string;
  val_path: string;
  n_class: number;
  class_names: string[];
};

export function toDetectDataYamlString(options: DetectYamlOptions): string {
  const { class_names, n_class } = options;

  if (class_names.length !== n_class) {
    throw new Error(
      `Number of class_names (${class_names.length}) does not match n_class (${n_class})`
    );
  }

  let yaml = new YamlBuilder();
  yaml.addLine(`path: ${toYamlScalar(options.path)}`);
  yaml.addLine(`train: ${toYamlScalar(options.train_path)}`);
  yaml.addLine(`val: ${toYamlScalar(options.val_path)}`);
  yaml.addLine(``);
  yaml.addLine(`nc: ${n_class} # Number of classes`);

  yaml.addLine("# Class names");
  if (class_names.length > 1) {
    yaml.addLine(`names:`);
    for (let i = 0; i < class_names.length; i++) {
      yaml.addLine(`  ${i}: ${toYamlScalar(class_names[i])}`);
    }
  } else {
    yaml.addLine(`names: ${toString(class_names)}`);
  }

  return yaml.toString();
}

/**
 * @description
 * - Write `data.yaml` at the root of the exported dataset.
 * - An existing file is overwritten.
 *
 * @returns path of the yaml file
 */
export async function saveDataYamlFile(options: {
  output_dir: string;
  class_names: string[];
  logger?: Logger;
}): Promise<string> {
  const { output_dir, class_names, logger = console } = options;
  const train = getGroupDirs("", "train");
  const val = getGroupDirs("", "val");

  const content = toDetectDataYamlString({
    path: resolve(output_dir),
    train_path: toPosixPath(train.images_dir),
    val_path: toPosixPath(val.images_dir),
    n_class: class_names.length,
    class_names,
  });

  const yaml_path = join(output_dir, data_yaml_filename);
  try {
    await writeFile(yaml_path, content);
  } catch (error) {
    throw new IOFailureError(`failed to write ${data_yaml_filename}`, yaml_path, error);
  }
  logger.log(`Created YAML config: ${yaml_path}`);
  return yaml_path;
}

function toPosixPath(path: string): string {
  return path.split("\\").join("/");
}
