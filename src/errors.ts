export type DatasetErrorCode =
  | "MissingInput"
  | "EmptyDataset"
  | "IOFailure"
  | "InvalidConfiguration";

export class DatasetError extends Error {
  constructor(
    message: string,
    public code: DatasetErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DatasetError";
  }
}

/** a required directory or file of the source dataset is absent */
export class MissingInputError extends DatasetError {
  constructor(public path: string, kind: "directory" | "file") {
    super(`required ${kind} not found: ${path}`, "MissingInput");
    this.name = "MissingInputError";
  }
}

export class EmptyDatasetError extends DatasetError {
  constructor(public source_dir: string) {
    super(`no valid image-label pairs found in ${source_dir}`, "EmptyDataset");
    this.name = "EmptyDatasetError";
  }
}

/** read, write or create failure, always carrying the offending path */
export class IOFailureError extends DatasetError {
  constructor(message: string, public path: string, cause?: unknown) {
    super(
      `${message}: ${path}` +
        (cause instanceof Error ? ` (${cause.message})` : ""),
      "IOFailure",
      { cause }
    );
    this.name = "IOFailureError";
  }
}

export class InvalidConfigurationError extends DatasetError {
  constructor(public issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`, "InvalidConfiguration");
    this.name = "InvalidConfigurationError";
  }
}

/** e.g. `"ENOENT"` for errors thrown by the fs module */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
