import { readFile } from 'fs/promises'
import { basename } from 'path'
import type { Logger } from './config'
import { IOFailureError } from './errors'
import type { ImageLabelPair } from './pair'

export type BoundingBox = {
  /** starts from 0 */
  class_idx: number
  /** normalized to [0,1] */
  x: number
  y: number
  width: number
  height: number
}

export type LabelLineError =
  | 'wrong_field_count'
  | 'invalid_class_id'
  | 'invalid_coordinate'
  | 'non_normalized_coordinate'

export type ParsedLabelLine =
  | { valid: true; box: BoundingBox }
  | { valid: false; reason: LabelLineError }

const label_line_error_messages: Record<LabelLineError, string> = {
  wrong_field_count: 'Wrong number of values',
  invalid_class_id: 'Invalid class_id',
  invalid_coordinate: 'Invalid coordinate',
  non_normalized_coordinate: 'Non-normalized coordinates',
}

const integer_pattern = /^[+-]?\d+$/
const float_pattern = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

function isBetweenZeroAndOne(value: number): boolean {
  return value >= 0 && value <= 1
}

/**
 * Parse one `<class_id> <x_center> <y_center> <width> <height>` line.
 * The first invalid coordinate decides the reason.
 */
export function parseLabelLine(line: string): ParsedLabelLine {
  const label_parts = line.trim().split(/\s+/)
  if (label_parts.length !== 5) {
    return { valid: false, reason: 'wrong_field_count' }
  }

  const class_idx = +label_parts[0]
  if (!integer_pattern.test(label_parts[0]) || !Number.isSafeInteger(class_idx)) {
    return { valid: false, reason: 'invalid_class_id' }
  }

  const coordinates: number[] = []
  for (const part of label_parts.slice(1)) {
    const value = +part
    if (!float_pattern.test(part) || !Number.isFinite(value)) {
      return { valid: false, reason: 'invalid_coordinate' }
    }
    if (!isBetweenZeroAndOne(value)) {
      return { valid: false, reason: 'non_normalized_coordinate' }
    }
    coordinates.push(value)
  }

  const [x, y, width, height] = coordinates
  return {
    valid: true,
    box: { class_idx, x, y, width, height },
  }
}

export type LabelFileReport = {
  valid_lines: number
  invalid_lines: number
  unknown_class_ids: number
}

export type ValidationStats = {
  total_files: number
  total_annotations: number
  files_with_annotations: number
  empty_files: number
  /** unreadable files are counted here too, as one line each */
  invalid_lines: number
  unreadable_files: number
  /** valid lines whose class_idx is outside of [0, n_class) */
  unknown_class_ids: number
}

export async function readLabelFile(label_path: string): Promise<string> {
  try {
    return await readFile(label_path, 'utf-8')
  } catch (error) {
    throw new IOFailureError('failed to read label file', label_path, error)
  }
}

/**
 * @description
 * - Blank lines are skipped.
 * - When `n_class` is given, class indexes outside of the class list are
 *   reported but the line still counts as valid.
 */
export async function validateLabelFile(options: {
  label_path: string
  n_class?: number
  logger?: Logger
}): Promise<LabelFileReport> {
  const { label_path, n_class, logger = console } = options
  const content = await readLabelFile(label_path)
  const filename = basename(label_path)

  const report: LabelFileReport = {
    valid_lines: 0,
    invalid_lines: 0,
    unknown_class_ids: 0,
  }

  const lines = content.split('\n')
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim()
    if (!line) continue
    const line_num = i + 1

    const result = parseLabelLine(line)
    if (!result.valid) {
      logger.warn(
        `Warning: ${label_line_error_messages[result.reason]} in ${filename}:${line_num}`,
      )
      report.invalid_lines++
      continue
    }

    report.valid_lines++

    const { class_idx } = result.box
    if (n_class !== undefined && (class_idx < 0 || class_idx >= n_class)) {
      logger.warn(
        `Warning: Unknown class_id ${class_idx} in ${filename}:${line_num}, expect a range of [0,${n_class - 1}]`,
      )
      report.unknown_class_ids++
    }
  }

  return report
}

/** Tally the annotations of every label file, problems are counted rather than thrown. */
export async function validateLabelFiles(
  pairs: readonly ImageLabelPair[],
  options: { n_class?: number; logger?: Logger } = {},
): Promise<ValidationStats> {
  const { n_class, logger = console } = options

  const stats: ValidationStats = {
    total_files: pairs.length,
    total_annotations: 0,
    files_with_annotations: 0,
    empty_files: 0,
    invalid_lines: 0,
    unreadable_files: 0,
    unknown_class_ids: 0,
  }

  for (const { label_path } of pairs) {
    let report: LabelFileReport
    try {
      report = await validateLabelFile({ label_path, n_class, logger })
    } catch (error) {
      if (!(error instanceof IOFailureError)) throw error
      logger.warn(`Warning: ${error.message}`)
      stats.invalid_lines++
      stats.unreadable_files++
      continue
    }

    stats.invalid_lines += report.invalid_lines
    stats.unknown_class_ids += report.unknown_class_ids
    stats.total_annotations += report.valid_lines
    if (report.valid_lines > 0) {
      stats.files_with_annotations++
    } else {
      stats.empty_files++
    }
  }

  return stats
}
