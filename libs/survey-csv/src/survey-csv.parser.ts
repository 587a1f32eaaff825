import { parse } from 'csv-parse/sync';
import { TextDecoder } from 'util';
import { z } from 'zod';
import { CsvValidationError, getErrorMessage } from '@app/shared-types';
import {
  COMMENT_COLUMN_PREFIXES,
  SurveyRow,
  isCommentColumn,
} from './survey-columns';

export interface ParsedSurvey {
  headers: string[];
  rows: SurveyRow[];
  /** Comment columns in header order, both analyzed and required */
  commentColumns: string[];
}

const RecordsSchema = z.array(z.array(z.string()));

function decode(content: Buffer): string {
  // fatal: reject invalid byte sequences; the BOM is stripped by default
  const decoder = new TextDecoder('utf-8', { fatal: true });
  try {
    return decoder.decode(content);
  } catch (error) {
    throw new CsvValidationError(
      `CSV must be UTF-8 encoded: ${getErrorMessage(error)}`,
    );
  }
}

function readRecords(text: string): string[][] {
  let records: unknown;
  try {
    records = parse(text, {
      columns: false,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new CsvValidationError(`Failed to parse CSV: ${getErrorMessage(error)}`);
  }

  const parsed = RecordsSchema.safeParse(records);
  if (!parsed.success) {
    throw new CsvValidationError('Failed to parse CSV: unexpected record shape');
  }
  return parsed.data;
}

function validateHeaders(headers: string[]): string[] {
  if (headers.some((header) => header.length === 0)) {
    throw new CsvValidationError('Header contains an empty column name.');
  }
  if (new Set(headers).size !== headers.length) {
    throw new CsvValidationError(
      'Header contains duplicate column names after normalization.',
    );
  }

  const commentColumns = headers.filter(isCommentColumn);
  if (commentColumns.length === 0) {
    throw new CsvValidationError(
      `File must contain at least one column whose header starts with ${COMMENT_COLUMN_PREFIXES.map((prefix) => `'${prefix}'`).join(' or ')}.`,
    );
  }
  return commentColumns;
}

/**
 * Parse and validate an uploaded survey file.
 *
 * @throws CsvValidationError for encoding, structure or header problems
 */
export function parseSurveyCsv(content: Buffer): ParsedSurvey {
  const text = decode(content);
  if (text.length === 0) {
    throw new CsvValidationError('Uploaded file is empty.');
  }

  const [headerRecord, ...dataRecords] = readRecords(text);
  if (!headerRecord) {
    throw new CsvValidationError('CSV header row is missing.');
  }

  const headers = headerRecord.map((header) => header.trim());
  const commentColumns = validateHeaders(headers);

  const rows = dataRecords.map((record) => {
    const row: SurveyRow = {};
    headers.forEach((header, index) => {
      row[header] = record[index] ?? '';
    });
    return row;
  });

  return { headers, rows, commentColumns };
}

/**
 * Structural validation only, used before the file is stored
 *
 * @throws CsvValidationError
 */
export function validateSurveyCsv(content: Buffer): void {
  parseSurveyCsv(content);
}
