import { Injectable } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { Interval } from '../../domain/types/interval.type';
import { IntervalSourceError } from './interval-source.error';

const IntegerCellSchema = z
  .string()
  .regex(/^[+-]?\d+$/, 'Expected an integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'Integer out of range');

const IntervalRowSchema = z.object({
  Interval_start: IntegerCellSchema,
  Interval_end: IntegerCellSchema,
  Cost: IntegerCellSchema,
});

// Column names as they appear in the header row; extra columns are ignored
const REQUIRED_COLUMNS = ['Interval_start', 'Interval_end', 'Cost'] as const;

type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

const RawRowsSchema = z.array(z.array(z.string()));

// csv-parse tags its failures with CSV_* codes (CSV_RECORD_INCONSISTENT_COLUMNS, ...)
function isCsvParseError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('CSV_')
  );
}

@Injectable()
export class IntervalCsvParser {
  /**
   * Parse CSV text into intervals, one per data row. A missing header, a
   * missing or repeated required column, or the first malformed row aborts
   * the whole parse.
   */
  parse(csv: string): Interval[] {
    const [header, ...rows] = this.readRows(csv);
    if (header === undefined) {
      throw new IntervalSourceError('Missing header row');
    }

    const positions = this.locateColumns(header);

    return rows.map((row, index) => {
      const record = Object.fromEntries(
        REQUIRED_COLUMNS.map((column) => [column, row[positions[column]]]),
      );

      const result = IntervalRowSchema.safeParse(record);
      if (!result.success) {
        const issue = result.error.issues[0];
        const column = issue.path.length > 0 ? String(issue.path[0]) : undefined;
        throw new IntervalSourceError(
          `Row ${index + 1}: ${column ?? 'record'} ${issue.message.toLowerCase()}`,
          { row: index + 1, column },
        );
      }

      return {
        start: result.data.Interval_start,
        end: result.data.Interval_end,
        cost: result.data.Cost,
      };
    });
  }

  async parseFile(path: string): Promise<Interval[]> {
    let csv: string;
    try {
      csv = await readFile(path, 'utf8');
    } catch (error) {
      throw new IntervalSourceError(`Cannot read intervals file ${path}`, {
        cause: error,
      });
    }

    return this.parse(csv);
  }

  private locateColumns(header: string[]): Record<RequiredColumn, number> {
    const locate = (column: RequiredColumn): number => {
      const matches = header.flatMap((name, index) =>
        name === column ? [index] : [],
      );

      if (matches.length === 0) {
        throw new IntervalSourceError(`Header: missing column ${column}`, {
          column,
        });
      }
      if (matches.length > 1) {
        throw new IntervalSourceError(`Header: duplicate column ${column}`, {
          column,
        });
      }

      return matches[0];
    };

    return {
      Interval_start: locate('Interval_start'),
      Interval_end: locate('Interval_end'),
      Cost: locate('Cost'),
    };
  }

  private readRows(csv: string): string[][] {
    let rows: unknown;
    try {
      rows = parse(csv, {
        bom: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (error) {
      if (isCsvParseError(error)) {
        throw new IntervalSourceError(error.message, { cause: error });
      }
      throw error;
    }

    return RawRowsSchema.parse(rows);
  }
}
