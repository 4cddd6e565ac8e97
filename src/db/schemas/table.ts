import { z } from 'zod';

/**
 * Describes one flat CSV table: its file, its header row, how a raw row
 * (column name to cell text) parses into a record, and how a record is
 * written back.
 */
export interface TableDefinition<T> {
  fileName: string;
  columns: readonly string[];
  row: z.ZodType<T, z.ZodTypeDef, unknown>;
  toRow: (record: T) => string[];
}

export const serialId = z
  .string()
  .regex(/^[1-9]\d*$/, 'expected a positive integer')
  .transform(Number);

export const isoTimestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .refine((date) => !Number.isNaN(date.getTime()), 'unparseable timestamp');
