/**
 * Dataset construction - builds the columnar in-memory table the analysis reads
 */

import type {
  CellValue,
  Column,
  DataSource,
  Dataset,
} from "../../types/data-model.js";
import { ValidationError } from "../../utils/errors.js";

export type DataRecord = Record<string, CellValue>;

export interface DatasetInit {
  columns: Column[];
  source?: Partial<DataSource>;
  /** Defaults to the length of the first column */
  rowCount?: number;
  createdAt?: Date;
}

const IN_MEMORY_SOURCE: DataSource = { path: "<memory>", format: "memory" };

/**
 * Build a dataset from columns, checking every column has rowCount values
 *
 * @throws ValidationError on ragged columns or an invalid row count
 */
export function createDataset(init: DatasetInit): Dataset {
  const rowCount = init.rowCount ?? init.columns[0]?.values.length ?? 0;

  if (!Number.isInteger(rowCount) || rowCount < 0) {
    throw new ValidationError(`Row count must be a non-negative integer, got ${rowCount}`);
  }

  for (const column of init.columns) {
    if (column.values.length !== rowCount) {
      throw new ValidationError(
        `Column "${column.name}" has ${column.values.length} values, expected ${rowCount}`,
        { column: column.name, length: column.values.length, rowCount },
      );
    }
  }

  return {
    columns: init.columns.map((column) => ({
      name: column.name,
      values: [...column.values],
    })),
    rowCount,
    // Field by field, so an explicit undefined keeps the default
    source: {
      path: init.source?.path ?? IN_MEMORY_SOURCE.path,
      format: init.source?.format ?? IN_MEMORY_SOURCE.format,
    },
    createdAt: init.createdAt ?? new Date(),
  };
}

/**
 * Pivot row records into a dataset. Column order follows `columnNames` when
 * given, otherwise first appearance across records. Keys missing from a
 * record become absent cells.
 *
 * @example
 * datasetFromRecords([{ a: 1, b: "x" }, { a: 2 }])
 * // Columns: a = [1, 2], b = ["x", undefined]
 */
export function datasetFromRecords(
  records: readonly DataRecord[],
  options: {
    columnNames?: string[];
    source?: Partial<DataSource>;
    createdAt?: Date;
  } = {},
): Dataset {
  let names = options.columnNames;
  if (!names) {
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        seen.add(key);
      }
    }
    names = [...seen];
  }

  const columns: Column[] = names.map((name) => ({
    name,
    values: records.map((record) =>
      Object.prototype.hasOwnProperty.call(record, name) ? record[name] : undefined,
    ),
  }));

  return createDataset({
    columns,
    rowCount: records.length,
    source: options.source,
    createdAt: options.createdAt,
  });
}
