import { promises as fsp } from 'fs';
import { CellValue, ColumnKind, Row, TableSchema } from '../schemas/staging.schema';

export interface RecordSerializer {
  readonly format: 'parquet' | 'ndjson';
  readonly extension: string;
  write(path: string, table: TableSchema, rows: ReadonlyArray<Row>): Promise<void>;
}

function toJsonValue(value: CellValue): string | number {
  return value instanceof Date ? value.toISOString() : value;
}

/** One JSON object per line, keys in column order. */
export const ndjsonSerializer: RecordSerializer = {
  format: 'ndjson',
  extension: 'ndjson',

  async write(path, table, rows) {
    const lines = rows.map((row) => {
      const ordered: Record<string, string | number> = {};
      for (const column of table.columns) {
        ordered[column.name] = toJsonValue(row[column.name]);
      }
      return JSON.stringify(ordered);
    });

    await fsp.writeFile(path, lines.length ? `${lines.join('\n')}\n` : '', {
      encoding: 'utf8',
      flag: 'wx',
    });
  },
};

const PARQUET_TYPES = {
  string: 'UTF8',
  timestamp: 'TIMESTAMP_MILLIS',
  float: 'DOUBLE',
  integer: 'INT32',
} as const satisfies Record<ColumnKind, string>;

export const parquetSerializer: RecordSerializer = {
  format: 'parquet',
  extension: 'parquet',

  async write(path, table, rows) {
    // Loaded on demand so ndjson runs never pay for the parquet codecs.
    const { ParquetSchema, ParquetWriter } = await import('@dsnp/parquetjs');

    const schema = new ParquetSchema(
      Object.fromEntries(
        table.columns.map((column) => [column.name, { type: PARQUET_TYPES[column.kind] }])
      )
    );

    const writer = await ParquetWriter.openFile(schema, path);
    try {
      for (const row of rows) {
        await writer.appendRow({ ...row });
      }
    } finally {
      await writer.close();
    }
  },
};

export function serializerFor(format: 'parquet' | 'ndjson'): RecordSerializer {
  return format === 'parquet' ? parquetSerializer : ndjsonSerializer;
}
