declare module 'parquetjs-lite' {
  import type { Writable } from 'node:stream';

  namespace parquet {
    type ParquetPrimitiveType =
      | 'BOOLEAN'
      | 'INT32'
      | 'INT64'
      | 'FLOAT'
      | 'DOUBLE'
      | 'UTF8'
      | 'JSON'
      | 'BYTE_ARRAY'
      | 'TIMESTAMP_MILLIS'
      | 'TIMESTAMP_MICROS';

    interface ParquetFieldDefinition {
      type: ParquetPrimitiveType;
      optional?: boolean;
      repeated?: boolean;
      compression?: 'UNCOMPRESSED' | 'GZIP' | 'SNAPPY' | 'LZO' | 'BROTLI';
    }

    type ParquetRow = Record<string, unknown>;

    class ParquetSchema {
      constructor(fields: Record<string, ParquetFieldDefinition>);
    }

    class ParquetWriter {
      static openFile(schema: ParquetSchema, path: string, opts?: Record<string, unknown>): Promise<ParquetWriter>;
      static openStream(schema: ParquetSchema, outputStream: Writable, opts?: Record<string, unknown>): Promise<ParquetWriter>;
      appendRow(row: ParquetRow): Promise<void>;
      close(): Promise<void>;
    }

    interface ParquetCursor {
      next(): Promise<ParquetRow | null>;
      rewind(): void;
    }

    class ParquetReader {
      static openFile(path: string): Promise<ParquetReader>;
      static openBuffer(buffer: Buffer): Promise<ParquetReader>;
      getCursor(columnList?: string[]): ParquetCursor;
      close(): Promise<void>;
    }
  }

  export = parquet;
}
