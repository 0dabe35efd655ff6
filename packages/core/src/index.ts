// Main entry point
export { TableTransfer } from './TableTransfer.js';
export type { TableTransferConfig } from './TableTransfer.js';

// Domain model
export { ColumnType } from './domain/model/Column.js';
export type { Column } from './domain/model/Column.js';
export type { Cell, CellKind, StructuredValue } from './domain/model/Cell.js';
export { toCell, isStructured, NULL_CELL } from './domain/model/Cell.js';
export type { Dataset, DatasetRow, SourceRecord } from './domain/model/Dataset.js';
export { createDataset, createDatasetFromRows, renameColumns, rowCount } from './domain/model/Dataset.js';
export { WriteMode, FileFormat } from './domain/model/TransferTarget.js';
export type {
  TableName,
  FileTarget,
  TableTarget,
  StagedTableTarget,
  TransferTarget,
  TargetKind,
} from './domain/model/TransferTarget.js';
export {
  isWriteMode,
  isFileFormat,
  parseWriteMode,
  parseFileFormat,
  formatTableName,
} from './domain/model/TransferTarget.js';
export type { TransferOutcome } from './domain/model/TransferOutcome.js';
export type { BatchReport, BatchReportEntry, BatchEntryStatus } from './domain/model/BatchReport.js';
export { buildBatchReport, failedEntries, formatBatchReport } from './domain/model/BatchReport.js';
export { UploadStatus, canTransition, isTerminal } from './domain/model/UploadStatus.js';

// Errors
export {
  TransferError,
  ConfigurationError,
  ConnectionError,
  ProtocolError,
  OpenError,
  StatementError,
  DataError,
  describeError,
} from './domain/errors/TransferErrors.js';
export type { ErrorCategory } from './domain/errors/TransferErrors.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export {
  sanitizeColumnName,
  sanitizeColumnNames,
  sanitizeDataset,
  hasSanitizedColumns,
} from './domain/services/ColumnSanitizer.js';
export { toJsonText } from './domain/services/JsonText.js';
export type { SqlDialect } from './domain/services/SqlDialect.js';
export { sparkSqlDialect, ansiSqlDialect, qualifiedTableName } from './domain/services/SqlDialect.js';
export {
  quoteText,
  encodeLiteral,
  createTableStatement,
  dropTableStatement,
  insertStatement,
  createTableFromFileStatement,
  insertFromFileStatement,
} from './domain/services/SqlStatements.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  TransferStartedEvent,
  TransferCompletedEvent,
  TransferFailedEvent,
  UploadStartedEvent,
  UploadChunkEvent,
  UploadCompletedEvent,
  UploadAbortedEvent,
  SqlBatchEvent,
  RunStartedEvent,
  TableSkippedEvent,
  TableCompletedEvent,
  TableFailedEvent,
  RunCompletedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';

// Application services (usable without the facade)
export { ChunkedUpload, DIRECT_PUT_LIMIT, DEFAULT_CHUNK_SIZE } from './application/services/ChunkedUpload.js';
export type { ChunkedUploadOptions, UploadResult } from './application/services/ChunkedUpload.js';
export { BatchSqlWriter, DEFAULT_BATCH_SIZE, LARGE_INSERT_THRESHOLD } from './application/services/BatchSqlWriter.js';
export type { BatchSqlWriterOptions } from './application/services/BatchSqlWriter.js';
export { StagedTableLoader } from './application/services/StagedTableLoader.js';
export type { StagedTableLoaderOptions, StagedLoadResult } from './application/services/StagedTableLoader.js';
export { targetLocation } from './application/usecases/TransferDataset.js';
export type { TargetResolver } from './application/usecases/RunBatch.js';

// Ports (for custom implementations)
export type { RemoteFileService, UploadHandle } from './domain/ports/RemoteFileService.js';
export type { SqlConnection, SqlResult } from './domain/ports/SqlConnection.js';
export type { SourceReader, ReadTableOptions } from './domain/ports/SourceReader.js';
export type { DatasetEncoder } from './domain/ports/DatasetEncoder.js';

// Infrastructure
export { createLogger, silentLogger } from './infrastructure/logging/createLogger.js';
export type { LoggerOptions } from './infrastructure/logging/createLogger.js';
export { CsvEncoder } from './infrastructure/encoders/CsvEncoder.js';
export type { CsvEncoderOptions } from './infrastructure/encoders/CsvEncoder.js';
export { ParquetEncoder } from './infrastructure/encoders/ParquetEncoder.js';
export { InMemoryFileService } from './infrastructure/files/InMemoryFileService.js';
export type { FileRequest } from './infrastructure/files/InMemoryFileService.js';
export { InMemorySqlConnection } from './infrastructure/sql/InMemorySqlConnection.js';
