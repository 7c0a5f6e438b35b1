/**
 * Error hierarchy for ledger replay.
 *
 * Expected failures (malformed rows, unreadable sources) travel inside neverthrow
 * Results; these classes give them a stable code and a context record for logs.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
  source?: string | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly timestamp: string;
  readonly source?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.source = context?.source;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      source: this.source,
      timestamp: this.timestamp,
    };
  }
}

/**
 * A value that does not have the expected shape: a malformed CSV row, an
 * unparseable amount or an invalid configuration value.
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
}

/**
 * An input whose CSV structure is broken (an unterminated quote, for example).
 * Unlike a malformed row, nothing after it can be read.
 */
export class CsvStructureError extends DomainError {
  readonly code = 'CSV_STRUCTURE_ERROR';
}

/**
 * An input stream that cannot be opened or read.
 */
export class SourceReadError extends DomainError {
  readonly code = 'SOURCE_READ_ERROR';
}

/**
 * The account snapshot could not be written to its destination.
 */
export class ExportError extends DomainError {
  readonly code = 'EXPORT_ERROR';
}

/**
 * An ingestion worker stopped on something other than its input, such as a
 * failure inside the processor.
 */
export class IngestionError extends DomainError {
  readonly code = 'INGESTION_ERROR';
}
