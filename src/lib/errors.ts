/**
 * Error classes for the query compiler
 *
 * Provides custom error types for model loading, query generation and
 * output rendering.
 */

/**
 * Base generator error class
 */
export class GeneratorError extends Error {
  code: string | null;

  constructor(message: string, code: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed or missing model definition. Aborts the whole generation run.
 */
export class ConfigurationError extends GeneratorError {
  sourcePath: string | null;

  constructor(message: string, sourcePath: string | null = null) {
    super(sourcePath ? `${sourcePath}: ${message}` : message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.sourcePath = sourcePath;
  }
}

/**
 * Validation error
 */
export class ValidationError extends GeneratorError {
  field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Invalid UUID error - for malformed id binding values
 */
export class InvalidUUIDError extends GeneratorError {
  constructor(message = 'Invalid UUID format') {
    super(message, 'INVALID_UUID');
    this.name = 'InvalidUUIDError';
  }
}

export type OrderByFailure = 'invalid_field' | 'invalid_direction';

/**
 * Requested sort is not on the model's whitelist
 */
export class OrderByError extends GeneratorError {
  reason: OrderByFailure;
  field: string;

  constructor(reason: OrderByFailure, field: string) {
    super(
      reason === 'invalid_field'
        ? `Cannot order by field "${field}"`
        : `Cannot order by field "${field}" in the requested direction`,
      reason === 'invalid_field' ? 'INVALID_ORDER_FIELD' : 'INVALID_ORDER_DIRECTION'
    );
    this.name = 'OrderByError';
    this.reason = reason;
    this.field = field;
  }
}

/**
 * A generator path was requested that has no implementation
 */
export class UnimplementedGeneratorError extends GeneratorError {
  operation: string;

  constructor(operation: string) {
    super(`Query generator "${operation}" is not implemented`, 'UNIMPLEMENTED_GENERATOR');
    this.name = 'UnimplementedGeneratorError';
    this.operation = operation;
  }
}

/**
 * The external formatter failed on one file
 */
export class FormatterError extends GeneratorError {
  file: string;
  output: string;

  constructor(file: string, output: string) {
    super(`Formatter failed on ${file}${output ? `:\n${output}` : ''}`, 'FORMATTER_ERROR');
    this.name = 'FormatterError';
    this.file = file;
    this.output = output;
  }
}

/**
 * Writing a rendered file failed
 */
export class WriteFileError extends GeneratorError {
  path: string;
  originalError: unknown;

  constructor(path: string, originalError: unknown = null) {
    const reason = originalError instanceof Error ? `: ${originalError.message}` : '';
    super(`Failed to write ${path}${reason}`, 'WRITE_FILE_ERROR');
    this.name = 'WriteFileError';
    this.path = path;
    this.originalError = originalError;
  }
}

const errors = {
  GeneratorError,
  ConfigurationError,
  ValidationError,
  InvalidUUIDError,
  OrderByError,
  UnimplementedGeneratorError,
  FormatterError,
  WriteFileError,
} as const;

export default errors;
