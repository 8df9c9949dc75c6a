/**
 * Typed error classes for the benchmark core.
 *
 * Adapter errors are converted to run outcomes by the orchestrator; only
 * configuration and structural errors reach the caller.
 */

export class CbomBenchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CbomBenchError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigError extends CbomBenchError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InvalidRepositoryError extends CbomBenchError {
  public readonly repository: string;

  constructor(repository: string, reason: string) {
    super(`Unusable repository identifier "${repository}": ${reason}`, 'INVALID_REPOSITORY');
    this.name = 'InvalidRepositoryError';
    this.repository = repository;
  }
}

export class AdapterTimeoutError extends CbomBenchError {
  public readonly timeoutMs: number;

  constructor(toolId: string, timeoutMs: number) {
    super(`${toolId} did not finish within ${timeoutMs} ms`, 'ADAPTER_TIMEOUT');
    this.name = 'AdapterTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class AdapterError extends CbomBenchError {
  public readonly toolId: string;

  constructor(toolId: string, message: string) {
    super(message, 'ADAPTER_ERROR');
    this.name = 'AdapterError';
    this.toolId = toolId;
  }
}

export class MalformedOutputError extends CbomBenchError {
  public readonly rawText?: string;

  constructor(message: string, rawText?: string) {
    super(message, 'MALFORMED_OUTPUT');
    this.name = 'MalformedOutputError';
    this.rawText = rawText;
  }
}

export class RepositorySourceError extends CbomBenchError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, 'REPOSITORY_SOURCE_ERROR');
    this.name = 'RepositorySourceError';
    this.statusCode = statusCode;
  }
}

export class StoreError extends CbomBenchError {
  constructor(message: string) {
    super(message, 'STORE_ERROR');
    this.name = 'StoreError';
  }
}

export class MetricRecordConflictError extends CbomBenchError {
  public readonly key: string;

  constructor(key: string) {
    super(`Metric record already written: ${key}`, 'METRIC_RECORD_CONFLICT');
    this.name = 'MetricRecordConflictError';
    this.key = key;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
