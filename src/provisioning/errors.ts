// AWS service error classification

const THROTTLING_ERROR_NAMES = new Set([
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException'
]);

const CAPACITY_ERROR_NAMES = new Set([
  'InsufficientInstanceCapacity',
  'InstanceLimitExceeded',
  'InsufficientDBInstanceCapacity',
  'InstanceQuotaExceeded',
  'StorageQuotaExceeded'
]);

const NOT_FOUND_ERROR_NAMES = new Set([
  'InvalidInstanceID.NotFound',
  'InvalidInstanceID.Malformed',
  'DBInstanceNotFound',
  'DBInstanceNotFoundFault',
  'ResourceNotFoundException'
]);

export interface ProviderErrorInfo {
  code: string;
  message: string;
  transient: boolean;
}

function readProperty(error: unknown, key: string): unknown {
  if (error && typeof error === 'object' && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

export function getErrorCode(error: unknown): string {
  const name = readProperty(error, 'Code') ?? readProperty(error, 'name');
  return typeof name === 'string' ? name : 'UnknownError';
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  const message = readProperty(error, 'message');
  return typeof message === 'string' ? message : String(error);
}

/**
 * Classifies an error raised by an SDK call. A transient error has already
 * exhausted the client's own retries by the time the engine sees it.
 */
export function classifyProviderError(error: unknown): ProviderErrorInfo {
  const code = getErrorCode(error);
  const retryable = readProperty(error, '$retryable');
  const metadata = readProperty(error, '$metadata');
  const status = readProperty(metadata, 'httpStatusCode');

  const transient =
    THROTTLING_ERROR_NAMES.has(code) ||
    retryable !== undefined ||
    (typeof status === 'number' && status >= 500) ||
    code === 'TimeoutError';

  return { code, message: getErrorMessage(error), transient };
}

export function isNotFoundError(error: unknown): boolean {
  return NOT_FOUND_ERROR_NAMES.has(getErrorCode(error));
}

export function isCapacityError(error: unknown): boolean {
  return CAPACITY_ERROR_NAMES.has(getErrorCode(error));
}

export function describeProviderError(error: unknown): string {
  const { code, message, transient } = classifyProviderError(error);
  return `${code}: ${message}${transient ? ' (transient)' : ''}`;
}

export interface TerminationFailure {
  providerResourceId: string;
  reason: string;
}

/**
 * Raised after every requested resource has been attempted, listing the ones
 * the provider refused to terminate.
 */
export class TerminationError extends Error {
  constructor(readonly failures: TerminationFailure[]) {
    super(`Failed to terminate ${failures.map(failure => `${failure.providerResourceId} (${failure.reason})`).join(', ')}`);
    this.name = 'TerminationError';
  }
}
