import { IndicatorType } from '../domain/types/indicator.type';

export class IndicatorFetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly provider: string,
    public readonly indicator?: IndicatorType,
  ) {
    super(message);
    this.name = 'IndicatorFetchError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unknown error occurred';
}

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof IndicatorFetchError) return error.statusCode === 429;
  return false;
}
