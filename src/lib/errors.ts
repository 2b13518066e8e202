import axios from 'axios';

export class FetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class NotifyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NotifyError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// Axios errors carry the response status, which is the useful part for a run log
export function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.response ? `HTTP ${err.response.status}: ${err.message}` : err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
