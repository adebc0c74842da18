export class FxExportError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class InvalidRangeError extends FxExportError {
  constructor(message = 'Start date must be on or before end date.') {
    super(message, 400);
  }
}

export class QueryValidationError extends FxExportError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class MalformedSeriesError extends FxExportError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class UpstreamApiError extends FxExportError {
  readonly upstreamStatus?: number;
  readonly requestUrl?: string;

  constructor(message: string, options: { upstreamStatus?: number; requestUrl?: string } = {}) {
    super(message, 502);
    this.upstreamStatus = options.upstreamStatus;
    this.requestUrl = options.requestUrl;
  }
}

export class ConfigurationError extends FxExportError {
  constructor(message: string) {
    super(message, 500);
  }
}
