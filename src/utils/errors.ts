export class UpdateFiltersError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpdateFiltersError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class FilterError extends UpdateFiltersError {
  constructor(reason: string, message: string, options?: ErrorOptions) {
    super(message, `FILTER_${reason.toUpperCase()}`, options);
    this.name = 'FilterError';
  }
}

export class RouterError extends UpdateFiltersError {
  constructor(reason: string, message: string, options?: ErrorOptions) {
    super(message, `ROUTER_${reason.toUpperCase()}`, options);
    this.name = 'RouterError';
  }
}

export class ConfigError extends UpdateFiltersError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
