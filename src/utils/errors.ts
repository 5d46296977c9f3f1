export class WeatherBotError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherBotError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends WeatherBotError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class CwaApiError extends AdapterError {
  public readonly dataset: string;

  constructor(dataset: string, message: string, options?: ErrorOptions) {
    super('CWA', message, options);
    this.name = 'CwaApiError';
    this.dataset = dataset;
  }
}

export class LineError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('LINE', message, options);
    this.name = 'LineError';
  }
}

export class ConfigError extends WeatherBotError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
