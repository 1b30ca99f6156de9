export class DnsError extends Error {
  public readonly url: string;
  public readonly hostname: string;

  constructor(url: string, hostname: string, options?: ErrorOptions) {
    super(`Could not resolve host ${hostname}`, options);
    this.name = 'DnsError';
    this.url = url;
    this.hostname = hostname;
  }
}

/** Non-2xx response, unusable body, or any other transport failure (status 0). */
export class HttpError extends Error {
  public readonly status: number;

  constructor(status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class IOError extends Error {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IOError';
    this.path = path;
  }
}

export class SyncInProgressError extends Error {
  constructor() {
    super('A sync pass is already in progress');
    this.name = 'SyncInProgressError';
  }
}

export class ConfigError extends Error {
  public readonly configPath: string;

  constructor(configPath: string, message: string, options?: ErrorOptions) {
    super(`Invalid config ${configPath}: ${message}`, options);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export function isTransportError(err: unknown): err is DnsError | HttpError {
  return err instanceof DnsError || err instanceof HttpError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
