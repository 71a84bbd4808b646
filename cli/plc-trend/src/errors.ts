export class PlcTrendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PlcTrendError {
  readonly device?: string;

  constructor(message: string, device?: string) {
    super(device ? `${device}: ${message}` : message);
    this.device = device;
  }
}

export class ConnectionError extends PlcTrendError {
  constructor(readonly device: string, readonly address: string, cause: unknown) {
    super(`cannot reach ${address}: ${errorMessage(cause)}`, { cause });
  }
}

export class ReadError extends PlcTrendError {
  constructor(readonly device: string, readonly tag: string, cause: unknown) {
    super(errorMessage(cause), { cause });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
