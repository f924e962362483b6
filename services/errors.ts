export class CatalogError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "CatalogError";
  }
}

/**
 * Raised for a bad handshake, a non-`ready` reply, a failed `result`, or a
 * transport failure. `payload` holds the server frame as received, if any.
 */
export class GenerationProtocolError extends Error {
  constructor(message: string, readonly payload?: unknown) {
    super(message);
    this.name = "GenerationProtocolError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
