export class RelayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RelayError";
  }
}

/** An inbound control message that failed to parse. */
export class ProtocolError extends RelayError {
  readonly raw: string;

  constructor(reason: string, raw: string) {
    super(`Malformed control message: ${reason}`);
    this.name = "ProtocolError";
    this.raw = raw;
  }
}

export class DuplicateCorrelationIdError extends RelayError {
  constructor(id: string) {
    super(`Correlation id already pending: ${id}`);
    this.name = "DuplicateCorrelationIdError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
