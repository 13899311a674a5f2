export class DeliveryUnavailableError extends Error {
  readonly host: string;

  constructor(host: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? "unknown error" : String(cause);
    super(`Could not reach ${host}: ${reason}`, { cause });
    this.name = "DeliveryUnavailableError";
    this.host = host;
  }
}

export class NoteNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Note not found: ${filePath}`);
    this.name = "NoteNotFoundError";
    this.filePath = filePath;
  }
}
