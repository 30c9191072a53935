/**
 * Error taxonomy of the transfer service.
 * Every subclass carries the HTTP status the error middleware answers with.
 */
export class TransferError extends Error {
  constructor(message: string, readonly statusCode = 500) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends TransferError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends TransferError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class MethodNotAllowedError extends TransferError {
  constructor(method: string, readonly allowed: string) {
    super(`Method ${method} not allowed, use ${allowed}`, 405);
  }
}

export class SessionInUseError extends TransferError {
  constructor(readonly sessionId: string) {
    super(`Upload already in progress for uploadId ${sessionId}`, 409);
  }
}

export class LengthRequiredError extends TransferError {
  constructor() {
    super('Upload size unknown: send a size parameter or a Content-Length header', 411);
  }
}

export class PayloadTooLargeError extends TransferError {
  constructor(readonly limitBytes: number) {
    super(`Upload exceeds the ${limitBytes} byte limit`, 413);
  }
}

export class InvalidPortError extends TransferError {
  constructor(readonly input: string | number) {
    super(`Invalid port: ${input}`, 400);
  }
}

export class DuplicateFileError extends TransferError {
  constructor(readonly displayName: string) {
    super(`A file named ${displayName} is already offered for download`, 409);
  }
}

export class InvalidCatalogEntryError extends TransferError {
  constructor(readonly filePath: string, reason: string) {
    super(`Cannot offer ${filePath}: ${reason}`, 400);
  }
}

export class ConfigError extends TransferError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class ServerStartError extends TransferError {
  constructor(readonly port: number, readonly reason: Error) {
    super(`Failed to start server on port ${port}: ${reason.message}`, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The errno code of a Node.js system error, if there is one.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
