export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input that cannot be turned into a ledger entry (bad amount, missing token). */
export class ValidationError extends AppError {}

/** A debt id that does not belong to the caller or is no longer pending. */
export class NotFoundError extends AppError {}

/** Any failure raised by a ledger driver. */
export class StorageError extends AppError {}

/** A scheduled push that could not be delivered to one owner. */
export class DeliveryError extends AppError {
  constructor(
    readonly owner: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends AppError {}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
