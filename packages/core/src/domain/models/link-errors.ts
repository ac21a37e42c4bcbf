export type LinkErrorKind = "validation" | "not-found" | "storage";

export type ValidationField = "name" | "url" | "tag" | "id";

export class ValidationError extends Error {
  public readonly kind = "validation" as const;

  constructor(
    message: string,
    public readonly field: ValidationField
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error {
  public readonly kind = "not-found" as const;

  constructor(public readonly linkId: string) {
    super(`Link not found: ${linkId}`);
    this.name = "NotFoundError";
  }
}

export class StorageError extends Error {
  public readonly kind = "storage" as const;
  public readonly filePath: string | null;

  constructor(
    message: string,
    options: { filePath?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "StorageError";
    this.filePath = options.filePath ?? null;
  }
}

export type LinkError = ValidationError | NotFoundError | StorageError;

export function isLinkError(value: unknown): value is LinkError {
  return (
    value instanceof ValidationError ||
    value instanceof NotFoundError ||
    value instanceof StorageError
  );
}
