/**
 * Closed set of failures raised by the store. Each carries structured context
 * so callers can branch on `kind` and inspect ids or patterns directly.
 */
export type StoreErrorKind = 'authentication' | 'schema' | 'not-found' | 'integrity' | 'import';

export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Wrong key, or the file is not an encrypted store. */
export class AuthenticationError extends StoreError {
  readonly kind = 'authentication' as const;

  constructor(readonly path: string, options?: ErrorOptions) {
    super(`Unable to unlock store at ${path}: wrong key or corrupt file`, options);
  }
}

export class SchemaError extends StoreError {
  readonly kind = 'schema' as const;

  constructor(readonly table: string, readonly column: string | null, detail: string, options?: ErrorOptions) {
    super(`Unexpected shape for ${column ? `${table}.${column}` : table}: ${detail}`, options);
  }
}

export type NotFoundTarget =
  | { entity: 'category'; name: string; subcategory: string }
  | { entity: 'transaction'; id: number };

export class NotFoundError extends StoreError {
  readonly kind = 'not-found' as const;

  constructor(readonly target: NotFoundTarget) {
    super(
      target.entity === 'category'
        ? `Category not found: "${target.name}" / "${target.subcategory}"`
        : `Transaction not found: id=${target.id}`
    );
  }
}

/** More than one row matched an operation that must affect exactly one. */
export class IntegrityError extends StoreError {
  readonly kind = 'integrity' as const;

  constructor(readonly table: string, readonly id: number, readonly matched: number) {
    super(`${matched} rows in ${table} matched id=${id}`);
  }
}

export interface ImportErrorContext {
  file?: string;
  field?: string;
}

/** A single input file or record could not be parsed or merged. */
export class ImportError extends StoreError {
  readonly kind = 'import' as const;
  readonly file: string | null;
  readonly field: string | null;

  constructor(message: string, context: ImportErrorContext = {}, options?: ErrorOptions) {
    super(message, options);
    this.file = context.file ?? null;
    this.field = context.field ?? null;
  }
}
