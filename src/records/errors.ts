export enum MarshalErrorCode {
  InvalidMetadata = 'InvalidMetadata',
  MissingField = 'MissingField',
  TypeCoercion = 'TypeCoercion',
  DateFormat = 'DateFormat',
  Validation = 'Validation'
}

export class MarshalError extends Error {
  readonly path: string[];

  constructor(
    public readonly code: MarshalErrorCode,
    private readonly reason: string,
    path: string[] = [],
    public readonly detail?: Record<string, unknown>
  ) {
    super(MarshalError.render(path, reason));
    this.name = 'MarshalError';
    this.path = [...path];
  }

  get pathString(): string {
    return this.path.join('.');
  }

  // Nested failures are re-thrown with the enclosing field (or list index) in front
  prependPath(...segments: string[]): this {
    this.path.unshift(...segments);
    this.message = MarshalError.render(this.path, this.reason);
    return this;
  }

  private static render(path: string[], reason: string): string {
    return path.length > 0 ? `${path.join('.')}: ${reason}` : reason;
  }
}

export class InvalidMetadataError extends MarshalError {
  constructor(public readonly recordName: string, reason: string, public readonly field?: string) {
    super(MarshalErrorCode.InvalidMetadata, `${recordName}: ${reason}`, [], { record: recordName, field });
    this.name = 'InvalidMetadataError';
  }
}

export class MissingFieldError extends MarshalError {
  constructor(public readonly field: string, public readonly externalKey: string) {
    super(
      MarshalErrorCode.MissingField,
      `missing required field "${field}" (key "${externalKey}")`,
      [field],
      { field, externalKey }
    );
    this.name = 'MissingFieldError';
  }
}

export class TypeCoercionError extends MarshalError {
  constructor(
    public readonly field: string,
    public readonly externalKey: string,
    public readonly sourceKind: string,
    public readonly targetKind: string,
    public readonly value?: unknown,
    path: string[] = [field]
  ) {
    super(
      MarshalErrorCode.TypeCoercion,
      `cannot convert ${sourceKind} to ${targetKind} for field "${field}" (key "${externalKey}")`,
      path,
      { field, externalKey, sourceKind, targetKind, value }
    );
    this.name = 'TypeCoercionError';
  }
}

export class DateFormatError extends MarshalError {
  constructor(
    public readonly field: string,
    public readonly externalKey: string,
    public readonly pattern: string,
    public readonly text: string
  ) {
    super(
      MarshalErrorCode.DateFormat,
      `"${text}" does not match date format "${pattern}" for field "${field}" (key "${externalKey}")`,
      [field],
      { field, externalKey, pattern, text }
    );
    this.name = 'DateFormatError';
  }
}

// Raised by fromMap when more than one top-level field fails
export class RecordValidationError extends MarshalError {
  constructor(public readonly recordName: string, public readonly errors: MarshalError[]) {
    super(
      MarshalErrorCode.Validation,
      `${errors.length} fields of ${recordName} failed: ${errors.map(e => e.message).join('; ')}`,
      [],
      { record: recordName, count: errors.length }
    );
    this.name = 'RecordValidationError';
  }

  override prependPath(...segments: string[]): this {
    for (const error of this.errors) error.prependPath(...segments);
    return super.prependPath(...segments);
  }
}
