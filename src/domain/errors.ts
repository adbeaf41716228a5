export type StackErrorKind = 'configuration' | 'classification' | 'merge';

export abstract class StackError extends Error {
  abstract readonly kind: StackErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Bad inputs to the run itself: worker counts, empty folders, option values
export class ConfigurationError extends StackError {
  readonly kind = 'configuration';
}

// A file whose name cannot be placed in the table inventory
export class ClassificationError extends StackError {
  readonly kind = 'classification';

  constructor(
    message: string,
    readonly fileName: string
  ) {
    super(message);
  }
}

// A table whose selected files cannot be unioned
export class MergeError extends StackError {
  readonly kind = 'merge';

  constructor(
    message: string,
    readonly tableName: string
  ) {
    super(message);
  }
}

export function isStackError(error: unknown): error is StackError {
  return error instanceof StackError;
}
