export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

export const isInvalidInputError = (error: unknown): error is InvalidInputError =>
  error instanceof InvalidInputError;
