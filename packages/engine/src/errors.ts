export class InputError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot read input image ${filePath}: ${reason}`, options);
    this.name = 'InputError';
  }
}

export const isInputError = (error: unknown): error is InputError => error instanceof InputError;

export class OutputError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot write output image ${filePath}: ${reason}`, options);
    this.name = 'OutputError';
  }
}

export const isOutputError = (error: unknown): error is OutputError => error instanceof OutputError;
