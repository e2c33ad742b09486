export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class OutputWriteError extends Error {
  readonly outputPath: string;

  constructor(message: string, outputPath: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OutputWriteError";
    this.outputPath = outputPath;
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
