// src/utils/errors.ts

export class TranscriptFormatterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The batch input folder is missing. Raised before anything is written.
 */
export class DirectoryNotFoundError extends TranscriptFormatterError {
  readonly directory: string;

  constructor(directory: string) {
    super(`Input folder '${directory}' does not exist`);
    this.directory = directory;
  }
}

export class ConfigurationError extends TranscriptFormatterError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
