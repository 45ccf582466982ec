/**
 * Custom exceptions for pipeline stages.
 */

export class DownloadFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Download failed: ${message}` : "Download failed");
    this.name = "DownloadFailedException";
  }
}

export class ValidationFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Validation failed: ${message}` : "Validation failed");
    this.name = "ValidationFailedException";
  }
}

export class UploadFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Upload failed: ${message}` : "Upload failed");
    this.name = "UploadFailedException";
  }
}

export class ConnectivityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConnectivityError";
  }
}

export class ConfigurationError extends Error {
  issues: string[];

  constructor(issues: string[], message?: string) {
    super(message ?? `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
