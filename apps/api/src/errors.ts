export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Non-2xx answer from the hosted video API. */
export class VideoApiError extends Error {
  readonly status: number;
  readonly details: string;

  constructor(status: number, details: string) {
    super(`video api error (${status}): ${details}`);
    this.name = "VideoApiError";
    this.status = status;
    this.details = details;
  }
}

/** A remote job reached a terminal failure status. */
export class RemoteFailureError extends Error {
  readonly status: string;

  constructor(status: string, message = `Remote task ended with status "${status}".`) {
    super(message);
    this.name = "RemoteFailureError";
    this.status = status;
  }
}

export class TimeoutError extends Error {
  readonly elapsedMs: number;

  constructor(elapsedMs: number) {
    super(`Gave up waiting after ${elapsedMs}ms.`);
    this.name = "TimeoutError";
    this.elapsedMs = elapsedMs;
  }
}

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadError";
  }
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
