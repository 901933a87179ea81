import type { ErrorInfo } from "./types/deploy.js";

export class DeploymentError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A call to the record store did not succeed. Never retried. */
export class FetchFailure extends DeploymentError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("FETCH_FAILURE", message, { cause: options.cause });
    this.status = options.status;
  }
}

export class MalformedRecord extends DeploymentError {
  readonly recordId?: string;

  constructor(message: string, recordId?: string) {
    super("MALFORMED_RECORD", message);
    this.recordId = recordId;
  }
}

export class SeedNotFound extends DeploymentError {
  readonly seedName: string;

  constructor(seedName: string) {
    super("SEED_NOT_FOUND", `Seed '${seedName}' not found`);
    this.seedName = seedName;
  }
}

/** The store reported more results without a cursor to fetch them. */
export class PaginationProtocolViolation extends DeploymentError {
  constructor(message: string) {
    super("PAGINATION_PROTOCOL_VIOLATION", message);
  }
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof DeploymentError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: "UNEXPECTED", message: err.message };
  }
  return { code: "UNEXPECTED", message: String(err) };
}
