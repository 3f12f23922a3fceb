export enum HarvestErrorCode {
  TRANSPORT = "TRANSPORT",
  HTTP_STATUS = "HTTP_STATUS",
  MALFORMED_DOCUMENT = "MALFORMED_DOCUMENT",
  INVALID_CONFIG = "INVALID_CONFIG",
}

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;
  readonly url?: string;
  readonly retryable: boolean;
  readonly cause?: Error;
  readonly timestamp: string;

  constructor(
    message: string,
    code: HarvestErrorCode,
    options?: { url?: string; retryable?: boolean; cause?: Error }
  ) {
    super(message);
    this.name = "HarvestError";
    this.code = code;
    this.url = options?.url;
    this.retryable = options?.retryable ?? false;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * DNS, connect, TLS or timeout failure before a response arrived.
 */
export class TransportError extends HarvestError {
  constructor(url: string, message: string, options?: { cause?: Error }) {
    super(`Network failure for ${url}: ${message}`, HarvestErrorCode.TRANSPORT, {
      url,
      retryable: true,
      cause: options?.cause,
    });
    this.name = "TransportError";
  }
}

export class HttpStatusError extends HarvestError {
  readonly statusCode: number;

  constructor(url: string, statusCode: number, statusText?: string) {
    super(
      `HTTP ${statusCode}${statusText ? ` ${statusText}` : ""} for ${url}`,
      HarvestErrorCode.HTTP_STATUS,
      { url, retryable: statusCode === 429 || statusCode >= 500 }
    );
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
  }
}

export class MalformedDocumentError extends HarvestError {
  readonly documentType: "xml" | "json";

  constructor(
    documentType: "xml" | "json",
    reason: string,
    options?: { url?: string; cause?: Error }
  ) {
    super(`Malformed ${documentType} document: ${reason}`, HarvestErrorCode.MALFORMED_DOCUMENT, {
      url: options?.url,
      cause: options?.cause,
    });
    this.name = "MalformedDocumentError";
    this.documentType = documentType;
  }
}

/**
 * Raised before any network activity when the run options are inconsistent.
 * The only error class that aborts a whole run.
 */
export class ConfigurationError extends HarvestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, HarvestErrorCode.INVALID_CONFIG);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
