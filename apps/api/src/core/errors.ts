export interface Pan115ErrorOptions {
  cause?: unknown;
  statusCode?: number;
}

/**
 * Base class for every failure surfaced by the 115 session and adapter.
 * `statusCode` is the HTTP status the API layer answers with.
 */
export class Pan115Error extends Error {
  readonly code: string = "PAN115_ERROR";
  readonly statusCode: number;

  constructor(message: string, opts: Pan115ErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.statusCode = opts.statusCode ?? 502;
  }
}

export class MissingCredentialError extends Pan115Error {
  override readonly code = "MISSING_CREDENTIAL";

  constructor(message = "missing cookie or qrcode account") {
    super(message, { statusCode: 401 });
  }
}

export class CredentialParseError extends Pan115Error {
  override readonly code = "CREDENTIAL_PARSE";

  constructor(message: string) {
    super(message, { statusCode: 400 });
  }
}

export class LoginError extends Pan115Error {
  override readonly code: string = "LOGIN_FAILED";

  constructor(message: string, opts: Pan115ErrorOptions = {}) {
    super(message, { statusCode: 401, ...opts });
  }
}

export class LoginCheckFailedError extends LoginError {
  override readonly code = "LOGIN_CHECK_FAILED";
}

/** Application-level error carried inside a 200 response envelope. */
export class ProviderApiError extends Pan115Error {
  override readonly code = "PROVIDER_API";
  readonly errno: number | string | undefined;

  constructor(message: string, errno?: number | string) {
    super(message);
    this.errno = errno;
  }
}

export class ListError extends Pan115Error {
  override readonly code = "LIST_FAILED";
}

export class DownloadError extends Pan115Error {
  override readonly code: string = "DOWNLOAD_FAILED";
}

export class EmptyDownloadError extends DownloadError {
  override readonly code = "DOWNLOAD_EMPTY";

  constructor(message = "download info is empty, the file may be deleted or blocked") {
    super(message, { statusCode: 404 });
  }
}

export class UnexpectedEmptyResponseError extends DownloadError {
  override readonly code = "UNEXPECTED_EMPTY_RESPONSE";

  constructor(message = "download info response contains no entries") {
    super(message);
  }
}

export class UploadError extends Pan115Error {
  override readonly code: string = "UPLOAD_FAILED";
}

export class SignatureChallengeExceededError extends UploadError {
  override readonly code = "SIGNATURE_CHALLENGE_EXCEEDED";

  constructor(readonly challenges: number) {
    super(`rapid upload asked for more than ${challenges} signature challenges`);
  }
}

export class FullUploadRequiredError extends UploadError {
  override readonly code = "FULL_UPLOAD_REQUIRED";

  constructor(fileName: string) {
    super(`${fileName} is not known to the server and no upload transfer is configured`, { statusCode: 501 });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
