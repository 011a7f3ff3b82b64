export type PatientDirectoryErrorKind = "malformed_response" | "upstream_unreachable" | "upstream_status";

/**
 * Base class for failures talking to the patient directory. `kind` is what the
 * presenter and transports switch on; `message` is for logs only.
 */
export abstract class PatientDirectoryError extends Error {
  abstract readonly kind: PatientDirectoryErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedResponseError extends PatientDirectoryError {
  readonly kind = "malformed_response";

  constructor(readonly received: string) {
    super(`Unrecognized response envelope: ${received}`);
  }
}

export class UpstreamUnreachableError extends PatientDirectoryError {
  readonly kind = "upstream_unreachable";

  constructor(
    readonly url: string,
    cause?: unknown,
  ) {
    super(`Patient directory unreachable at ${url}`, { cause });
  }
}

export class UpstreamStatusError extends PatientDirectoryError {
  readonly kind = "upstream_status";

  constructor(
    readonly status: number,
    readonly bodyPreview: string,
  ) {
    super(`Patient directory responded with HTTP ${status}`);
  }
}

export function isPatientDirectoryError(err: unknown): err is PatientDirectoryError {
  return err instanceof PatientDirectoryError;
}

