export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitStatus = number;

export abstract class TfWrapperError extends Error {
  readonly exitCode: ExitStatus = ExitCodes.FAILURE;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised before any mutation when the app name or AWS account cannot be
 * determined.
 */
export class IdentityError extends TfWrapperError {
  override readonly exitCode = ExitCodes.USAGE;
}

/** Parameter Store could not be reached or rejected a request. */
export class StoreError extends TfWrapperError {
  constructor(
    message: string,
    readonly parameterName: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class BootstrapError extends TfWrapperError {}

/** A Terraform command against the target directory exited non-zero. */
export class TerraformError extends TfWrapperError {
  constructor(
    message: string,
    readonly command: string,
    readonly terraformExitCode: number
  ) {
    super(message);
  }
}

export class PurgeError extends TfWrapperError {
  constructor(message: string, readonly bucket: string, options?: ErrorOptions) {
    super(message, options);
  }
}

// Never thrown: the bucket stays behind but teardown still completes
export class ResourceCleanupWarning extends Error {
  constructor(message: string, readonly bucket: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResourceCleanupWarning";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
