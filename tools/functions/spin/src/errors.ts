export const CREDENTIALS_MESSAGE = 'No AWS credentials found. To run live, set AWS_PROFILE or run `aws configure`.';
export const CREDENTIALS_HINT = 'Otherwise keep dry-run.';

export const POLICY_EXIT_CODE = 2;

export type RemoteOperation = 'resolve-ami' | 'launch' | 'describe' | 'describe-health' | 'terminate';

const OPERATION_LABELS: Record<RemoteOperation, string> = {
  'resolve-ami': 'fetch AMI from SSM',
  launch: 'launch instances',
  describe: 'describe instances',
  'describe-health': 'describe instance health',
  terminate: 'terminate instances',
};

const CREDENTIALS_ERROR_NAMES = ['CredentialsProviderError'];
const ACCESS_DENIED_CODES = ['AccessDenied', 'AccessDeniedException', 'UnauthorizedOperation'];
const PARAMETER_NOT_FOUND_CODE = 'ParameterNotFound';

interface SpinErrorOptions {
  hint?: string;
  exitCode?: number;
  cause?: unknown;
}

export class SpinError extends Error {
  readonly hint?: string;
  readonly exitCode: number;

  constructor(message: string, options: SpinErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SpinError';
    this.hint = options.hint;
    this.exitCode = options.exitCode ?? 1;
  }
}

export class ConfigurationError extends SpinError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DependencyMissingError extends SpinError {
  constructor(
    public readonly dependency: string,
    cause?: unknown,
  ) {
    super(`${dependency} is required for live operations but could not be loaded.`, {
      hint: 'Run `npm install` in the project root, or keep dry-run.',
      cause,
    });
    this.name = 'DependencyMissingError';
  }
}

export class CredentialsError extends SpinError {
  constructor(cause?: unknown) {
    super(CREDENTIALS_MESSAGE, { hint: CREDENTIALS_HINT, cause });
    this.name = 'CredentialsError';
  }
}

export class PolicyViolationError extends SpinError {
  constructor(message: string) {
    super(message, { exitCode: POLICY_EXIT_CODE });
    this.name = 'PolicyViolationError';
  }
}

export class InvalidResponseError extends SpinError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}

export class PollTimeoutError extends SpinError {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${Math.round(timeoutMs / 1000)}s waiting for instances to reach running state.`);
    this.name = 'PollTimeoutError';
  }
}

/**
 * A failed call to a remote service. `code` is the remote error code, verbatim.
 */
export class RemoteCallError extends SpinError {
  constructor(
    message: string,
    public readonly operation: RemoteOperation,
    public readonly code: string,
    options: SpinErrorOptions = {},
  ) {
    super(message, options);
    this.name = 'RemoteCallError';
  }
}

export class UnsupportedRegionError extends RemoteCallError {
  constructor(region: string, parameterName: string, cause?: unknown) {
    super(
      `AMI parameter not found in region ${region}. Parameter: ${parameterName}. ` +
        'This region may not support AL2023 or the parameter path has changed.',
      'resolve-ami',
      PARAMETER_NOT_FOUND_CODE,
      { cause },
    );
    this.name = 'UnsupportedRegionError';
  }
}

export class PermissionError extends RemoteCallError {
  constructor(operation: RemoteOperation, code: string, region: string, cause?: unknown) {
    super(`Access denied when trying to ${OPERATION_LABELS[operation]} in region ${region} (code=${code}).`, operation, code, {
      hint: 'Ensure your AWS credentials have the required EC2/SSM permissions.',
      cause,
    });
    this.name = 'PermissionError';
  }
}

export class ResolutionError extends RemoteCallError {
  constructor(region: string, parameterName: string, code: string, cause?: unknown) {
    super(
      `Failed to fetch AMI from SSM in region ${region} (code=${code}). Parameter: ${parameterName}.`,
      'resolve-ami',
      code,
      { cause },
    );
    this.name = 'ResolutionError';
  }
}

export interface RemoteErrorContext {
  region: string;
  parameterName?: string;
}

export function remoteErrorCode(error: unknown): string {
  if (error instanceof Error && error.name && error.name !== 'Error') {
    return error.name;
  }
  return 'Unknown';
}

/**
 * Maps a failure of a remote call onto the closed set of errors the CLI knows how to report.
 * Remote error codes are only inspected here.
 */
export function translateRemoteError(
  operation: RemoteOperation,
  error: unknown,
  context: RemoteErrorContext,
): SpinError {
  if (error instanceof SpinError) {
    return error;
  }

  const code = remoteErrorCode(error);
  if (CREDENTIALS_ERROR_NAMES.includes(code)) {
    return new CredentialsError(error);
  }
  if (ACCESS_DENIED_CODES.includes(code)) {
    return new PermissionError(operation, code, context.region, error);
  }
  if (operation === 'resolve-ami') {
    const parameterName = context.parameterName ?? 'unknown';
    if (code === PARAMETER_NOT_FOUND_CODE) {
      return new UnsupportedRegionError(context.region, parameterName, error);
    }
    return new ResolutionError(context.region, parameterName, code, error);
  }
  return new RemoteCallError(`Failed to ${OPERATION_LABELS[operation]} (code=${code}).`, operation, code, {
    cause: error,
  });
}

export function toSpinError(error: unknown): SpinError {
  if (error instanceof SpinError) {
    return error;
  }
  if (error instanceof Error) {
    return new SpinError(error.message, { cause: error });
  }
  return new SpinError(String(error));
}

export function renderSpinError(error: SpinError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
