/**
 * Newsletter Error Types
 * Every fatal condition of a run is one of these, discriminated by `kind`
 */

export type ErrorKind =
  | 'ConfigurationMissing'
  | 'InvalidInput'
  | 'DocumentNotFound'
  | 'AmbiguousDocument'
  | 'RemoteApiError'
  | 'NetworkError'
  | 'MalformedResponse'
  | 'TemplateMissing'
  | 'WorkflowStepFailed';

export type RemoteService = 'dropbox' | 'wix' | 'mailchimp';

export abstract class NewsletterError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationMissingError extends NewsletterError {
  readonly kind = 'ConfigurationMissing';

  constructor(
    readonly variables: string[],
    message = `Missing or invalid configuration: ${variables.join(', ')}`
  ) {
    super(message);
  }
}

export class InvalidInputError extends NewsletterError {
  readonly kind = 'InvalidInput';
}

export class DocumentNotFoundError extends NewsletterError {
  readonly kind = 'DocumentNotFound';

  constructor(
    readonly folderPath: string,
    readonly reason: 'folder-missing' | 'no-match'
  ) {
    super(
      reason === 'folder-missing'
        ? `Folder not found: ${folderPath}`
        : `No newsletter PDF found in ${folderPath}`
    );
  }
}

export class AmbiguousDocumentError extends NewsletterError {
  readonly kind = 'AmbiguousDocument';

  constructor(
    readonly folderPath: string,
    readonly candidates: string[]
  ) {
    super(`Expected one newsletter PDF in ${folderPath}, found ${candidates.length}: ${candidates.join(', ')}`);
  }
}

function statusHint(status: number): string | undefined {
  if (status === 401) return 'access token expired or invalid; regenerate the credential';
  if (status === 403) return 'permission denied; check the credential scopes';
  return undefined;
}

export class RemoteApiError extends NewsletterError {
  readonly kind = 'RemoteApiError';

  constructor(
    readonly service: RemoteService,
    readonly operation: string,
    readonly status: number,
    readonly detail: string
  ) {
    const hint = statusHint(status);
    super(`${service} ${operation} failed (HTTP ${status}): ${detail}${hint ? ` (${hint})` : ''}`);
  }
}

export class NetworkError extends NewsletterError {
  readonly kind = 'NetworkError';

  constructor(
    readonly service: RemoteService,
    readonly operation: string,
    cause: unknown
  ) {
    super(
      `${service} ${operation} could not be reached: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class MalformedResponseError extends NewsletterError {
  readonly kind = 'MalformedResponse';

  constructor(
    readonly service: RemoteService,
    readonly operation: string,
    readonly issues: string
  ) {
    super(`${service} ${operation} returned an unexpected response: ${issues}`);
  }
}

export class TemplateMissingError extends NewsletterError {
  readonly kind = 'TemplateMissing';

  constructor(readonly templatePath: string) {
    super(`Template file not found: ${templatePath}`);
  }
}

export type WorkflowStep = 'locate' | 'extract' | 'publish' | 'campaign';

export class WorkflowStepError extends NewsletterError {
  readonly kind = 'WorkflowStepFailed';

  constructor(
    readonly step: WorkflowStep,
    cause: unknown
  ) {
    super(`Failed at ${step}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export function isNewsletterError(error: unknown): error is NewsletterError {
  return error instanceof NewsletterError;
}
