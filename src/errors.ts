/**
 * Error taxonomy for zone-baseline
 *
 * Every error the core raises carries a `kind` so results and summaries can
 * report it without inspecting messages. Only ConfigInvalid and CatalogInvalid
 * are fatal; everything else is scoped to an entry or a bundle.
 */

export type ErrorKind =
  | 'ConfigInvalid'
  | 'CatalogInvalid'
  | 'PrerequisiteUnavailable'
  | 'RemoteRejected'
  | 'Unauthorized'
  | 'Transient'
  | 'NotFound'
  | 'ListMissing'
  | 'CreationDenied';

export type RemoteErrorKind = Exclude<
  ErrorKind,
  'ConfigInvalid' | 'CatalogInvalid' | 'PrerequisiteUnavailable'
>;

export abstract class ZoneBaselineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigInvalidError extends ZoneBaselineError {
  readonly kind = 'ConfigInvalid' as const;
}

export class CatalogInvalidError extends ZoneBaselineError {
  readonly kind = 'CatalogInvalid' as const;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
  }
}

export interface RemoteErrorDetails {
  status?: number;
  method?: string;
  path?: string;
  /** Error messages from the API envelope, if any */
  apiErrors?: string[];
  hint?: string;
}

export class RemoteApiError extends ZoneBaselineError {
  readonly kind: RemoteErrorKind;
  readonly details: RemoteErrorDetails;

  constructor(
    kind: RemoteErrorKind,
    message: string,
    details: RemoteErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.kind = kind;
    this.details = details;
  }

  get retryable(): boolean {
    return this.kind === 'Transient';
  }

  /** Same failure under another kind; used when a caller knows better than the status code. */
  reclassify(kind: RemoteErrorKind, hint?: string): RemoteApiError {
    return new RemoteApiError(
      kind,
      this.message,
      { ...this.details, hint: hint ?? this.details.hint },
      { cause: this }
    );
  }
}

export type RuleListMissingReason = 'never-instantiated' | 'not-found';

/**
 * The ruleset for a phase does not exist. `never-instantiated` means the zone
 * has no container for the phase at all, which is what the placeholder
 * workaround repairs.
 */
export class RuleListMissingError extends RemoteApiError {
  constructor(
    readonly phase: string,
    readonly reason: RuleListMissingReason,
    details: RemoteErrorDetails = {}
  ) {
    super(
      'ListMissing',
      reason === 'never-instantiated'
        ? `No ${phase} ruleset has been instantiated for this zone`
        : `Ruleset for phase ${phase} was not found`,
      details
    );
  }
}

export class PrerequisiteUnavailableError extends ZoneBaselineError {
  readonly kind = 'PrerequisiteUnavailable' as const;

  constructor(
    readonly phase: string,
    readonly causeKind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isFatalError(error: unknown): error is ConfigInvalidError | CatalogInvalidError {
  return error instanceof ConfigInvalidError || error instanceof CatalogInvalidError;
}

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof ZoneBaselineError) return error.kind;
  return 'RemoteRejected';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
