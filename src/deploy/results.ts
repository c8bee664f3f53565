import { type ErrorKind, errorKindOf, errorMessage, RemoteApiError } from '../errors.js';

export type OperationAction = 'created' | 'updated' | 'skipped' | 'failed';

export type OperationTargetKind = 'setting' | 'rule' | 'prerequisite';

export interface OperationError {
  kind: ErrorKind;
  message: string;
  hint?: string;
}

export interface OperationResult {
  target: string;
  targetKind: OperationTargetKind;
  action: OperationAction;
  /** Dry run: the action that would have been taken */
  planned?: boolean;
  detail?: string;
  error?: OperationError;
}

export type BundleStatus = 'applied' | 'unchanged' | 'failed';

export interface BundleOutcome {
  bundleId: string;
  bundleName: string;
  status: BundleStatus;
  results: OperationResult[];
  /** Failure that stopped the bundle as a whole, if any */
  error?: OperationError;
}

export type ActionTotals = Record<OperationAction, number>;

export interface FailedBundle {
  bundleId: string;
  bundleName: string;
  errorKinds: ErrorKind[];
}

export interface DeploymentSummary {
  dryRun: boolean;
  bundles: BundleOutcome[];
  totals: ActionTotals;
  failedBundles: FailedBundle[];
  /** At least one entry was (or, in a dry run, would be) created or updated */
  changed: boolean;
  /** At least one entry or bundle failed */
  failed: boolean;
}

export function toOperationError(error: unknown): OperationError {
  const hint = error instanceof RemoteApiError ? error.details.hint : undefined;
  return hint
    ? { kind: errorKindOf(error), message: errorMessage(error), hint }
    : { kind: errorKindOf(error), message: errorMessage(error) };
}

export function countActions(results: readonly OperationResult[]): ActionTotals {
  const totals: ActionTotals = { created: 0, updated: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    totals[result.action] += 1;
  }
  return totals;
}

export function bundleStatus(
  results: readonly OperationResult[],
  error?: OperationError
): BundleStatus {
  if (error || results.some((r) => r.action === 'failed')) return 'failed';
  if (results.every((r) => r.action === 'skipped')) return 'unchanged';
  return 'applied';
}

function uniqueKinds(outcome: BundleOutcome): ErrorKind[] {
  const kinds = new Set<ErrorKind>();
  if (outcome.error) kinds.add(outcome.error.kind);
  for (const result of outcome.results) {
    if (result.error) kinds.add(result.error.kind);
  }
  return [...kinds];
}

export function summarize(outcomes: BundleOutcome[], dryRun = false): DeploymentSummary {
  const totals = countActions(outcomes.flatMap((o) => o.results));
  const failedBundles = outcomes
    .filter((o) => o.status === 'failed')
    .map((o) => ({ bundleId: o.bundleId, bundleName: o.bundleName, errorKinds: uniqueKinds(o) }));

  return {
    dryRun,
    bundles: outcomes,
    totals,
    failedBundles,
    changed: totals.created + totals.updated > 0,
    failed: failedBundles.length > 0,
  };
}
