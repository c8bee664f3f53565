/**
 * Deployment runner
 *
 * Drives the requested bundles through Resolving → Reconciling, one at a
 * time and in the requested order, then summarises. A bundle's failure is
 * recorded against that bundle only; the run always reaches Done.
 */

import type {
  Bundle,
  Catalog,
  JsonValue,
  RulePhase,
  RuleSpec,
  SettingValue,
} from '../catalog/schema.js';
import { selectBundles } from '../catalog/loader.js';
import type { DeployConfig } from '../config/schemas.js';
import { type ErrorKind, errorKindOf, PrerequisiteUnavailableError } from '../errors.js';
import type { RequestEvent } from '../remote/http.js';
import type {
  LiveRule,
  RemoteResourceClient,
  SettingRef,
  UpsertOptions,
} from '../remote/types.js';
import { ZoneClient, type ZoneClientExtras } from '../remote/zone-client.js';
import { BundleLog, type ContainerState, Reconciler } from './reconciler.js';
import { ensureContainer } from './prerequisite.js';
import {
  type BundleOutcome,
  bundleStatus,
  type DeploymentSummary,
  type OperationError,
  type OperationResult,
  summarize,
  toOperationError,
} from './results.js';

export type RunnerState =
  | { phase: 'Idle' }
  | { phase: 'Resolving'; bundleId: string }
  | { phase: 'Reconciling'; bundleId: string }
  | { phase: 'Summarizing' }
  | { phase: 'Done' };

export interface DeploymentReporter {
  onStateChange?(state: RunnerState): void;
  onBundleStart?(bundle: Bundle, index: number, total: number): void;
  onResult?(bundle: Bundle, result: OperationResult): void;
  onBundleEnd?(outcome: BundleOutcome): void;
  /** One line per HTTP attempt; only wired when the runner builds its own client */
  onRequest?(event: RequestEvent): void;
}

export interface DeploymentRunnerOptions {
  client: RemoteResourceClient;
  catalog: Catalog;
  reporter?: DeploymentReporter;
  dryRun?: boolean;
}

/**
 * Remembers how the first remote call of the run went. A credential rejected
 * on that call is rejected for the whole run.
 */
class FirstCallProbe implements RemoteResourceClient {
  private calls = 0;
  firstFailure?: ErrorKind;

  constructor(private readonly inner: RemoteResourceClient) {}

  private async observe<T>(operation: () => Promise<T>): Promise<T> {
    const first = this.calls === 0;
    this.calls += 1;
    try {
      return await operation();
    } catch (error) {
      if (first) this.firstFailure = errorKindOf(error);
      throw error;
    }
  }

  getSetting(setting: SettingRef): Promise<JsonValue> {
    return this.observe(() => this.inner.getSetting(setting));
  }

  setSetting(setting: SettingRef, value: SettingValue): Promise<void> {
    return this.observe(() => this.inner.setSetting(setting, value));
  }

  listRules(phase: RulePhase): Promise<LiveRule[]> {
    return this.observe(() => this.inner.listRules(phase));
  }

  upsertRule(phase: RulePhase, rule: RuleSpec, options?: UpsertOptions): Promise<void> {
    return this.observe(() => this.inner.upsertRule(phase, rule, options));
  }

  ensureRuleList(phase: RulePhase): Promise<string> {
    return this.observe(() => this.inner.ensureRuleList(phase));
  }
}

export class DeploymentRunner {
  private currentState: RunnerState = { phase: 'Idle' };
  private readonly catalog: Catalog;
  private readonly client: RemoteResourceClient;
  private readonly reporter: DeploymentReporter;
  private readonly dryRun: boolean;

  constructor(options: DeploymentRunnerOptions) {
    this.catalog = options.catalog;
    this.client = options.client;
    this.reporter = options.reporter ?? {};
    this.dryRun = options.dryRun === true;
  }

  /**
   * Builds a runner that talks to the zone named in `config`
   */
  static fromConfig(
    config: DeployConfig,
    catalog: Catalog,
    options: { reporter?: DeploymentReporter; dryRun?: boolean; client?: ZoneClientExtras } = {}
  ): DeploymentRunner {
    const { reporter } = options;
    const onRequest = reporter?.onRequest
      ? (event: RequestEvent) => reporter.onRequest?.(event)
      : undefined;
    return new DeploymentRunner({
      client: ZoneClient.fromConfig(config, { onRequest, ...options.client }),
      catalog,
      reporter: options.reporter,
      dryRun: options.dryRun,
    });
  }

  get state(): RunnerState {
    return this.currentState;
  }

  private transition(state: RunnerState): void {
    this.currentState = state;
    this.reporter.onStateChange?.(state);
  }

  /**
   * Applies the given bundles, or every bundle for 'all'
   *
   * @throws {CatalogInvalidError} Only for unknown bundle ids, before anything runs
   */
  async run(selection: readonly string[] | 'all'): Promise<DeploymentSummary> {
    const bundles =
      selection === 'all' ? [...this.catalog.bundles] : selectBundles(this.catalog, selection);
    const probe = new FirstCallProbe(this.client);
    const outcomes: BundleOutcome[] = [];
    let revoked: OperationError | undefined;

    for (const [index, bundle] of bundles.entries()) {
      this.reporter.onBundleStart?.(bundle, index, bundles.length);
      const outcome = revoked
        ? this.revokedOutcome(bundle, revoked)
        : await this.runBundle(bundle, probe);
      outcomes.push(outcome);
      this.reporter.onBundleEnd?.(outcome);

      if (!revoked && probe.firstFailure === 'Unauthorized') {
        revoked = {
          kind: 'Unauthorized',
          message: 'The API token was rejected on the first call of the run',
        };
      }
    }

    this.transition({ phase: 'Summarizing' });
    const summary = summarize(outcomes, this.dryRun);
    this.transition({ phase: 'Done' });
    return summary;
  }

  private async runBundle(bundle: Bundle, client: RemoteResourceClient): Promise<BundleOutcome> {
    const reconciler = new Reconciler(client, {
      dryRun: this.dryRun,
      onResult: (result) => this.reporter.onResult?.(bundle, result),
    });
    const log = reconciler.createLog();
    let bundleError: OperationError | undefined;

    try {
      this.transition({ phase: 'Resolving', bundleId: bundle.id });
      let container: ContainerState | undefined;
      if (bundle.rules) {
        container = await this.resolveContainer(client, bundle, log);
        if (container.status === 'unavailable') bundleError = container.error;
      }

      this.transition({ phase: 'Reconciling', bundleId: bundle.id });
      await reconciler.reconcileSettings(bundle.settings, log);
      if (bundle.rules && container) {
        await reconciler.reconcileRules(bundle.rules, container, log);
      }
    } catch (error) {
      bundleError = toOperationError(error);
    }

    return {
      bundleId: bundle.id,
      bundleName: bundle.name,
      status: bundleStatus(log.results, bundleError),
      results: log.results,
      ...(bundleError ? { error: bundleError } : {}),
    };
  }

  private async resolveContainer(
    client: RemoteResourceClient,
    bundle: Bundle,
    log: BundleLog
  ): Promise<ContainerState> {
    const ruleList = bundle.rules;
    if (!ruleList) return { status: 'ready' };
    const target = `${ruleList.phase} ruleset`;

    if (this.dryRun) {
      try {
        await client.ensureRuleList(ruleList.phase);
        return { status: 'ready' };
      } catch (error) {
        const failure = toOperationError(error);
        if (failure.kind === 'ListMissing') {
          log.record({
            target,
            targetKind: 'prerequisite',
            action: 'created',
            planned: true,
            detail: 'container would be instantiated with a placeholder rule',
          });
          return { status: 'absent' };
        }
        log.fail(target, 'prerequisite', failure);
        return { status: 'unavailable', error: failure };
      }
    }

    try {
      const resolution = await ensureContainer(client, ruleList);
      if (resolution.seeded) {
        log.record({
          target,
          targetKind: 'prerequisite',
          action: 'created',
          detail: 'instantiated with a placeholder rule',
        });
      }
      return { status: 'ready' };
    } catch (error) {
      const failure =
        error instanceof PrerequisiteUnavailableError
          ? { kind: error.kind, message: error.message }
          : toOperationError(error);
      log.fail(target, 'prerequisite', failure);
      if (error instanceof PrerequisiteUnavailableError && error.causeKind === 'Unauthorized') {
        log.halted = { kind: 'Unauthorized', message: error.message };
      }
      return { status: 'unavailable', error: failure };
    }
  }

  private revokedOutcome(bundle: Bundle, error: OperationError): BundleOutcome {
    const log = new BundleLog((result) => this.reporter.onResult?.(bundle, result));
    for (const setting of bundle.settings) log.notAttempted(setting.key, 'setting', error);
    for (const rule of bundle.rules?.entries ?? []) log.notAttempted(rule.name, 'rule', error);
    return {
      bundleId: bundle.id,
      bundleName: bundle.name,
      status: 'failed',
      results: log.results,
      error,
    };
  }
}
