/**
 * Reconciler
 *
 * Diffs a bundle's desired settings and rules against the live zone and issues
 * only the writes needed to close the gap. Rules are keyed by name and kept in
 * catalog order relative to each other; live rules the catalog does not name
 * keep their place and are never written.
 */

import type { JsonValue, PolicySetting, RuleList, RuleSpec } from '../catalog/schema.js';
import { RemoteApiError } from '../errors.js';
import type {
  LiveRule,
  RemoteResourceClient,
  RulePlacement,
  SettingRef,
} from '../remote/types.js';
import { matchesDesired } from '../util/equality.js';
import { PLACEHOLDER_RULE_NAME } from './prerequisite.js';
import {
  type OperationAction,
  type OperationError,
  type OperationResult,
  type OperationTargetKind,
  toOperationError,
} from './results.js';

export interface ReconcileOptions {
  /** Read live state but issue no writes; results are marked planned */
  dryRun?: boolean;
  onResult?: (result: OperationResult) => void;
}

/**
 * How the rule list's container stands before reconciliation starts
 * - ready: it exists
 * - absent: dry run against a zone that has never had one
 * - unavailable: the prerequisite resolver gave up
 */
export type ContainerState =
  | { status: 'ready' }
  | { status: 'absent' }
  | { status: 'unavailable'; error: OperationError };

/**
 * Collects a bundle's results. An Unauthorized failure halts the bundle:
 * retrying with the same credential cannot succeed, so every later entry is
 * recorded as failed without a remote call.
 */
export class BundleLog {
  readonly results: OperationResult[] = [];
  halted?: OperationError;

  constructor(private readonly onResult?: (result: OperationResult) => void) {}

  record(result: OperationResult): void {
    this.results.push(result);
    this.onResult?.(result);
  }

  fail(target: string, targetKind: OperationTargetKind, error: OperationError): void {
    this.record({ target, targetKind, action: 'failed', error });
    if (error.kind === 'Unauthorized' && !this.halted) {
      this.halted = error;
    }
  }

  notAttempted(target: string, targetKind: OperationTargetKind, error: OperationError): void {
    this.record({ target, targetKind, action: 'failed', detail: 'not attempted', error });
  }
}

function formatValue(value: JsonValue | undefined): string {
  if (value === undefined) return 'unset';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function toSettingRef(setting: PolicySetting): SettingRef {
  return { key: setting.key, endpoint: setting.endpoint, experimental: setting.experimental };
}

export function ruleDefinitionMatches(desired: RuleSpec, live: LiveRule): boolean {
  return (
    desired.expression === live.expression &&
    desired.action === live.action &&
    desired.enabled === live.enabled &&
    matchesDesired(desired.actionParameters, live.actionParameters) &&
    matchesDesired(desired.ratelimit, live.ratelimit)
  );
}

function describePlacement(placement: RulePlacement): string {
  return 'after' in placement ? `after "${placement.after}"` : `before "${placement.before}"`;
}

interface RuleChange {
  existing: boolean;
  definitionChanged: boolean;
  placement?: RulePlacement;
  replaces?: string;
}

function describeRuleChange(change: RuleChange): string {
  const parts: string[] = [];
  if (change.existing) {
    if (change.definitionChanged) parts.push('definition changed');
    if (change.placement) parts.push(`moved ${describePlacement(change.placement)}`);
  } else {
    if (change.replaces) parts.push(`in place of "${change.replaces}"`);
    if (change.placement) parts.push(describePlacement(change.placement));
    else if (!change.replaces) parts.push('at the end');
  }
  return parts.join(', ');
}

/**
 * Where `name` has to go so that it directly follows `previous` among the
 * catalog's rules, or undefined when it already does (or, for a new rule,
 * when appending keeps catalog order). Rules the catalog does not name are
 * ignored when ranking.
 */
export function placementFor(
  order: readonly string[],
  catalogNames: ReadonlySet<string>,
  name: string,
  previous: string | undefined
): RulePlacement | undefined {
  const ranked = order.filter((n) => catalogNames.has(n));
  const at = ranked.indexOf(name);

  if (at >= 0) {
    const before = at > 0 ? ranked[at - 1] : undefined;
    if (before === previous) return undefined;
  }
  if (previous) return { after: previous };
  const first = ranked.find((n) => n !== name);
  return first ? { before: first } : undefined;
}

function removeName(order: string[], name: string | undefined): void {
  if (name === undefined) return;
  const index = order.indexOf(name);
  if (index >= 0) order.splice(index, 1);
}

/** Mirrors an upsert in the local model of the remote order */
function applyToOrder(
  order: string[],
  name: string,
  placement: RulePlacement | undefined,
  replaces: string | undefined
): void {
  const slot = replaces === undefined ? -1 : order.indexOf(replaces);
  if (!placement) {
    if (order.includes(name)) return;
    if (slot >= 0) order.splice(slot, 1, name);
    else order.push(name);
    return;
  }

  removeName(order, name);
  removeName(order, replaces);
  const anchor = 'after' in placement ? placement.after : placement.before;
  const index = order.indexOf(anchor);
  if (index < 0) order.push(name);
  else order.splice('after' in placement ? index + 1 : index, 0, name);
}

export class Reconciler {
  constructor(
    private readonly client: RemoteResourceClient,
    private readonly options: ReconcileOptions = {}
  ) {}

  createLog(): BundleLog {
    return new BundleLog(this.options.onResult);
  }

  /**
   * Settings are independent of each other; each is read, compared and, when
   * absent or different, written.
   */
  async reconcileSettings(settings: readonly PolicySetting[], log: BundleLog): Promise<void> {
    for (const setting of settings) {
      if (log.halted) {
        log.notAttempted(setting.key, 'setting', log.halted);
        continue;
      }

      const ref = toSettingRef(setting);
      let live: JsonValue | undefined;
      try {
        live = await this.client.getSetting(ref);
      } catch (error) {
        if (!(error instanceof RemoteApiError && error.kind === 'NotFound')) {
          log.fail(setting.key, 'setting', toOperationError(error));
          continue;
        }
        live = undefined;
      }

      if (live !== undefined && matchesDesired(setting.value, live)) {
        log.record({ target: setting.key, targetKind: 'setting', action: 'skipped' });
        continue;
      }

      const action: OperationAction = live === undefined ? 'created' : 'updated';
      const detail = `${formatValue(live)} → ${formatValue(setting.value)}`;

      if (this.options.dryRun) {
        log.record({ target: setting.key, targetKind: 'setting', action, planned: true, detail });
        continue;
      }

      try {
        await this.client.setSetting(ref, setting.value);
        log.record({ target: setting.key, targetKind: 'setting', action, detail });
      } catch (error) {
        log.fail(setting.key, 'setting', toOperationError(error));
      }
    }
  }

  /**
   * Rules are processed in catalog order, each placed directly after the
   * catalog rule before it. A local model of the remote order is kept in step
   * with each write so later checks stay accurate without re-reading the
   * list. A seeded placeholder is overwritten by the first rule created.
   */
  async reconcileRules(
    ruleList: RuleList,
    container: ContainerState,
    log: BundleLog
  ): Promise<void> {
    const { phase, entries } = ruleList;

    const stopAll = (error: OperationError) => {
      for (const rule of entries) log.notAttempted(rule.name, 'rule', error);
    };

    if (log.halted) return stopAll(log.halted);
    if (container.status === 'unavailable') return stopAll(container.error);

    let live: LiveRule[] = [];
    if (container.status === 'ready') {
      try {
        live = await this.client.listRules(phase);
      } catch (error) {
        const failure = toOperationError(error);
        if (failure.kind === 'Unauthorized') log.halted = failure;
        return stopAll(failure);
      }
    }

    const catalogNames = new Set(entries.map((rule) => rule.name));
    const order = live.map((rule) => rule.name);
    const byName = new Map<string, LiveRule>();
    for (const rule of live) {
      if (!byName.has(rule.name)) byName.set(rule.name, rule);
    }
    let placeholder =
      byName.has(PLACEHOLDER_RULE_NAME) && !catalogNames.has(PLACEHOLDER_RULE_NAME)
        ? PLACEHOLDER_RULE_NAME
        : undefined;
    let previous: string | undefined;

    for (const rule of entries) {
      if (log.halted) {
        log.notAttempted(rule.name, 'rule', log.halted);
        continue;
      }

      const current = byName.get(rule.name);
      const definitionChanged = current ? !ruleDefinitionMatches(rule, current) : true;
      const placement = placementFor(order, catalogNames, rule.name, previous);

      if (current && !definitionChanged && !placement) {
        log.record({ target: rule.name, targetKind: 'rule', action: 'skipped' });
        previous = rule.name;
        continue;
      }

      const replaces = current ? undefined : placeholder;
      const action: OperationAction = current ? 'updated' : 'created';
      const detail = describeRuleChange({
        existing: current !== undefined,
        definitionChanged,
        placement,
        replaces,
      });

      if (!this.options.dryRun) {
        try {
          await this.client.upsertRule(phase, rule, { placement, replaces });
        } catch (error) {
          log.fail(rule.name, 'rule', toOperationError(error));
          continue;
        }
      }

      applyToOrder(order, rule.name, placement, replaces);
      if (replaces) {
        byName.delete(replaces);
        placeholder = undefined;
      }
      byName.set(rule.name, {
        id: current?.id ?? '',
        name: rule.name,
        expression: rule.expression,
        action: rule.action,
        actionParameters: rule.actionParameters,
        ratelimit: rule.ratelimit,
        enabled: rule.enabled,
      });
      previous = rule.name;

      log.record({
        target: rule.name,
        targetKind: 'rule',
        action,
        detail,
        ...(this.options.dryRun ? { planned: true } : {}),
      });
    }
  }
}
