/**
 * Remote Resource Client contract
 * The reconciler and the prerequisite resolver only ever talk to the zone
 * through this interface; each mutating call issues exactly one remote write.
 */

import type {
  JsonValue,
  RulePhase,
  RuleSpec,
  SettingEndpoint,
  SettingValue,
} from '../catalog/schema.js';

export interface SettingRef {
  key: string;
  endpoint: SettingEndpoint;
  /** Never retried; transient failures are reported as rejections */
  experimental?: boolean;
}

/** A rule as it currently exists in a remote rule list */
export interface LiveRule {
  id: string;
  /** The rule description, which the catalog uses as the rule's name */
  name: string;
  expression: string;
  action: string;
  actionParameters?: Record<string, JsonValue>;
  ratelimit?: Record<string, unknown>;
  enabled: boolean;
}

/** Where a rule goes relative to another rule of the same list, by name */
export type RulePlacement = { after: string } | { before: string };

export interface UpsertOptions {
  /**
   * Omitted: an existing rule keeps its place and a new one is appended
   */
  placement?: RulePlacement;
  /** Name of a live rule to overwrite in place when `rule` does not exist yet */
  replaces?: string;
}

export interface RemoteResourceClient {
  /** @throws {RemoteApiError} NotFound when the setting does not exist for the zone */
  getSetting(setting: SettingRef): Promise<JsonValue>;

  /** @throws {RemoteApiError} RemoteRejected, Unauthorized or Transient */
  setSetting(setting: SettingRef, value: SettingValue): Promise<void>;

  /**
   * Rules of the phase's list in remote order
   * @throws {RuleListMissingError}
   */
  listRules(phase: RulePhase): Promise<LiveRule[]>;

  /**
   * Creates the rule, or overwrites the rule with the same name. Writing into
   * a phase with no container creates the container with just this rule.
   */
  upsertRule(phase: RulePhase, rule: RuleSpec, options?: UpsertOptions): Promise<void>;

  /**
   * Resolves the ruleset id that holds the phase's rules
   * @throws {RuleListMissingError} `never-instantiated` when the zone has none
   * @throws {RemoteApiError} CreationDenied or Transient
   */
  ensureRuleList(phase: RulePhase): Promise<string>;
}
