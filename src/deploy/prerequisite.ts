/**
 * Prerequisite resolver
 *
 * A rule list's container (ruleset) has no "create empty" call: it comes into
 * existence with the first rule written to its phase. When the zone has never
 * had one, a placeholder rule that can never match is written to instantiate
 * it, and the lookup is retried once. The reconciler then overwrites the
 * placeholder with the first rule it creates, so it holds no rule slot.
 */

import { neverMatches } from '../catalog/expression.js';
import type { PlaceholderAction, RuleList, RuleSpec } from '../catalog/schema.js';
import {
  CatalogInvalidError,
  errorKindOf,
  errorMessage,
  PrerequisiteUnavailableError,
  RuleListMissingError,
} from '../errors.js';
import type { RemoteResourceClient } from '../remote/types.js';

export const PLACEHOLDER_RULE_NAME = 'zone-baseline placeholder';

export const PLACEHOLDER_EXPRESSION =
  '(http.host eq "placeholder.invalid" and not http.host eq "placeholder.invalid")';

export interface ContainerResolution {
  rulesetId: string;
  /** The placeholder rule was written to instantiate the container */
  seeded: boolean;
}

/**
 * @throws {CatalogInvalidError} If the expression could ever match a request
 */
export function buildPlaceholderRule(
  placeholder: PlaceholderAction,
  expression: string = PLACEHOLDER_EXPRESSION
): RuleSpec {
  if (!neverMatches(expression)) {
    throw new CatalogInvalidError(
      `Placeholder expression must never match traffic: ${JSON.stringify(expression)}`
    );
  }
  return {
    name: PLACEHOLDER_RULE_NAME,
    expression,
    action: placeholder.action,
    actionParameters: placeholder.actionParameters,
    ratelimit: placeholder.ratelimit,
    enabled: true,
  };
}

function unavailable(phase: string, step: string, error: unknown): PrerequisiteUnavailableError {
  return new PrerequisiteUnavailableError(
    phase,
    errorKindOf(error),
    `Rule list ${phase} is unavailable (${step}): ${errorMessage(error)}`,
    { cause: error }
  );
}

function isNeverInstantiated(error: unknown): boolean {
  return error instanceof RuleListMissingError && error.reason === 'never-instantiated';
}

/**
 * Guarantees the container for `ruleList` exists before rules are written.
 * Writes at most one placeholder rule.
 *
 * @throws {PrerequisiteUnavailableError} When the container cannot be resolved
 */
export async function ensureContainer(
  client: RemoteResourceClient,
  ruleList: RuleList
): Promise<ContainerResolution> {
  const { phase } = ruleList;

  try {
    return { rulesetId: await client.ensureRuleList(phase), seeded: false };
  } catch (error) {
    if (!isNeverInstantiated(error)) throw unavailable(phase, 'lookup', error);
  }

  try {
    await client.upsertRule(phase, buildPlaceholderRule(ruleList.placeholder));
  } catch (error) {
    throw unavailable(phase, 'placeholder write', error);
  }

  try {
    return { rulesetId: await client.ensureRuleList(phase), seeded: true };
  } catch (error) {
    throw unavailable(phase, 'lookup after placeholder', error);
  }
}
