/**
 * Zone API client
 * Implements the Remote Resource Client contract against the v4 REST API
 */

import { z } from 'zod';
import {
  type JsonValue,
  jsonValueSchema,
  type RulePhase,
  type RuleSpec,
  type SettingEndpoint,
  type SettingValue,
} from '../catalog/schema.js';
import type { DeployConfig } from '../config/schemas.js';
import { RemoteApiError, RuleListMissingError } from '../errors.js';
import { ApiTransport, type FetchLike, type HttpMethod, type RequestEvent } from './http.js';
import type { Sleep } from './retry.js';
import type {
  LiveRule,
  RemoteResourceClient,
  RulePlacement,
  SettingRef,
  UpsertOptions,
} from './types.js';

interface SettingRoute {
  path: (key: string) => string;
  writeMethod: HttpMethod;
  read: (result: unknown) => JsonValue;
  body: (value: SettingValue) => JsonValue;
  permission: string;
  note?: string;
}

const valueResultSchema = z.object({ value: jsonValueSchema }).passthrough();
const statusResultSchema = z.object({ status: jsonValueSchema }).passthrough();
const objectResultSchema = z.record(z.string(), jsonValueSchema);

/**
 * `pending` means activation was requested and the registrar has yet to
 * publish the DS record; writing `active` again changes nothing.
 */
function readDnssecStatus(status: JsonValue): JsonValue {
  return status === 'pending' ? 'active' : status;
}

const SETTING_ROUTES: Record<SettingEndpoint, SettingRoute> = {
  zone_setting: {
    path: (key) => `/settings/${encodeURIComponent(key)}`,
    writeMethod: 'PATCH',
    read: (result) => valueResultSchema.parse(result).value,
    body: (value) => ({ value }),
    permission: 'Zone > Settings > Edit',
  },
  dnssec: {
    path: () => '/dnssec',
    writeMethod: 'PATCH',
    read: (result) => readDnssecStatus(statusResultSchema.parse(result).status),
    body: (value) => ({ status: value }),
    permission: 'Zone > DNS > Edit',
    note: 'DNSSEC can fail if the registrar does not support it or has not been configured yet.',
  },
  page_shield: {
    path: () => '/page_shield',
    writeMethod: 'PUT',
    read: (result) => objectResultSchema.parse(result),
    body: (value) => value,
    permission: 'Zone > Page Shield > Edit',
  },
  bot_management: {
    path: () => '/bot_management',
    writeMethod: 'PUT',
    read: (result) => objectResultSchema.parse(result),
    body: (value) => value,
    permission: 'Zone > Bot Management > Edit',
  },
};

const rulesetSummarySchema = z
  .object({
    id: z.string(),
    kind: z.string().optional(),
    phase: z.string().optional(),
  })
  .passthrough();

const apiRuleSchema = z
  .object({
    id: z.string(),
    description: z.string().optional(),
    expression: z.string().default(''),
    action: z.string().default(''),
    action_parameters: z.record(z.string(), jsonValueSchema).optional(),
    ratelimit: z.record(z.string(), jsonValueSchema).optional(),
    enabled: z.boolean().default(true),
  })
  .passthrough();

const rulesetSchema = z
  .object({
    id: z.string(),
    rules: z.array(apiRuleSchema).default([]),
  })
  .passthrough();

export const PLACEHOLDER_RULESET_NAME = 'zone-baseline entrypoint';

function toLiveRule(rule: z.infer<typeof apiRuleSchema>): LiveRule {
  return {
    id: rule.id,
    name: rule.description ?? '',
    expression: rule.expression,
    action: rule.action,
    actionParameters: rule.action_parameters,
    ratelimit: rule.ratelimit,
    enabled: rule.enabled,
  };
}

function compact(record: Record<string, JsonValue | undefined>): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function toApiRule(rule: RuleSpec): Record<string, JsonValue> {
  const body: Record<string, JsonValue> = {
    description: rule.name,
    expression: rule.expression,
    action: rule.action,
    enabled: rule.enabled,
  };
  if (rule.actionParameters) body.action_parameters = rule.actionParameters;
  if (rule.ratelimit) body.ratelimit = compact(rule.ratelimit);
  return body;
}

function toApiPosition(
  phase: RulePhase,
  placement: RulePlacement,
  ruleIds: Map<string, string>
): Record<string, JsonValue> {
  const relation = 'after' in placement ? 'after' : 'before';
  const anchor = 'after' in placement ? placement.after : placement.before;
  const anchorId = ruleIds.get(anchor);
  if (!anchorId) {
    throw new RemoteApiError(
      'RemoteRejected',
      `Cannot place a rule ${relation} "${anchor}": no such rule in ${phase}`
    );
  }
  return { [relation]: anchorId };
}

export interface ZoneClientExtras {
  fetch?: FetchLike;
  sleep?: Sleep;
  onRequest?: (event: RequestEvent) => void;
}

export class ZoneClient implements RemoteResourceClient {
  private readonly rulesetIds = new Map<RulePhase, string>();
  /** name → rule id per phase, refreshed from every list and write response */
  private readonly ruleIds = new Map<RulePhase, Map<string, string>>();

  constructor(
    private readonly transport: ApiTransport,
    private readonly zoneId: string
  ) {}

  static fromConfig(config: DeployConfig, extras: ZoneClientExtras = {}): ZoneClient {
    const transport = new ApiTransport({
      baseUrl: config.apiBaseUrl,
      token: config.apiToken,
      timeoutMs: config.timeoutMs,
      retry: config.retry,
      ...extras,
    });
    return new ZoneClient(transport, config.zoneId);
  }

  private zonePath(path: string): string {
    return `/zones/${encodeURIComponent(this.zoneId)}${path}`;
  }

  async getSetting(setting: SettingRef): Promise<JsonValue> {
    const route = SETTING_ROUTES[setting.endpoint];
    const result = await this.transport.request('GET', this.zonePath(route.path(setting.key)));
    return route.read(result);
  }

  async setSetting(setting: SettingRef, value: SettingValue): Promise<void> {
    const route = SETTING_ROUTES[setting.endpoint];
    try {
      await this.transport.request(route.writeMethod, this.zonePath(route.path(setting.key)), {
        body: route.body(value),
        retry: setting.experimental !== true,
      });
    } catch (error) {
      if (!(error instanceof RemoteApiError)) throw error;
      switch (error.kind) {
        case 'NotFound':
          throw error.reclassify(
            'RemoteRejected',
            `Setting ${setting.key} may not be available on the zone's current plan.`
          );
        case 'Unauthorized':
          throw error.reclassify(
            'Unauthorized',
            `Check the API token permissions (required: ${route.permission}).`
          );
        case 'Transient':
          if (setting.experimental) {
            throw error.reclassify(
              'RemoteRejected',
              'Experimental setting; failures are not retried.'
            );
          }
          throw error;
        default:
          throw route.note ? error.reclassify(error.kind, route.note) : error;
      }
    }
  }

  async listRules(phase: RulePhase): Promise<LiveRule[]> {
    let result: unknown;
    try {
      result = await this.transport.request(
        'GET',
        this.zonePath(`/rulesets/phases/${phase}/entrypoint`)
      );
    } catch (error) {
      if (error instanceof RemoteApiError && error.kind === 'NotFound') {
        this.forget(phase);
        throw new RuleListMissingError(phase, 'not-found', error.details);
      }
      throw error;
    }
    const ruleset = rulesetSchema.parse(result);
    this.remember(phase, ruleset);
    return ruleset.rules.map(toLiveRule);
  }

  async ensureRuleList(phase: RulePhase): Promise<string> {
    const known = this.rulesetIds.get(phase);
    if (known) return known;

    let rulesetId: string | undefined;
    try {
      rulesetId = await this.findRulesetId(phase);
    } catch (error) {
      if (error instanceof RemoteApiError && error.details.status === 403) {
        throw error.reclassify(
          'CreationDenied',
          'Check the API token permissions (required: Zone > Zone WAF > Edit).'
        );
      }
      throw error;
    }

    if (!rulesetId) {
      throw new RuleListMissingError(phase, 'never-instantiated');
    }
    this.rulesetIds.set(phase, rulesetId);
    return rulesetId;
  }

  async upsertRule(phase: RulePhase, rule: RuleSpec, options: UpsertOptions = {}): Promise<void> {
    const rulesetId = this.rulesetIds.get(phase) ?? (await this.findRulesetId(phase));

    if (!rulesetId) {
      // First write into a phase instantiates its entrypoint ruleset.
      const result = await this.transport.request(
        'PUT',
        this.zonePath(`/rulesets/phases/${phase}/entrypoint`),
        { body: { name: PLACEHOLDER_RULESET_NAME, rules: [toApiRule(rule)] } }
      );
      this.remember(phase, rulesetSchema.parse(result));
      return;
    }

    const ruleIds = this.ruleIds.get(phase) ?? (await this.refreshRuleIds(phase));
    const existingId =
      ruleIds.get(rule.name) ?? (options.replaces ? ruleIds.get(options.replaces) : undefined);
    const body: Record<string, JsonValue> = toApiRule(rule);
    if (options.placement) body.position = toApiPosition(phase, options.placement, ruleIds);

    const path = existingId
      ? `/rulesets/${rulesetId}/rules/${existingId}`
      : `/rulesets/${rulesetId}/rules`;

    let result: unknown;
    try {
      // Creates are sent once: a POST that timed out may still have landed.
      result = await this.transport.request(existingId ? 'PATCH' : 'POST', this.zonePath(path), {
        body,
        retry: existingId !== undefined,
      });
    } catch (error) {
      if (error instanceof RemoteApiError && error.kind === 'NotFound') {
        this.forget(phase);
        throw new RuleListMissingError(phase, 'not-found', error.details);
      }
      throw error;
    }
    this.remember(phase, rulesetSchema.parse(result));
  }

  private async findRulesetId(phase: RulePhase): Promise<string | undefined> {
    const result = await this.transport.request('GET', this.zonePath('/rulesets'));
    const rulesets = z.array(rulesetSummarySchema).parse(result ?? []);
    return rulesets.find((r) => r.kind === 'zone' && r.phase === phase)?.id;
  }

  private async refreshRuleIds(phase: RulePhase): Promise<Map<string, string>> {
    await this.listRules(phase);
    return this.ruleIds.get(phase) ?? new Map();
  }

  private remember(phase: RulePhase, ruleset: z.infer<typeof rulesetSchema>): void {
    this.rulesetIds.set(phase, ruleset.id);
    const ids = new Map<string, string>();
    for (const rule of ruleset.rules) {
      if (rule.description && !ids.has(rule.description)) ids.set(rule.description, rule.id);
    }
    this.ruleIds.set(phase, ids);
  }

  private forget(phase: RulePhase): void {
    this.rulesetIds.delete(phase);
    this.ruleIds.delete(phase);
  }
}
