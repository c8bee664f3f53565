import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const scalarValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const settingValueSchema = z.union([
  scalarValueSchema,
  z.record(z.string(), scalarValueSchema),
]);

export const SETTING_ENDPOINTS = ['zone_setting', 'dnssec', 'page_shield', 'bot_management'] as const;

export const RULE_PHASES = [
  'http_request_firewall_custom',
  'http_ratelimit',
  'http_request_cache_settings',
] as const;

export const RULE_ACTIONS = [
  'block',
  'challenge',
  'js_challenge',
  'managed_challenge',
  'log',
  'skip',
  'set_cache_settings',
  'set_config',
] as const;

/** Words the operator menu reserves; no bundle may use them as an id. */
export const RESERVED_BUNDLE_IDS = ['all', 'quit'] as const;

/**
 * One entry of an ordered remote rule list. `name` is its identity (sent as the
 * rule description); its priority is its index in the list, never stored.
 */
export interface RuleSpec {
  name: string;
  expression: string;
  action: RuleAction;
  actionParameters?: Record<string, JsonValue>;
  ratelimit?: RateLimitParameters;
  enabled: boolean;
}

/** Inert action used when seeding a rule list that has never been instantiated */
export interface PlaceholderAction {
  action: RuleAction;
  actionParameters?: Record<string, JsonValue>;
  ratelimit?: RateLimitParameters;
}

export const policySettingSchema = z
  .object({
    key: z.string().trim().min(1),
    label: z.string().trim().min(1).optional(),
    endpoint: z.enum(SETTING_ENDPOINTS).default('zone_setting'),
    value: settingValueSchema,
    experimental: z.boolean().default(false),
  })
  .strict();

export const ratelimitSchema = z
  .object({
    characteristics: z.array(z.string().trim().min(1)).min(1),
    period: z.number().int().positive(),
    requests_per_period: z.number().int().positive(),
    mitigation_timeout: z.number().int().min(0),
    counting_expression: z.string().optional(),
    requests_to_origin: z.boolean().optional(),
  })
  .strict();

export const ruleSpecSchema = z
  .object({
    name: z.string().trim().min(1),
    expression: z.string(),
    action: z.enum(RULE_ACTIONS),
    action_parameters: z.record(z.string(), jsonValueSchema).optional(),
    ratelimit: ratelimitSchema.optional(),
    enabled: z.boolean().default(true),
  })
  .strict()
  .transform(
    ({ action_parameters, ...rest }): RuleSpec => ({
      ...rest,
      actionParameters: action_parameters,
    })
  );

export const placeholderSchema = z
  .object({
    action: z.enum(RULE_ACTIONS),
    action_parameters: z.record(z.string(), jsonValueSchema).optional(),
    ratelimit: ratelimitSchema.optional(),
  })
  .strict()
  .transform(
    ({ action_parameters, ...rest }): PlaceholderAction => ({
      ...rest,
      actionParameters: action_parameters,
    })
  );

export const ruleListSchema = z
  .object({
    phase: z.enum(RULE_PHASES),
    placeholder: placeholderSchema,
    entries: z.array(ruleSpecSchema).min(1),
  })
  .strict();

export const bundleSchema = z
  .object({
    id: z
      .string()
      .regex(/^[a-z0-9][a-z0-9-]*$/, 'bundle id must be lowercase letters, digits and dashes'),
    name: z.string().trim().min(1),
    description: z.string().trim().min(1).optional(),
    settings: z.array(policySettingSchema).default([]),
    rules: ruleListSchema.optional(),
  })
  .strict();

export const catalogSchema = z
  .object({
    bundles: z.array(bundleSchema).min(1),
  })
  .strict();

export type SettingValue = z.infer<typeof settingValueSchema>;
export type SettingEndpoint = (typeof SETTING_ENDPOINTS)[number];
export type RulePhase = (typeof RULE_PHASES)[number];
export type RuleAction = (typeof RULE_ACTIONS)[number];
export type PolicySetting = z.infer<typeof policySettingSchema>;
export type RateLimitParameters = z.infer<typeof ratelimitSchema>;
export type RuleList = z.infer<typeof ruleListSchema>;
export type Bundle = z.infer<typeof bundleSchema>;
export type Catalog = z.infer<typeof catalogSchema>;
