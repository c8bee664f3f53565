/**
 * Policy catalog loader
 * Parses the baseline TOML, validates it and freezes the result
 */

import fs from 'node:fs';
import { parse } from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { getDefaultCatalogPath } from '../config/paths.js';
import { CatalogInvalidError } from '../errors.js';
import { findExpressionProblem } from './expression.js';
import {
  type Bundle,
  type Catalog,
  catalogSchema,
  RESERVED_BUNDLE_IDS,
  type SettingEndpoint,
} from './schema.js';

/** Endpoints whose whole body is the setting value */
const OBJECT_ENDPOINTS: ReadonlySet<SettingEndpoint> = new Set<SettingEndpoint>([
  'page_shield',
  'bot_management',
]);

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}

/**
 * Semantic checks the schema cannot express. Returns one message per problem.
 */
export function validateCatalog(catalog: Catalog): string[] {
  const issues: string[] = [];

  for (const id of findDuplicates(catalog.bundles.map((b) => b.id))) {
    issues.push(`duplicate bundle id "${id}"`);
  }

  const phaseOwners = new Map<string, string>();

  for (const bundle of catalog.bundles) {
    const where = `bundle "${bundle.id}"`;

    if (RESERVED_BUNDLE_IDS.some((reserved) => reserved === bundle.id)) {
      issues.push(`${where}: "${bundle.id}" is reserved by the operator menu`);
    }
    if (bundle.settings.length === 0 && !bundle.rules) {
      issues.push(`${where}: declares neither settings nor rules`);
    }
    for (const key of findDuplicates(bundle.settings.map((s) => s.key))) {
      issues.push(`${where}: duplicate setting key "${key}"`);
    }
    for (const setting of bundle.settings) {
      const isTable = typeof setting.value === 'object';
      if (isTable !== OBJECT_ENDPOINTS.has(setting.endpoint)) {
        const expected = isTable ? 'a scalar value' : 'a table value';
        issues.push(
          `${where}: setting "${setting.key}" on endpoint ${setting.endpoint} needs ${expected}`
        );
      }
    }

    if (!bundle.rules) continue;

    const { phase, entries } = bundle.rules;
    const owner = phaseOwners.get(phase);
    if (owner) {
      issues.push(`${where}: phase ${phase} is already managed by bundle "${owner}"`);
    } else {
      phaseOwners.set(phase, bundle.id);
    }

    for (const name of findDuplicates(entries.map((r) => r.name))) {
      issues.push(`${where}: duplicate rule name "${name}"`);
    }
    for (const rule of entries) {
      const problem = findExpressionProblem(rule.expression);
      if (problem) {
        issues.push(`${where}: rule "${rule.name}" has a malformed expression (${problem})`);
      }
      if (phase === 'http_ratelimit' && !rule.ratelimit) {
        issues.push(`${where}: rate limiting rule "${rule.name}" needs a [ratelimit] table`);
      }
    }
  }

  return issues;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates an already-parsed catalog document
 *
 * @throws {CatalogInvalidError} On schema violations or semantic problems
 */
export function parseCatalog(document: unknown, source = 'catalog'): Catalog {
  const result = catalogSchema.safeParse(document);
  if (!result.success) {
    throw new CatalogInvalidError(
      `Invalid catalog ${source}`,
      result.error.issues.map(formatIssue)
    );
  }

  const issues = validateCatalog(result.data);
  if (issues.length > 0) {
    throw new CatalogInvalidError(`Invalid catalog ${source}`, issues);
  }

  return deepFreeze(result.data);
}

/**
 * Loads the policy catalog from TOML (the shipped baseline by default)
 *
 * @throws {CatalogInvalidError} If the file is missing, unparsable or invalid
 */
export function loadCatalog(catalogPath: string = getDefaultCatalogPath()): Catalog {
  let document: unknown;
  try {
    document = parse(fs.readFileSync(catalogPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogInvalidError(`Failed to read catalog from ${catalogPath}: ${reason}`);
  }
  return parseCatalog(document, catalogPath);
}

/**
 * Resolves bundle ids against the catalog, preserving the requested order
 *
 * @throws {CatalogInvalidError} If any id is unknown
 */
export function selectBundles(catalog: Catalog, ids: readonly string[]): Bundle[] {
  const byId = new Map(catalog.bundles.map((bundle) => [bundle.id, bundle]));
  const unknown = ids.filter((id) => !byId.has(id));
  if (unknown.length > 0) {
    throw new CatalogInvalidError(
      `Unknown bundle(s): ${unknown.join(', ')}. Available: ${[...byId.keys()].join(', ')}`
    );
  }
  const selected: Bundle[] = [];
  for (const id of ids) {
    const bundle = byId.get(id);
    if (bundle && !selected.includes(bundle)) selected.push(bundle);
  }
  return selected;
}
