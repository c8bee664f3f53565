import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { RuleSpec } from '../src/catalog/schema.js';
import type { DeployConfig } from '../src/config/schemas.js';
import { RemoteApiError, RuleListMissingError } from '../src/errors.js';
import { kindForStatus } from '../src/remote/http.js';
import { PLACEHOLDER_RULESET_NAME, toApiRule, ZoneClient } from '../src/remote/zone-client.js';
import {
  apiFailure,
  createFakeFetch,
  envelope,
  type FakeHandler,
  type FakeReply,
  type RecordedRequest,
} from './helpers/fake-fetch.js';

const BASE = 'https://api.test/client/v4';
const ZONE = '/zones/zone-1';

const config: DeployConfig = {
  apiToken: 'test-secret',
  zoneId: 'zone-1',
  apiBaseUrl: BASE,
  timeoutMs: 1000,
  retry: { attempts: 3, baseDelayMs: 50 },
};

const blockRule: RuleSpec = {
  name: 'Block Scanners',
  expression: '(http.user_agent contains "sqlmap")',
  action: 'block',
  enabled: true,
};

/** Routes "METHOD /path" (path relative to the zone) to replies, in order per route */
function routes(table: Record<string, Array<FakeReply | Error>>): FakeHandler {
  const used = new Map<string, number>();
  return (request: RecordedRequest) => {
    const key = `${request.method} ${request.url.slice(BASE.length + ZONE.length)}`;
    const replies = table[key];
    if (!replies) return { status: 599, body: apiFailure(0, `unrouted ${key}`) };
    const index = used.get(key) ?? 0;
    used.set(key, index + 1);
    return replies[Math.min(index, replies.length - 1)];
  };
}

function setup(table: Record<string, Array<FakeReply | Error>>) {
  const { fetch, requests } = createFakeFetch(routes(table));
  const delays: number[] = [];
  const client = ZoneClient.fromConfig(config, {
    fetch,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  const calls = () => requests.map((r) => `${r.method} ${r.url.slice(BASE.length)}`);
  return { client, requests, delays, calls };
}

const ruleset = (rules: unknown[]) =>
  envelope({ id: 'rs-1', kind: 'zone', phase: 'http_request_firewall_custom', rules });

test('status codes map to error kinds', () => {
  assert.equal(kindForStatus(401), 'Unauthorized');
  assert.equal(kindForStatus(403), 'Unauthorized');
  assert.equal(kindForStatus(404), 'NotFound');
  assert.equal(kindForStatus(429), 'Transient');
  assert.equal(kindForStatus(502), 'Transient');
  assert.equal(kindForStatus(400), 'RemoteRejected');
});

test('zone settings are read and patched under /settings with a bearer token', async () => {
  const { client, requests, calls } = setup({
    'GET /settings/ssl': [{ body: envelope({ id: 'ssl', value: 'full', editable: true }) }],
    'PATCH /settings/ssl': [{ body: envelope({ id: 'ssl', value: 'strict' }) }],
  });
  const ref = { key: 'ssl', endpoint: 'zone_setting' as const };

  assert.equal(await client.getSetting(ref), 'full');
  await client.setSetting(ref, 'strict');

  assert.deepEqual(calls(), ['GET /zones/zone-1/settings/ssl', 'PATCH /zones/zone-1/settings/ssl']);
  assert.equal(requests[0].headers.Authorization, 'Bearer test-secret');
  assert.equal(requests[0].headers['Content-Type'], 'application/json');
  assert.equal(requests[0].body, undefined);
  assert.deepEqual(requests[1].body, { value: 'strict' });
});

test('DNSSEC reads and writes its status field', async () => {
  const { client, requests } = setup({
    'GET /dnssec': [{ body: envelope({ status: 'disabled', flags: 257 }) }],
    'PATCH /dnssec': [{ body: envelope({ status: 'pending' }) }],
  });
  const ref = { key: 'dnssec', endpoint: 'dnssec' as const };

  assert.equal(await client.getSetting(ref), 'disabled');
  await client.setSetting(ref, 'active');
  assert.deepEqual(requests[1].body, { status: 'active' });
});

test('DNSSEC awaiting its DS record reads as active', async () => {
  const { client } = setup({
    'GET /dnssec': [{ body: envelope({ status: 'pending', flags: 257 }) }],
  });

  assert.equal(await client.getSetting({ key: 'dnssec', endpoint: 'dnssec' }), 'active');
});

test('object settings are written whole with PUT', async () => {
  const { client, requests, calls } = setup({
    'GET /bot_management': [{ body: envelope({ fight_mode: false, using_latest_model: true }) }],
    'PUT /bot_management': [{ body: envelope({ fight_mode: true }) }],
  });
  const ref = { key: 'bot_fight_mode', endpoint: 'bot_management' as const };

  assert.deepEqual(await client.getSetting(ref), { fight_mode: false, using_latest_model: true });
  await client.setSetting(ref, { fight_mode: true });
  assert.deepEqual(calls(), ['GET /zones/zone-1/bot_management', 'PUT /zones/zone-1/bot_management']);
  assert.deepEqual(requests[1].body, { fight_mode: true });
});

test('a 404 on a setting write is a rejection with a plan hint', async () => {
  const { client } = setup({
    'PATCH /settings/0rtt': [{ status: 404, body: apiFailure(1003, 'Setting not found') }],
  });

  await assert.rejects(client.setSetting({ key: '0rtt', endpoint: 'zone_setting' }, 'on'), (error) => {
    assert.ok(error instanceof RemoteApiError);
    assert.equal(error.kind, 'RemoteRejected');
    assert.equal(
      error.message,
      'PATCH /zones/zone-1/settings/0rtt returned 404: 1003: Setting not found'
    );
    assert.equal(error.details.hint, "Setting 0rtt may not be available on the zone's current plan.");
    return true;
  });
});

test('a 403 on a setting write names the permission to grant', async () => {
  const { client } = setup({ 'PUT /page_shield': [{ status: 403, body: apiFailure(10000, 'Auth') }] });

  await assert.rejects(
    client.setSetting({ key: 'page_shield', endpoint: 'page_shield' }, { enabled: true }),
    (error) => {
      assert.ok(error instanceof RemoteApiError);
      assert.equal(error.kind, 'Unauthorized');
      assert.equal(
        error.details.hint,
        'Check the API token permissions (required: Zone > Page Shield > Edit).'
      );
      return true;
    }
  );
});

test('transient failures are retried with backoff', async () => {
  const { client, delays, calls } = setup({
    'PATCH /settings/tls_1_3': [
      { status: 503, body: 'upstream unavailable' },
      new Error('socket hang up'),
      { body: envelope({ value: 'on' }) },
    ],
  });

  await client.setSetting({ key: 'tls_1_3', endpoint: 'zone_setting' }, 'on');
  assert.equal(calls().length, 3);
  assert.deepEqual(delays, [50, 100]);
});

test('experimental settings are tried once and not reported as transient', async () => {
  const { client, delays, calls } = setup({
    'PUT /bot_management': [{ status: 503, body: 'busy' }],
  });
  const ref = { key: 'ai_labyrinth', endpoint: 'bot_management' as const, experimental: true };

  await assert.rejects(client.setSetting(ref, { crawler_protection: 'enabled' }), (error) => {
    assert.ok(error instanceof RemoteApiError);
    assert.equal(error.kind, 'RemoteRejected');
    assert.equal(error.message, 'PUT /zones/zone-1/bot_management returned 503: HTTP 503');
    assert.equal(error.details.hint, 'Experimental setting; failures are not retried.');
    return true;
  });
  assert.equal(calls().length, 1);
  assert.deepEqual(delays, []);
});

test('DNSSEC rejections carry the registrar note', async () => {
  const { client } = setup({ 'PATCH /dnssec': [{ status: 400, body: apiFailure(1000, 'DS') }] });

  await assert.rejects(client.setSetting({ key: 'dnssec', endpoint: 'dnssec' }, 'active'), (error) => {
    assert.ok(error instanceof RemoteApiError);
    assert.equal(error.kind, 'RemoteRejected');
    assert.match(error.details.hint ?? '', /registrar/);
    return true;
  });
});

test('unsuccessful envelopes and unreadable bodies are rejections', async () => {
  const { client } = setup({
    'GET /settings/ssl': [{ body: apiFailure(1001, 'Nope') }],
    'GET /settings/tls_1_3': [{ body: '<html>' }],
  });

  await assert.rejects(client.getSetting({ key: 'ssl', endpoint: 'zone_setting' }), {
    kind: 'RemoteRejected',
    message: 'GET /zones/zone-1/settings/ssl was not successful: 1001: Nope',
  });
  await assert.rejects(client.getSetting({ key: 'tls_1_3', endpoint: 'zone_setting' }), {
    kind: 'RemoteRejected',
    message: 'GET /zones/zone-1/settings/tls_1_3 returned an unreadable body',
  });
});

test('listRules maps descriptions to rule names', async () => {
  const { client } = setup({
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [
      {
        body: ruleset([
          { id: 'r-1', description: 'Block Scanners', expression: 'x', action: 'block' },
          { id: 'r-2', expression: 'y', action: 'log', enabled: false },
        ]),
      },
    ],
  });

  assert.deepEqual(await client.listRules('http_request_firewall_custom'), [
    {
      id: 'r-1',
      name: 'Block Scanners',
      expression: 'x',
      action: 'block',
      actionParameters: undefined,
      ratelimit: undefined,
      enabled: true,
    },
    {
      id: 'r-2',
      name: '',
      expression: 'y',
      action: 'log',
      actionParameters: undefined,
      ratelimit: undefined,
      enabled: false,
    },
  ]);
});

test('listRules turns a 404 into a missing list', async () => {
  const { client } = setup({
    'GET /rulesets/phases/http_ratelimit/entrypoint': [{ status: 404, body: apiFailure(10003, 'x') }],
  });

  await assert.rejects(client.listRules('http_ratelimit'), (error) => {
    assert.ok(error instanceof RuleListMissingError);
    assert.equal(error.reason, 'not-found');
    return true;
  });
});

test('ensureRuleList finds the zone ruleset for the phase and caches it', async () => {
  const { client, calls } = setup({
    'GET /rulesets': [
      {
        body: envelope([
          { id: 'managed', kind: 'managed', phase: 'http_request_firewall_custom' },
          { id: 'rs-9', kind: 'zone', phase: 'http_request_firewall_custom' },
          { id: 'rs-3', kind: 'zone', phase: 'http_ratelimit' },
        ]),
      },
    ],
  });

  assert.equal(await client.ensureRuleList('http_request_firewall_custom'), 'rs-9');
  assert.equal(await client.ensureRuleList('http_request_firewall_custom'), 'rs-9');
  assert.deepEqual(calls(), ['GET /zones/zone-1/rulesets']);
});

test('ensureRuleList reports a phase that was never instantiated', async () => {
  const { client } = setup({ 'GET /rulesets': [{ body: envelope([]) }] });

  await assert.rejects(client.ensureRuleList('http_request_cache_settings'), (error) => {
    assert.ok(error instanceof RuleListMissingError);
    assert.equal(error.reason, 'never-instantiated');
    return true;
  });
});

test('ensureRuleList treats 403 as CreationDenied', async () => {
  const { client } = setup({ 'GET /rulesets': [{ status: 403, body: apiFailure(10000, 'Auth') }] });

  await assert.rejects(client.ensureRuleList('http_ratelimit'), { kind: 'CreationDenied' });
});

test('the first rule in an empty phase creates its entrypoint', async () => {
  const { client, requests, calls } = setup({
    'GET /rulesets': [{ body: envelope([]) }],
    'PUT /rulesets/phases/http_request_firewall_custom/entrypoint': [
      { body: ruleset([{ id: 'r-1', description: 'Block Scanners', expression: 'x', action: 'block' }]) },
    ],
  });

  await client.upsertRule('http_request_firewall_custom', blockRule);

  assert.deepEqual(calls(), [
    'GET /zones/zone-1/rulesets',
    'PUT /zones/zone-1/rulesets/phases/http_request_firewall_custom/entrypoint',
  ]);
  assert.deepEqual(requests[1].body, {
    name: PLACEHOLDER_RULESET_NAME,
    rules: [
      {
        description: 'Block Scanners',
        expression: '(http.user_agent contains "sqlmap")',
        action: 'block',
        enabled: true,
      },
    ],
  });
  assert.equal(await client.ensureRuleList('http_request_firewall_custom'), 'rs-1');
});

test('existing rules are patched and placed relative to another rule by id', async () => {
  const listed = ruleset([
    { id: 'r-7', description: 'Other', expression: 'o', action: 'log' },
    { id: 'r-1', description: 'Block Scanners', expression: 'x', action: 'block' },
  ]);
  const { client, requests, calls } = setup({
    'GET /rulesets': [
      { body: envelope([{ id: 'rs-1', kind: 'zone', phase: 'http_request_firewall_custom' }]) },
    ],
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [{ body: listed }],
    'PATCH /rulesets/rs-1/rules/r-1': [{ body: listed }],
  });

  await client.ensureRuleList('http_request_firewall_custom');
  await client.upsertRule('http_request_firewall_custom', blockRule, {
    placement: { before: 'Other' },
  });

  assert.deepEqual(calls(), [
    'GET /zones/zone-1/rulesets',
    'GET /zones/zone-1/rulesets/phases/http_request_firewall_custom/entrypoint',
    'PATCH /zones/zone-1/rulesets/rs-1/rules/r-1',
  ]);
  assert.deepEqual(requests[2].body, {
    description: 'Block Scanners',
    expression: '(http.user_agent contains "sqlmap")',
    action: 'block',
    enabled: true,
    position: { before: 'r-7' },
  });
});

test('new rules are added with POST and later writes reuse the returned ids', async () => {
  const afterAdd = ruleset([
    { id: 'r-7', description: 'Other', expression: 'o', action: 'log' },
    { id: 'r-8', description: 'Block Scanners', expression: 'x', action: 'block' },
  ]);
  const { client, requests, calls } = setup({
    'GET /rulesets': [
      { body: envelope([{ id: 'rs-1', kind: 'zone', phase: 'http_request_firewall_custom' }]) },
    ],
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [
      { body: ruleset([{ id: 'r-7', description: 'Other', expression: 'o', action: 'log' }]) },
    ],
    'POST /rulesets/rs-1/rules': [{ body: afterAdd }],
    'PATCH /rulesets/rs-1/rules/r-8': [{ body: afterAdd }],
  });

  await client.listRules('http_request_firewall_custom');
  await client.upsertRule('http_request_firewall_custom', blockRule, {
    placement: { after: 'Other' },
  });
  await client.upsertRule('http_request_firewall_custom', { ...blockRule, enabled: false });

  assert.deepEqual(calls(), [
    'GET /zones/zone-1/rulesets/phases/http_request_firewall_custom/entrypoint',
    'POST /zones/zone-1/rulesets/rs-1/rules',
    'PATCH /zones/zone-1/rulesets/rs-1/rules/r-8',
  ]);
  assert.deepEqual(requests[1].body, { ...toApiRule(blockRule), position: { after: 'r-7' } });
  assert.deepEqual(requests[2].body, toApiRule({ ...blockRule, enabled: false }));
});

test('a rule that replaces another is patched onto that rule id', async () => {
  const afterPatch = ruleset([
    { id: 'r-3', description: 'Block Scanners', expression: 'x', action: 'block' },
  ]);
  const { client, requests, calls } = setup({
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [
      { body: ruleset([{ id: 'r-3', description: 'Seed', expression: 's', action: 'skip' }]) },
    ],
    'PATCH /rulesets/rs-1/rules/r-3': [{ body: afterPatch }],
  });

  await client.listRules('http_request_firewall_custom');
  await client.upsertRule('http_request_firewall_custom', blockRule, { replaces: 'Seed' });

  assert.deepEqual(calls(), [
    'GET /zones/zone-1/rulesets/phases/http_request_firewall_custom/entrypoint',
    'PATCH /zones/zone-1/rulesets/rs-1/rules/r-3',
  ]);
  assert.deepEqual(requests[1].body, toApiRule(blockRule));
});

test('a placement anchor missing from the list is a rejection without a write', async () => {
  const { client, calls } = setup({
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [{ body: ruleset([]) }],
  });

  await client.listRules('http_request_firewall_custom');
  await assert.rejects(
    client.upsertRule('http_request_firewall_custom', blockRule, { placement: { after: 'Gone' } }),
    {
      kind: 'RemoteRejected',
      message: 'Cannot place a rule after "Gone": no such rule in http_request_firewall_custom',
    }
  );
  assert.equal(calls().length, 1);
});

test('a rule create that fails transiently is not retried', async () => {
  const { client, calls, delays } = setup({
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [{ body: ruleset([]) }],
    'POST /rulesets/rs-1/rules': [{ status: 502, body: apiFailure(0, 'Bad gateway') }],
  });

  await client.listRules('http_request_firewall_custom');
  await assert.rejects(client.upsertRule('http_request_firewall_custom', blockRule), {
    kind: 'Transient',
  });
  assert.deepEqual(calls(), [
    'GET /zones/zone-1/rulesets/phases/http_request_firewall_custom/entrypoint',
    'POST /zones/zone-1/rulesets/rs-1/rules',
  ]);
  assert.deepEqual(delays, []);
});

test('a rule update that fails transiently is retried', async () => {
  const listed = ruleset([
    { id: 'r-1', description: 'Block Scanners', expression: 'x', action: 'block' },
  ]);
  const { client, calls, delays } = setup({
    'GET /rulesets/phases/http_request_firewall_custom/entrypoint': [{ body: listed }],
    'PATCH /rulesets/rs-1/rules/r-1': [
      { status: 502, body: apiFailure(0, 'Bad gateway') },
      { body: listed },
    ],
  });

  await client.listRules('http_request_firewall_custom');
  await client.upsertRule('http_request_firewall_custom', blockRule);

  assert.equal(calls().filter((c) => c.startsWith('PATCH')).length, 2);
  assert.deepEqual(delays, [50]);
});

test('toApiRule sends action and rate limit parameters', () => {
  assert.deepEqual(
    toApiRule({
      name: 'Default Rate Limiting',
      expression: '(http.request.uri.path contains "/login")',
      action: 'block',
      enabled: true,
      actionParameters: { response: { status_code: 429 } },
      ratelimit: {
        characteristics: ['ip.src', 'cf.colo.id'],
        period: 10,
        requests_per_period: 20,
        mitigation_timeout: 10,
      },
    }),
    {
      description: 'Default Rate Limiting',
      expression: '(http.request.uri.path contains "/login")',
      action: 'block',
      enabled: true,
      action_parameters: { response: { status_code: 429 } },
      ratelimit: {
        characteristics: ['ip.src', 'cf.colo.id'],
        period: 10,
        requests_per_period: 20,
        mitigation_timeout: 10,
      },
    }
  );
});
