import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import {
  booleanVar,
  EnvConfigError,
  integerVar,
  isIsoDate,
  isoDateVar,
  loadEnvConfig,
  numberVar,
  stringVar
} from '../envConfig';

const schema = z.object({
  PAGE_SIZE: integerVar({ defaultValue: 50_000, min: 1 }),
  SLA_HOURS: numberVar({ defaultValue: 24, min: 0 }),
  ENABLED: booleanVar({ defaultValue: true }),
  DOMAIN: stringVar({ defaultValue: 'example.test' }),
  SINCE: isoDateVar()
});

test('applies defaults for blank and missing values', () => {
  const config = loadEnvConfig(schema, { env: { PAGE_SIZE: '  ', ENABLED: '' } });
  assert.deepEqual(config, {
    PAGE_SIZE: 50_000,
    SLA_HOURS: 24,
    ENABLED: true,
    DOMAIN: 'example.test'
  });
  assert.equal(config.SINCE, undefined);
});

test('parses provided values', () => {
  const config = loadEnvConfig(schema, {
    env: { PAGE_SIZE: '25', SLA_HOURS: '1.5', ENABLED: 'off', DOMAIN: ' data.example.test ', SINCE: '2024-02-29' }
  });
  assert.equal(config.PAGE_SIZE, 25);
  assert.equal(config.SLA_HOURS, 1.5);
  assert.equal(config.ENABLED, false);
  assert.equal(config.DOMAIN, 'data.example.test');
  assert.equal(config.SINCE, '2024-02-29');
});

test('reports every invalid variable', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { PAGE_SIZE: '1.5', SINCE: '2023-02-29' }, context: 'test' }),
    (err: unknown) => {
      assert.ok(err instanceof EnvConfigError);
      const lines = err.message.split('\n');
      assert.equal(lines[0], '[test] Invalid environment configuration');
      assert.equal(lines[1], '  - PAGE_SIZE: Expected PAGE_SIZE to be an integer');
      assert.equal(lines[2], '  - SINCE: Invalid SINCE (expected YYYY-MM-DD): 2023-02-29');
      return true;
    }
  );
});

test('enforces numeric ranges', () => {
  assert.throws(() => loadEnvConfig(schema, { env: { PAGE_SIZE: '0' } }), /PAGE_SIZE must be >= 1/);
});

test('recognizes real calendar dates only', () => {
  assert.equal(isIsoDate('2024-12-31'), true);
  assert.equal(isIsoDate('2024-13-01'), false);
  assert.equal(isIsoDate('2024-1-01'), false);
});
