import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { EnvConfigError, booleanVar, integerVar, loadEnvConfig, stringVar } from '../src/envConfig';

const schema = z.object({
  LEDGER_STRICT: booleanVar({ defaultValue: false }),
  LEDGER_DAYS: integerVar({ defaultValue: 120, min: 0 }),
  LEDGER_LEVEL: stringVar({ defaultValue: 'INFO', lowercase: true }),
  LEDGER_NAME: stringVar()
});

test('applies defaults for unset and blank variables', () => {
  const config = loadEnvConfig(schema, { env: { LEDGER_DAYS: '  ', LEDGER_NAME: '' } });
  assert.deepEqual(config, {
    LEDGER_STRICT: false,
    LEDGER_DAYS: 120,
    LEDGER_LEVEL: 'info',
    LEDGER_NAME: undefined
  });
});

test('parses provided values', () => {
  const config = loadEnvConfig(schema, {
    env: { LEDGER_STRICT: 'Yes', LEDGER_DAYS: '0', LEDGER_LEVEL: ' Debug ', LEDGER_NAME: ' Core Facility ' }
  });
  assert.deepEqual(config, {
    LEDGER_STRICT: true,
    LEDGER_DAYS: 0,
    LEDGER_LEVEL: 'debug',
    LEDGER_NAME: 'Core Facility'
  });
});

test('reports every invalid variable with its context', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { LEDGER_STRICT: 'maybe', LEDGER_DAYS: '-3' }, context: 'ledger:test' }),
    (error: unknown) => {
      assert(error instanceof EnvConfigError);
      assert.equal(error.code, 'ENV_CONFIG_INVALID');
      assert.equal(
        error.message,
        [
          '[ledger:test] Invalid environment configuration',
          "  • LEDGER_STRICT: Invalid LEDGER_STRICT. Accepted boolean values: '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'",
          '  • LEDGER_DAYS: LEDGER_DAYS must be >= 0'
        ].join('\n')
      );
      return true;
    }
  );
});

test('rejects non-integer values', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { LEDGER_DAYS: '1.5' } }),
    /LEDGER_DAYS: Expected LEDGER_DAYS to be an integer/
  );
});

test('required variables must be present', () => {
  const requiredSchema = z.object({ LEDGER_ROOT: stringVar({ required: true, description: 'ledger root' }) });
  assert.throws(() => loadEnvConfig(requiredSchema, { env: {} }), /LEDGER_ROOT: Missing required ledger root/);
});
