import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { loadConfig, resolve } from './config.js';

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'base58-config-'));
  const file = path.join(dir, 'config.json');
  fs.writeFileSync(file, contents, 'utf-8');
  return file;
}

test('missing config file is an empty config', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'base58-config-'));
  assert.deepEqual(loadConfig(path.join(dir, 'absent.json')), {});
});

test('reads the alphabet from the config file', () => {
  assert.deepEqual(loadConfig(writeConfig('{ "alphabet": "ripple" }\n')), { alphabet: 'ripple' });
});

test('ignores unrelated keys', () => {
  assert.deepEqual(loadConfig(writeConfig('{ "theme": "dark" }')), {});
});

test('rejects malformed JSON', () => {
  const file = writeConfig('{ alphabet: ripple }');
  assert.throws(() => loadConfig(file), (err: unknown) => {
    assert.ok(err instanceof Error);
    assert.ok(err.message.startsWith(`Invalid config file ${file}: `));
    return true;
  });
});

test('rejects a config that is not an object', () => {
  const file = writeConfig('["ripple"]');
  assert.throws(() => loadConfig(file), {
    message: `Invalid config file ${file}: expected a JSON object`,
  });
});

test('rejects a non-string alphabet', () => {
  const file = writeConfig('{ "alphabet": 58 }');
  assert.throws(() => loadConfig(file), {
    message: `Invalid config file ${file}: "alphabet" must be a string`,
  });
});

test('resolve prefers flag, then env, then config', () => {
  const name = 'BASE58_CONFIG_TEST_VALUE';
  process.env[name] = 'from-env';
  try {
    assert.equal(resolve('from-flag', name, 'from-config'), 'from-flag');
    assert.equal(resolve(undefined, name, 'from-config'), 'from-env');
    process.env[name] = '';
    assert.equal(resolve(undefined, name, 'from-config'), 'from-config');
    assert.equal(resolve(undefined, undefined, undefined), undefined);
  } finally {
    delete process.env[name];
  }
});
