import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ConfigError, loadConfig } from '../src/config';

test('defaults apply when the environment is empty', () => {
  assert.deepEqual(loadConfig({}), {
    host: '0.0.0.0',
    port: 4300,
    logLevel: 'info',
    demoUserId: 'demo-user',
    demoUsername: 'demo',
    seedDemo: true,
    templatesDir: undefined
  });
});

test('reads overrides from WORKFLOWS_ variables', () => {
  const config = loadConfig({
    WORKFLOWS_HOST: ' 127.0.0.1 ',
    WORKFLOWS_PORT: '8080',
    WORKFLOWS_LOG_LEVEL: 'debug',
    WORKFLOWS_DEMO_USER_ID: 'user-7',
    WORKFLOWS_SEED_DEMO: 'off',
    WORKFLOWS_TEMPLATES_DIR: './views'
  });
  assert.equal(config.host, '127.0.0.1');
  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.demoUserId, 'user-7');
  assert.equal(config.demoUsername, 'demo');
  assert.equal(config.seedDemo, false);
  assert.equal(config.templatesDir, './views');
});

test('invalid values are all reported', () => {
  assert.throws(
    () => loadConfig({ WORKFLOWS_PORT: 'abc', WORKFLOWS_SEED_DEMO: 'maybe' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /^Invalid workflows service configuration\n/);
      assert.match(error.message, /WORKFLOWS_PORT: /);
      assert.match(error.message, /WORKFLOWS_SEED_DEMO: expected a boolean, received 'maybe'/);
      return true;
    }
  );
});
