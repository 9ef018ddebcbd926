import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { CONFIG_FILE_NAME, loadConfig, parseConfigYaml, resolveConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { makeTempDir } from './helpers.js';

test('defaults without a config file or environment', () => {
  const config = resolveConfig({}, { cwd: '/srv/todo', env: {} });
  assert.deepEqual(config, {
    dataDir: path.resolve('/srv/todo', 'data'),
    dataFile: path.join(path.resolve('/srv/todo', 'data'), 'tasks.json'),
    categories: ['General', 'Work', 'Life', 'Study', 'Health'],
    logLevel: undefined,
    timeZone: undefined,
    host: '127.0.0.1',
    port: 8787,
    reminderIntervalMs: 1000,
    cors: false,
    corsOrigin: undefined
  });
});

test('parseConfigYaml keeps every value a string', () => {
  const file = parseConfigYaml(
    ['dataDir: ./state', 'port: 9000', 'logLevel: debug', 'categories:', '  - Home', '  - Work', '  - Home'].join('\n')
  );
  assert.deepEqual(file, { dataDir: './state', port: '9000', logLevel: 'debug', categories: ['Home', 'Work', 'Home'] });

  const config = resolveConfig(file, { cwd: '/srv/todo', env: {} });
  assert.equal(config.dataDir, path.resolve('/srv/todo', 'state'));
  assert.equal(config.port, 9000);
  assert.equal(config.logLevel, 'debug');
  assert.deepEqual(config.categories, ['Home', 'Work']);
});

test('parseConfigYaml accepts an empty document', () => {
  assert.deepEqual(parseConfigYaml(''), {});
});

test('parseConfigYaml rejects unknown keys and wrong shapes', () => {
  assert.throws(() => parseConfigYaml('colour: blue'), ConfigError);
  assert.throws(() => parseConfigYaml('- a\n- b'), ConfigError);
  assert.throws(() => parseConfigYaml('categories: Work'), ConfigError);
  assert.throws(() => parseConfigYaml('port:\n  - 1'), ConfigError);
});

test('environment overrides the file', () => {
  const config = resolveConfig(
    { dataDir: 'from-file', port: '9000', logLevel: 'debug' },
    {
      cwd: '/srv/todo',
      env: {
        TODO_DATA_DIR: '/var/lib/todo',
        PORT: '9100',
        TODO_LOG_LEVEL: 'warn',
        TODO_TIMEZONE: 'Europe/Berlin',
        HOST: '0.0.0.0',
        TODO_REMINDER_INTERVAL_MS: '250',
        CORS: 'true',
        CORS_ORIGIN: 'http://localhost:5173'
      }
    }
  );
  assert.equal(config.dataFile, path.join('/var/lib/todo', 'tasks.json'));
  assert.equal(config.port, 9100);
  assert.equal(config.logLevel, 'warn');
  assert.equal(config.timeZone, 'Europe/Berlin');
  assert.equal(config.host, '0.0.0.0');
  assert.equal(config.reminderIntervalMs, 250);
  assert.equal(config.cors, true);
  assert.equal(config.corsOrigin, 'http://localhost:5173');
});

test('invalid values raise ConfigError naming the key', () => {
  const bad: [Record<string, string>, string][] = [
    [{ PORT: 'eighty' }, 'port'],
    [{ PORT: '70000' }, 'port'],
    [{ TODO_LOG_LEVEL: 'loud' }, 'logLevel'],
    [{ TODO_TIMEZONE: 'Mars/Olympus_Mons' }, 'timeZone'],
    [{ TODO_REMINDER_INTERVAL_MS: '10' }, 'reminderIntervalMs']
  ];
  for (const [env, key] of bad) {
    assert.throws(
      () => resolveConfig({}, { cwd: '/srv/todo', env }),
      (err: unknown) => err instanceof ConfigError && err.key === key
    );
  }
  assert.throws(() => resolveConfig({ categories: [' '] }, { cwd: '/srv/todo', env: {} }), ConfigError);
  assert.throws(() => resolveConfig({ categories: [] }, { cwd: '/srv/todo', env: {} }), ConfigError);
});

test('loadConfig reads the YAML file from the working directory', async () => {
  const dir = await makeTempDir('todo-config-');
  await fs.writeFile(path.join(dir, CONFIG_FILE_NAME), 'dataDir: tasks-here\ntimeZone: UTC\n', 'utf8');

  const config = await loadConfig({ cwd: dir, env: {} });
  assert.equal(config.dataFile, path.join(dir, 'tasks-here', 'tasks.json'));
  assert.equal(config.timeZone, 'UTC');
});

test('loadConfig follows TODO_CONFIG', async () => {
  const dir = await makeTempDir('todo-config-');
  await fs.writeFile(path.join(dir, 'custom.yaml'), 'host: 192.168.1.10\n', 'utf8');

  const config = await loadConfig({ cwd: dir, env: { TODO_CONFIG: 'custom.yaml' } });
  assert.equal(config.host, '192.168.1.10');
});
