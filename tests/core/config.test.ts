import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import { findConfigFile, loadConfig, parseConfig, resolveConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeFiles } from '../test-helpers.js';

describe('config', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  it('uses defaults when no config file exists', async () => {
    const config = await loadConfig(rootDir);

    assert.deepEqual(config, {
      rootDir,
      manifest: 'assets.yml',
      basePath: null,
      baseUrl: null,
      aliases: {},
      assetMap: {},
      allowedBundleNames: [],
      customizedBundles: {},
      forceCopy: false,
      linkAssets: false,
      dirMode: 0o775,
      fileMode: 0o755
    });
  });

  it('reads JSONC with comments and trailing commas', async () => {
    await writeFiles(rootDir, {
      'assetpack.jsonc': [
        '{',
        '  // published assets',
        '  "basePath": "public/assets",',
        '  "baseUrl": "/assets",',
        '  "aliases": { "@vendor": "node_modules" },',
        '  "dirMode": "0750",',
        '  "linkAssets": true,',
        '  "customizedBundles": { "jquery": false, "app": { "scriptPosition": 2 } },',
        '}'
      ].join('\n')
    });

    const config = await loadConfig(rootDir);

    assert.equal(config.basePath, 'public/assets');
    assert.equal(config.baseUrl, '/assets');
    assert.deepEqual(config.aliases, { '@vendor': 'node_modules' });
    assert.equal(config.dirMode, 0o750);
    assert.equal(config.fileMode, 0o755);
    assert.equal(config.linkAssets, true);
    assert.deepEqual(config.customizedBundles, { jquery: false, app: { scriptPosition: 2 } });
  });

  it('prefers assetpack.jsonc over assetpack.json', async () => {
    await writeFiles(rootDir, { 'assetpack.json': '{}', 'assetpack.jsonc': '{}' });

    assert.equal(await findConfigFile(rootDir), join(rootDir, 'assetpack.jsonc'));
  });

  it('wraps unparsable files in a ConfigError', async () => {
    await writeFiles(rootDir, { 'assetpack.json': '{ "baseUrl": ' });

    await assert.rejects(loadConfig(rootDir), ConfigError);
  });

  it('rejects fields of the wrong type', () => {
    assert.throws(() => parseConfig({ forceCopy: 'yes' }, 'assetpack.json'), {
      name: 'ConfigError',
      message: "Invalid configuration in assetpack.json: 'forceCopy' must be a boolean"
    });
    assert.throws(() => parseConfig({ allowedBundleNames: ['app', ''] }, 'assetpack.json'), ConfigError);
    assert.throws(() => parseConfig({ fileMode: '0999' }, 'assetpack.json'), ConfigError);
    assert.throws(() => parseConfig([], 'assetpack.json'), ConfigError);
  });

  it('reports invalid customized bundles with their name', () => {
    assert.throws(() => parseConfig({ customizedBundles: { app: { cdn: 'no' } } }, 'assetpack.json'), {
      message: "Invalid configuration in assetpack.json: customizedBundles.app: Invalid asset bundle 'app': 'cdn' must be a boolean"
    });
  });

  it('ignores unknown keys', () => {
    assert.deepEqual(parseConfig({ theme: 'dark', forceCopy: true }, 'assetpack.json'), { forceCopy: true });
  });

  it('fills defaults field by field', () => {
    const config = resolveConfig({ rootDir, baseUrl: '/static', manifest: null });

    assert.equal(config.baseUrl, '/static');
    assert.equal(config.basePath, null);
    assert.equal(config.manifest, null);
    assert.equal(config.dirMode, 0o775);
  });
});
