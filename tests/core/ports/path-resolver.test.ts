import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { AliasPathResolver } from '../../../src/core/ports/path-resolver.js';
import { MissingConfigurationError } from '../../../src/utils/errors.js';

describe('AliasPathResolver', () => {
  const resolver = new AliasPathResolver('/srv/site', {
    '@web': '/srv/site/public/',
    assets: '@web/assets',
    '@vendor': 'node_modules'
  });

  it('resolves relative paths against the root directory', () => {
    assert.equal(resolver.resolve('resources/app'), '/srv/site/resources/app');
    assert.equal(resolver.resolve('/opt/lib/../shared'), '/opt/shared');
  });

  it('expands aliases, including aliases of aliases', () => {
    assert.equal(resolver.resolve('@web'), '/srv/site/public');
    assert.equal(resolver.resolve('@assets/js'), '/srv/site/public/assets/js');
    assert.equal(resolver.resolve('@vendor/jquery/dist'), '/srv/site/node_modules/jquery/dist');
  });

  it('expands aliases in URLs and leaves other URLs alone', () => {
    const urls = new AliasPathResolver('/srv/site', { '@cdn': 'https://cdn.example.com/' });

    assert.equal(urls.resolveUrl('@cdn/lib/app.js'), 'https://cdn.example.com/lib/app.js');
    assert.equal(urls.resolveUrl('/assets/app.js'), '/assets/app.js');
  });

  it('normalizes alias names', () => {
    assert.deepEqual(resolver.getAliases(), {
      '@web': '/srv/site/public',
      '@assets': '@web/assets',
      '@vendor': 'node_modules'
    });
  });

  it('rejects unknown and self-referencing aliases', () => {
    assert.throws(() => resolver.resolve('@missing/app'), MissingConfigurationError);

    const looping = new AliasPathResolver('/srv/site', { '@a': '@b/x', '@b': '@a/y' });
    assert.throws(() => looping.resolve('@a'), { message: "Path alias '@a' refers to itself" });
  });
});
