import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { lstat, mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { BundleInit } from '../../../src/types/index.js';
import { createBundleDefinition } from '../../../src/core/bundle/bundle-definition.js';
import { AssetPublisher, createPublishFilter } from '../../../src/core/publish/asset-publisher.js';
import { computeDirectoryHash } from '../../../src/core/publish/directory-hash.js';
import { AliasPathResolver } from '../../../src/core/ports/path-resolver.js';
import { nodeFilesystem, type FilesystemOps } from '../../../src/core/ports/filesystem.js';
import { exists } from '../../../src/utils/fs.js';
import { FileNotFoundError, MissingConfigurationError, PublishIOError } from '../../../src/utils/errors.js';
import { createCountingFilesystem, createTempDir, removeTempDir, writeFiles } from '../../test-helpers.js';

describe('AssetPublisher', () => {
  let rootDir: string;
  let sourceDir: string;
  let outputDir: string;

  beforeEach(async () => {
    rootDir = await createTempDir();
    sourceDir = join(rootDir, 'resources', 'app');
    outputDir = join(rootDir, 'public', 'assets');
    await writeFiles(sourceDir, {
      'js/app.js': 'console.log("app");',
      'css/app.css': 'body {}',
      '.DS_Store': ''
    });
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  function bundle(init: Partial<BundleInit> = {}) {
    return createBundleDefinition({
      name: 'app',
      sourcePath: sourceDir,
      basePath: outputDir,
      baseUrl: '/assets',
      ...init
    });
  }

  function createPublisher(filesystem: FilesystemOps = nodeFilesystem, options: { linkAssets?: boolean } = {}) {
    return new AssetPublisher({
      pathResolver: new AliasPathResolver(rootDir, { '@resources': join(rootDir, 'resources') }),
      filesystem,
      hashCallback: () => 'fixed',
      ...options
    });
  }

  it('copies the source directory under the hashed name', async () => {
    const publisher = createPublisher();

    const result = await publisher.publish(bundle());

    assert.deepEqual(result, { path: join(outputDir, 'fixed'), url: '/assets/fixed' });
    assert.equal(await readFile(join(outputDir, 'fixed', 'js', 'app.js'), 'utf8'), 'console.log("app");');
    assert.equal(await exists(join(outputDir, 'fixed', '.DS_Store')), false);
  });

  it('publishes a source path once', async () => {
    const { filesystem, calls } = createCountingFilesystem();
    const publisher = createPublisher(filesystem);

    const first = await publisher.publish(bundle());
    const second = await publisher.publish(bundle({ name: 'app-alias', sourcePath: '@resources/app' }));

    assert.equal(calls.copyDirectory, 1);
    assert.deepEqual(second, first);
  });

  it('shares one publish between concurrent callers', async () => {
    const { filesystem, calls } = createCountingFilesystem();
    const publisher = createPublisher(filesystem);

    const results = await Promise.all([
      publisher.publish(bundle()),
      publisher.publish(bundle()),
      publisher.publish(bundle())
    ]);

    assert.equal(calls.copyDirectory, 1);
    assert.deepEqual(results[1], results[0]);
    assert.deepEqual(results[2], results[0]);
  });

  it('derives the default directory name from the source path and its modification time', async () => {
    const publisher = new AssetPublisher({ pathResolver: new AliasPathResolver(rootDir) });

    const result = await publisher.publish(bundle());

    const expected = await computeDirectoryHash(sourceDir, false, nodeFilesystem);
    assert.match(expected, /^[0-9a-f]{8}$/);
    assert.equal(result.path, join(outputDir, expected));
    assert.equal(result.url, `/assets/${expected}`);
  });

  it('hashes a single-file source by its directory and the link mode', async () => {
    const file = join(sourceDir, 'js', 'app.js');

    const copied = await computeDirectoryHash(file, false, nodeFilesystem);
    const linked = await computeDirectoryHash(file, true, nodeFilesystem);

    assert.notEqual(copied, linked);
    assert.equal(copied, await computeDirectoryHash(file, false, nodeFilesystem));
  });

  describe('lookups', () => {
    it('returns null before publishing and the recorded values after', async () => {
      const publisher = createPublisher();
      assert.equal(publisher.getPublishedPath(sourceDir), null);
      assert.equal(publisher.getPublishedUrl(sourceDir), null);

      await publisher.publish(bundle());

      assert.equal(publisher.getPublishedPath('@resources/app'), join(outputDir, 'fixed'));
      assert.equal(publisher.getPublishedUrl(sourceDir), '/assets/fixed');
    });
  });

  describe('copy mode', () => {
    it('skips copying onto an existing destination', async () => {
      await mkdir(join(outputDir, 'fixed'), { recursive: true });
      const { filesystem, calls } = createCountingFilesystem();

      await createPublisher(filesystem).publish(bundle());

      assert.equal(calls.copyDirectory, 0);
    });

    it('copies onto an existing destination when forced globally', async () => {
      await mkdir(join(outputDir, 'fixed'), { recursive: true });
      const { filesystem, calls } = createCountingFilesystem();

      await createPublisher(filesystem).withForceCopy(true).publish(bundle());

      assert.equal(calls.copyDirectory, 1);
    });

    it('lets the bundle override the global force-copy flag', async () => {
      await mkdir(join(outputDir, 'fixed'), { recursive: true });
      const { filesystem, calls } = createCountingFilesystem();
      const publisher = createPublisher(filesystem).withForceCopy(true);

      await publisher.publish(bundle({ publishOptions: { forceCopy: false } }));

      assert.equal(calls.copyDirectory, 0);
    });

    it('applies only/except filters', async () => {
      await createPublisher().publish(bundle({ publishOptions: { except: ['*.css'] } }));

      assert.equal(await exists(join(outputDir, 'fixed', 'js', 'app.js')), true);
      assert.equal(await exists(join(outputDir, 'fixed', 'css', 'app.css')), false);
    });

    it('wraps copy failures', async () => {
      const { filesystem } = createCountingFilesystem({
        copyDirectory: () => Promise.reject(new Error('disk full'))
      });

      await assert.rejects(createPublisher(filesystem).publish(bundle()), PublishIOError);
    });
  });

  describe('link mode', () => {
    it('links the destination to the source', async () => {
      const result = await createPublisher(nodeFilesystem, { linkAssets: true }).publish(bundle());

      const stats = await lstat(result.path);
      assert.equal(stats.isSymbolicLink(), true);
      assert.equal(await readFile(join(result.path, 'css', 'app.css'), 'utf8'), 'body {}');
    });

    it('accepts a destination created by a concurrent publisher', async () => {
      const { filesystem, calls } = createCountingFilesystem({
        async createSymlink(_src, dest) {
          await mkdir(dest, { recursive: true });
          throw Object.assign(new Error('EEXIST: file already exists'), { code: 'EEXIST' });
        }
      });

      const result = await createPublisher(filesystem, { linkAssets: true }).publish(bundle());

      assert.equal(calls.createSymlink, 1);
      assert.equal(result.path, join(outputDir, 'fixed'));
    });

    it('reports an unwritable output root as a publish failure', async () => {
      const { filesystem, calls } = createCountingFilesystem({
        ensureDirectory: () => Promise.reject(new Error('EACCES: permission denied'))
      });

      await assert.rejects(createPublisher(filesystem, { linkAssets: true }).publish(bundle()), PublishIOError);
      assert.equal(calls.createSymlink, 0);
    });

    it('fails when linking fails and no destination exists', async () => {
      const { filesystem } = createCountingFilesystem({
        createSymlink: () => Promise.reject(new Error('EPERM: operation not permitted'))
      });

      await assert.rejects(createPublisher(filesystem, { linkAssets: true }).publish(bundle()), PublishIOError);
    });
  });

  describe('configuration', () => {
    it('requires a source path', async () => {
      await assert.rejects(createPublisher().publish(bundle({ sourcePath: null })), MissingConfigurationError);
    });

    it('requires a base path and a base URL', async () => {
      await assert.rejects(createPublisher().publish(bundle({ basePath: null })), MissingConfigurationError);
      await assert.rejects(createPublisher().publish(bundle({ baseUrl: null })), MissingConfigurationError);
    });

    it('requires the source to exist', async () => {
      await assert.rejects(
        createPublisher().publish(bundle({ sourcePath: join(rootDir, 'missing') })),
        FileNotFoundError
      );
    });

    it('returns new publishers from with* methods', () => {
      const publisher = createPublisher();
      const derived = publisher.withLinkAssets(true).withDirMode(0o700).withFileMode(0o600);

      assert.equal(publisher.getConfig().linkAssets, false);
      assert.deepEqual(
        [derived.getConfig().linkAssets, derived.getConfig().dirMode, derived.getConfig().fileMode],
        [true, 0o700, 0o600]
      );
      assert.equal(derived.getConfig().hashCallback, publisher.getConfig().hashCallback);
    });

    it('shares the publish record with derived publishers', async () => {
      const publisher = createPublisher();
      const derived = publisher.withHashCallback(() => 'other');

      await publisher.publish(bundle());

      assert.equal(derived.getPublishedUrl(sourceDir), '/assets/fixed');
    });
  });
});

describe('createPublishFilter', () => {
  it('returns no filter without patterns', () => {
    assert.equal(createPublishFilter({}), undefined);
  });

  it('matches name patterns at any depth and path patterns from the root', () => {
    const filter = createPublishFilter({ only: ['*.js', 'css/**'], except: ['vendor/**'] });
    assert.ok(filter);

    assert.equal(filter('app.js'), true);
    assert.equal(filter('deep/nested/app.js'), true);
    assert.equal(filter('css/site.css'), true);
    assert.equal(filter('img/logo.png'), false);
    assert.equal(filter('vendor/lib.js'), false);
  });
});
