import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ModelRegistry } from '../../src/models/registry.js';
import { estimateVramGb, matchesFile } from '../../src/models/types.js';
import { defineModel, makeTempDir, removeDir, touch } from '../helpers/fixtures.js';

const small = defineModel({
  id: 'small',
  name: 'Small',
  filenamePattern: 'small-.*\\.gguf$',
  priority: 3,
});

const coder = defineModel({
  id: 'coder',
  name: 'Coder',
  filenamePattern: 'coder-.*\\.gguf$',
  priority: 2,
});

const exact = defineModel({
  id: 'exact',
  name: 'Exact',
  filename: 'exact.gguf',
  priority: 2,
});

describe('ModelRegistry', () => {
  let root: string;
  let modelsDir: string;

  beforeEach(async () => {
    root = await makeTempDir();
    modelsDir = join(root, 'models');
    await mkdir(modelsDir);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('scan', () => {
    it('maps each definition to its matching file', async () => {
      await touch(modelsDir, 'small-q4.gguf', 'coder-q8.gguf', 'notes.txt');

      const registry = await ModelRegistry.create([small, coder], { modelsDir, cacheDir: root });

      expect(registry.available().map((m) => m.id)).toEqual(['small', 'coder']);
      expect(registry.byId('small')?.path).toBe(join(modelsDir, 'small-q4.gguf'));
      expect(registry.byId('coder')?.path).toBe(join(modelsDir, 'coder-q8.gguf'));
    });

    it('ignores files without a .gguf extension', async () => {
      await touch(modelsDir, 'small-q4.bin');

      const registry = await ModelRegistry.create([small], { modelsDir, cacheDir: root });

      expect(registry.available()).toEqual([]);
      expect(registry.isAvailable('small')).toBe(false);
    });

    it('returns an empty registry for a missing directory', async () => {
      const registry = await ModelRegistry.create([small], {
        modelsDir: join(root, 'does-not-exist'),
        cacheDir: root,
      });

      expect(registry.available()).toEqual([]);
      expect(registry.autoSelect()).toBeNull();
    });

    it('matches patterns case-insensitively and exact names exactly', async () => {
      await touch(modelsDir, 'SMALL-Q4.GGUF', 'Exact.gguf');

      const registry = await ModelRegistry.create([small, exact], { modelsDir, cacheDir: root });

      expect(registry.isAvailable('small')).toBe(true);
      expect(registry.isAvailable('exact')).toBe(false);
    });

    it('gives a file to the first definition that matches it', async () => {
      const broad = defineModel({ id: 'broad', name: 'Broad', filenamePattern: '\\.gguf$' });
      const narrow = defineModel({ id: 'narrow', name: 'Narrow', filenamePattern: 'small-' });
      await touch(modelsDir, 'small-q4.gguf');

      const registry = await ModelRegistry.create([broad, narrow], { modelsDir, cacheDir: root });

      expect(registry.byId('broad')?.path).toBe(join(modelsDir, 'small-q4.gguf'));
      expect(registry.byId('narrow')).toBeNull();
    });

    it('picks the first file in name order when several match', async () => {
      await touch(modelsDir, 'small-q8.gguf', 'small-q4.gguf');

      const registry = await ModelRegistry.create([small], { modelsDir, cacheDir: root });

      expect(registry.byId('small')?.path).toBe(join(modelsDir, 'small-q4.gguf'));
    });

    it('picks up new files on refresh', async () => {
      const registry = await ModelRegistry.create([small], { modelsDir, cacheDir: root });
      expect(registry.isAvailable('small')).toBe(false);

      await touch(modelsDir, 'small-q4.gguf');
      await registry.refresh();

      expect(registry.isAvailable('small')).toBe(true);
    });
  });

  describe('autoSelect', () => {
    it('prefers the configured default when available', async () => {
      await touch(modelsDir, 'small-q4.gguf', 'coder-q8.gguf');

      const registry = await ModelRegistry.create([small, coder], {
        modelsDir,
        cacheDir: root,
        defaultModel: 'small',
      });

      expect(registry.autoSelect()?.id).toBe('small');
    });

    it('falls back to the lowest priority number', async () => {
      await touch(modelsDir, 'small-q4.gguf', 'coder-q8.gguf');

      const registry = await ModelRegistry.create([small, coder], {
        modelsDir,
        cacheDir: root,
        defaultModel: 'missing',
      });

      expect(registry.autoSelect()?.id).toBe('coder');
    });

    it('keeps declaration order between equal priorities', async () => {
      await touch(modelsDir, 'coder-q8.gguf', 'exact.gguf');

      const first = await ModelRegistry.create([exact, coder], { modelsDir, cacheDir: root });
      const second = await ModelRegistry.create([coder, exact], { modelsDir, cacheDir: root });

      expect(first.autoSelect()?.id).toBe('exact');
      expect(second.autoSelect()?.id).toBe('coder');
    });
  });

  it('places prompt caches under the cache directory', () => {
    const registry = new ModelRegistry([small], { modelsDir, cacheDir: '/var/cache/ai' });
    expect(registry.cachePath('small')).toBe(join('/var/cache/ai', 'small.cache'));
  });
});

describe('matchesFile', () => {
  it('uses the exact filename when one is set', () => {
    expect(matchesFile(exact, 'exact.gguf')).toBe(true);
    expect(matchesFile(exact, 'exact.gguf.part')).toBe(false);
  });

  it('searches the pattern anywhere in the name', () => {
    expect(matchesFile(coder, 'my-coder-7b.gguf')).toBe(true);
  });
});

describe('estimateVramGb', () => {
  it('adds the KV cache for the context to a 2 GB base', () => {
    // 8192 * 2 * 128 * 32 bytes = 0.0625 GB
    expect(estimateVramGb(small)).toBe(2.06);
  });
});
