import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { CollectionLoadError, loadCollectionFile } from '../../src/collection/loader.js';

describe('loadCollectionFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `loader-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses YAML collections', async () => {
    const path = join(dir, 'flow.yaml');
    await writeFile(
      path,
      ['name: Users', 'variables:', '  uname: alice', 'steps:', '  - method: GET', '    url: /health'].join('\n'),
      'utf-8',
    );

    expect(await loadCollectionFile(path)).toEqual({
      name: 'Users',
      variables: { uname: 'alice' },
      steps: [{ method: 'GET', url: '/health' }],
    });
  });

  it('treats .yml like .yaml', async () => {
    const path = join(dir, 'flow.YML');
    await writeFile(path, 'steps: []\n', 'utf-8');
    expect(await loadCollectionFile(path)).toEqual({ steps: [] });
  });

  it('parses JSON for other extensions', async () => {
    const path = join(dir, 'flow.json');
    await writeFile(path, JSON.stringify({ name: 'Json', steps: [] }), 'utf-8');
    expect(await loadCollectionFile(path)).toEqual({ name: 'Json', steps: [] });
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'missing.yaml');
    await expect(loadCollectionFile(path)).rejects.toMatchObject({
      name: 'CollectionLoadError',
      kind: 'not_found',
      message: `Collection file not found: ${path}`,
    });
  });

  it('reports YAML syntax errors', async () => {
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'steps: [1, 2\n', 'utf-8');

    const error = await loadCollectionFile(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollectionLoadError);
    expect(error).toMatchObject({ kind: 'yaml' });
    expect(error).toMatchObject({ message: expect.stringMatching(/^YAML parsing error: /) });
  });

  it('reports JSON syntax errors', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{"steps": [', 'utf-8');

    const error = await loadCollectionFile(path).catch((e: unknown) => e);
    expect(error).toMatchObject({ kind: 'json' });
    expect(error).toMatchObject({ message: expect.stringMatching(/^JSON parsing error: /) });
  });

  it('reports unreadable paths', async () => {
    await expect(loadCollectionFile(dir)).rejects.toMatchObject({ kind: 'read' });
  });
});
