import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseJson } from '../types/value.js';

export type CollectionLoadErrorKind = 'not_found' | 'yaml' | 'json' | 'read';

export class CollectionLoadError extends Error {
  constructor(
    message: string,
    public kind: CollectionLoadErrorKind,
    public path: string,
  ) {
    super(message);
    this.name = 'CollectionLoadError';
  }
}

function isYamlPath(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Reads a collection file. `.yaml`/`.yml` files are parsed as YAML, anything
 * else as JSON. The result is unvalidated; the runner checks its shape.
 */
export async function loadCollectionFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new CollectionLoadError(`Collection file not found: ${path}`, 'not_found', path);
    }
    throw new CollectionLoadError(
      `Could not read collection: ${error instanceof Error ? error.message : String(error)}`,
      'read',
      path,
    );
  }

  if (isYamlPath(path)) {
    try {
      return parseYaml(raw) as unknown;
    } catch (error) {
      throw new CollectionLoadError(
        `YAML parsing error: ${error instanceof Error ? error.message : String(error)}`,
        'yaml',
        path,
      );
    }
  }

  try {
    return parseJson(raw);
  } catch (error) {
    throw new CollectionLoadError(
      `JSON parsing error: ${error instanceof Error ? error.message : String(error)}`,
      'json',
      path,
    );
  }
}
