// ============================================================================
// ipns-dataset-client — Local Mapping Cache
// ============================================================================

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parseDatasetMapping } from './registry.js';
import type { DatasetMapping, MappingCache } from './types.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON file holding the last mapping fetched from the registry.
 *
 * Writes go to a temp file that is then renamed over the target, so a reader
 * sees either the old or the new mapping. Concurrent writers are not
 * serialized; the last rename wins.
 */
export class FileMappingCache implements MappingCache {
  constructor(readonly path: string) {}

  /** @inheritdoc */
  async read(): Promise<DatasetMapping | undefined> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
    return parseDatasetMapping(JSON.parse(text), `cache file ${this.path}`);
  }

  /** @inheritdoc */
  async write(mapping: DatasetMapping): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(mapping, null, 2)}\n`, 'utf-8');
      await rename(tempPath, this.path);
    } catch (err) {
      await unlink(tempPath).catch(() => undefined);
      throw err;
    }
  }
}

/** In-process cache, for callers that do not want a file on disk. */
export class MemoryMappingCache implements MappingCache {
  private mapping?: DatasetMapping;

  constructor(initial?: DatasetMapping) {
    this.mapping = initial ? { ...initial } : undefined;
  }

  async read(): Promise<DatasetMapping | undefined> {
    return this.mapping ? { ...this.mapping } : undefined;
  }

  async write(mapping: DatasetMapping): Promise<void> {
    this.mapping = { ...mapping };
  }
}
