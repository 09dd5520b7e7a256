/**
 * readDataset() with default collaborators
 *
 * node:fs is wrapped so the tests can assert that an invalid request is
 * rejected before anything looks at the filesystem.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { InvalidRequestError } from '../../../core/errors.js';
import { PufNameRegistry } from '../../../providers/puf-name-registry.js';
import { readDataset } from '../../../retrieval/dataset-reader.js';

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return { ...actual, existsSync: vi.fn(actual.existsSync) };
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

describe('readDataset', () => {
  afterEach(() => {
    vi.mocked(existsSync).mockClear();
    vi.mocked(readdir).mockClear();
  });

  it('should reject an empty request without touching the filesystem', async () => {
    await expect(readDataset({})).rejects.toBeInstanceOf(InvalidRequestError);

    expect(existsSync).not.toHaveBeenCalled();
    expect(readdir).not.toHaveBeenCalled();
  });

  it('should reject a year without a type without touching the filesystem', async () => {
    await expect(readDataset({ year: 2014 }, { directory: '.' })).rejects.toThrow(
      InvalidRequestError
    );

    expect(existsSync).not.toHaveBeenCalled();
    expect(readdir).not.toHaveBeenCalled();
  });
});

describe('PufNameRegistry construction', () => {
  it('should not locate the bundled table until a lookup runs', () => {
    vi.mocked(existsSync).mockClear();

    const registry = new PufNameRegistry();

    expect(registry).toBeInstanceOf(PufNameRegistry);
    expect(existsSync).not.toHaveBeenCalled();
  });
});
