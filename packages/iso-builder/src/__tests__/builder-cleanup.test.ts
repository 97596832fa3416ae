/**
 * IsoBuilder cleanup tests
 *
 * fs/promises is wrapped so removing the partial image can be made to fail.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { BuildError } from '@vmboot/core';
import { createTempDir, removeTempDir, silentLogger } from '@vmboot/test-utils';
import { IsoBuilder } from '../builder';

const removal = vi.hoisted(() => ({ fail: false }));

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    rm: async (...args: Parameters<typeof actual.rm>) => {
      if (removal.fail) throw new Error('EBUSY: resource busy or locked');
      return actual.rm(...args);
    },
  };
});

describe('IsoBuilder cleanup', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('iso-builder-cleanup');
  });

  afterEach(async () => {
    removal.fail = false;
    await removeTempDir(tempDir);
  });

  it('should keep the BuildError when the partial image cannot be removed', async () => {
    const builder = new IsoBuilder({ logger: silentLogger });
    removal.fail = true;

    const error = await builder.create(path.join(tempDir, 'out.iso'), path.join(tempDir, 'missing'), 'test-config').then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(BuildError);
    if (error instanceof BuildError) {
      expect(error.kind).toBe('FormatFailed');
    }
  });
});
