// PlanStore.initialize when the config file cannot be written

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PlanStore } from './plan-store.js';
import { StorageError } from '../../core/errors.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

describe('PlanStore.initialize', () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('should report a failed config write as a StorageError', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'planner-init-'));
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    vi.mocked(fs.writeFile).mockRejectedValueOnce(denied);

    const store = new PlanStore({ baseDir: path.join(tempDir, '.planner') });

    await expect(store.initialize()).rejects.toThrow(StorageError);
    await expect(fs.stat(path.join(tempDir, '.planner', 'plans'))).resolves.toBeDefined();
  });
});
