import ora from 'ora';
import { describe, expect, test, vi } from 'vitest';
import type { PackageDescriptor } from '../../metadata/types.js';
import { planRuns, runFeatureCombinations } from '../orchestrator.js';
import { MemoryOutput, fakeSpawn } from './helpers.js';

const spinner = vi.hoisted(() => {
  const handle = { start: vi.fn(), stop: vi.fn() };
  handle.start.mockReturnValue(handle);
  return handle;
});

vi.mock('ora', () => ({ default: vi.fn(() => spinner) }));

const core: PackageDescriptor = {
  name: 'core',
  manifestPath: '/work/core/Cargo.toml',
  features: { A: [] },
  dependencies: [],
  metadata: null,
};

describe('progress spinner', () => {
  test('spins around each silent build', async () => {
    const { spawn } = fakeSpawn([{}, { code: 1 }]);
    const report = await runFeatureCombinations(planRuns([core], new Map()), ['check'], {
      env: {},
      now: () => 0,
      silent: true,
      progress: true,
      spawn,
      stdout: new MemoryOutput(),
      stderr: new MemoryOutput(),
    });
    expect(report.exitCode).toBe(1);
    expect(vi.mocked(ora).mock.calls).toEqual([
      [{ text: 'core []', color: 'cyan' }],
      [{ text: 'core [A]', color: 'cyan' }],
    ]);
    expect(spinner.start).toHaveBeenCalledTimes(2);
    expect(spinner.stop).toHaveBeenCalledTimes(2);
  });
});
