/**
 * Unit Tests: Provision Tool
 * Runs recipes through a fake command runner; nothing is executed on the host
 */

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { provision } from '../../../../src/tools/provision';
import {
  FakeCommandRunner,
  createToolContext,
  spawnError,
} from '../../../__support__/utilities/mock-infrastructure';

describe('provision', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provision-test-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function writeRecipe(steps: string): Promise<string> {
    const recipePath = path.join(workDir, 'recipe.yaml');
    await fs.writeFile(
      recipePath,
      `name: local\nbaseImage: python:3.11\nbaseTools: [sh, hostname, apt-get, pip]\nsteps:\n${steps}`,
    );
    return recipePath;
  }

  it('should return the plan without running anything on a dry run', async () => {
    const executor = new FakeCommandRunner();

    const result = await provision({ dryRun: true }, createToolContext({ executor }));

    expect(result.ok).toBe(true);
    if (result.ok && result.value.dryRun) {
      expect(result.value.plan.recipe).toBe('agent-bench');
      expect(result.value.plan.steps).toHaveLength(9);
    }
    expect(executor.calls).toHaveLength(0);
  });

  it('should stop at the first failing command', async () => {
    const executor = new FakeCommandRunner(() => ({ stdout: '', stderr: 'E: Could not open lock file', exitCode: 100 }));

    const result = await provision({}, createToolContext({ executor }));

    expect(executor.calls.map((call) => [call.command, ...call.args])).toEqual([['apt-get', 'update']]);
    expect(result.ok).toBe(true);
    if (result.ok && !result.value.dryRun) {
      const { report } = result.value;
      expect(report.backend).toBe('local');
      expect(report.status).toBe('failed');
      expect(report.failedStep).toBe('media-tools');
      expect(report.exitCode).toBe(100);
      expect(report.steps[0]?.output).toBe('E: Could not open lock file');
      expect(report.steps.slice(1).every((step) => step.status === 'skipped')).toBe(true);
    }
  });

  it('should run every command in order with the step environment', async () => {
    const recipePath = await writeRecipe(
      [
        '  - id: media',
        '    kind: apt-install',
        '    packages: [ffmpeg]',
        '  - id: deps',
        '    kind: pip-install',
        '    packages: [requests]',
        '',
      ].join('\n'),
    );
    const executor = new FakeCommandRunner();

    const result = await provision({ recipePath }, createToolContext({ executor }));

    expect(result.ok && !result.value.dryRun && result.value.report.status).toBe('succeeded');
    expect(executor.calls.map((call) => [call.command, ...call.args])).toEqual([
      ['apt-get', 'update'],
      ['apt-get', 'install', '-y', 'ffmpeg'],
      ['pip', 'install', 'requests'],
    ]);
    expect(executor.calls[1]?.options.env?.DEBIAN_FRONTEND).toBe('noninteractive');
    expect(executor.calls[2]?.options.env?.DEBIAN_FRONTEND).toBe(process.env.DEBIAN_FRONTEND);
  });

  it('should write redirected output only after the command succeeds', async () => {
    const target = path.join(workDir, 'etc', 'hostname');
    const recipePath = await writeRecipe(
      ['  - id: name', '    kind: run', '    command: hostname', `    stdoutTo: ${target}`, ''].join('\n'),
    );

    const passing = new FakeCommandRunner(() => ({ stdout: 'bench-host', stderr: '', exitCode: 0 }));
    await provision({ recipePath }, createToolContext({ executor: passing }));
    expect(await fs.readFile(target, 'utf-8')).toBe('bench-host\n');

    await fs.rm(target);
    const failing = new FakeCommandRunner(() => ({ stdout: 'partial', stderr: '', exitCode: 1 }));
    const result = await provision({ recipePath }, createToolContext({ executor: failing }));
    expect(result.ok && !result.value.dryRun && result.value.report.steps[0]?.output).toBe('partial');
    await expect(fs.access(target)).rejects.toThrow();
  });

  it('should report a missing executable as exit status 127', async () => {
    const recipePath = await writeRecipe('  - id: deps\n    kind: pip-install\n    packages: [requests]\n');
    const executor = new FakeCommandRunner((command) => spawnError(command));

    const result = await provision({ recipePath }, createToolContext({ executor }));

    expect(result.ok && !result.value.dryRun && result.value.report.exitCode).toBe(127);
  });

  it('should refuse an invalid recipe', async () => {
    const recipePath = await writeRecipe('  - id: corpora\n    kind: run\n    command: nltk\n');
    const executor = new FakeCommandRunner();

    const result = await provision({ recipePath }, createToolContext({ executor }));

    expect(result).toEqual({
      ok: false,
      error: 'Recipe local is invalid: Step corpora runs nltk, which neither the base image nor an earlier step provides',
    });
    expect(executor.calls).toHaveLength(0);
  });
});
