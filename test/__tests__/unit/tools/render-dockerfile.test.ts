/**
 * Unit Tests: Render Dockerfile Tool
 */

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { renderDockerfileFromRecipe } from '../../../../src/tools/render-dockerfile';
import { createToolContext } from '../../../__support__/utilities/mock-infrastructure';

describe('renderDockerfileFromRecipe', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'render-test-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should render the built-in recipe', async () => {
    const result = await renderDockerfileFromRecipe({}, createToolContext());

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.recipe).toBe('agent-bench');
      expect(result.value.instructions).toHaveLength(11);
      expect(result.value.path).toBeUndefined();
    }
  });

  it('should apply a base image override', async () => {
    const result = await renderDockerfileFromRecipe({ baseImage: 'python:3.12' }, createToolContext());

    expect(result.ok && result.value.instructions[0]?.text).toBe('FROM python:3.12');
  });

  it('should write the Dockerfile when an output path is given', async () => {
    const output = path.join(workDir, 'build', 'Dockerfile');

    const result = await renderDockerfileFromRecipe({ output }, createToolContext());

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.path).toBe(output);
      expect(await fs.readFile(output, 'utf-8')).toBe(result.value.content);
    }
  });

  it('should use the configured recipe file', async () => {
    const recipePath = path.join(workDir, 'mini.yaml');
    await fs.writeFile(
      recipePath,
      'name: mini\nbaseImage: python:3.11\nsteps:\n  - kind: pip-install\n    packages: [requests]\n',
    );
    const context = createToolContext();
    context.config.provisioner.recipePath = recipePath;

    const result = await renderDockerfileFromRecipe({}, context);

    expect(result.ok && result.value.content).toBe(
      '# Recipe: mini\nFROM python:3.11\n\n# Install Python packages: requests\nRUN pip install requests\n',
    );
  });

  it('should fail for an unreadable recipe', async () => {
    const result = await renderDockerfileFromRecipe(
      { recipePath: path.join(workDir, 'missing.yaml') },
      createToolContext(),
    );

    expect(result.ok).toBe(false);
  });
});
