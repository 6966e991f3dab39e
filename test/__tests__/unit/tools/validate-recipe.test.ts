/**
 * Unit Tests: Validate Recipe Tool
 */

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { validateRecipeFile } from '../../../../src/tools/validate-recipe';
import { createToolContext } from '../../../__support__/utilities/mock-infrastructure';

describe('validateRecipeFile', () => {
  it('should validate the built-in recipe and project its contents', async () => {
    const result = await validateRecipeFile({}, createToolContext());

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.valid).toBe(true);
      expect(result.value.steps).toBe(9);
      expect(result.value.expected.browsers).toEqual(['chromium']);
      expect(result.value.expected.removed).toEqual(['autogen-agentchat', 'autogen-core', 'autogen-ext']);
    }
  });

  it('should report issues of a recipe file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'validate-test-'));
    const recipePath = path.join(dir, 'recipe.json');
    await fs.writeFile(
      recipePath,
      JSON.stringify({
        name: 'broken',
        baseImage: 'python',
        steps: [{ id: 'browsers', kind: 'playwright-install', browsers: ['chromium'] }],
      }),
    );

    try {
      const result = await validateRecipeFile({ recipePath }, createToolContext());

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.valid).toBe(false);
        expect(result.value.errors.map((issue) => issue.code)).toEqual(['MISSING_TOOL']);
        expect(result.value.warnings.map((issue) => issue.code)).toEqual(['UNPINNED_BASE_IMAGE']);
      }
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
