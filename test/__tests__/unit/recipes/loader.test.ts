/**
 * Unit Tests: Recipe files
 */

import path from 'node:path';
import {
  createAgentBenchRecipe,
  loadRecipe,
  parseRecipe,
  recipeJsonSchema,
  resolveRecipe,
} from '../../../../src/recipes';
import { DEFAULT_BASE_TOOLS } from '../../../../src/recipes/agent-bench';
import { renderDockerfile, stepForInstruction } from '../../../../src/lib/dockerfile';

const EXAMPLE_RECIPE = path.join(__dirname, '../../../../examples/agent-bench.yaml');

describe('loadRecipe', () => {
  it('should load the example recipe as the built-in one', async () => {
    const result = await loadRecipe(EXAMPLE_RECIPE);

    expect(result).toEqual({ ok: true, value: createAgentBenchRecipe() });
  });

  it('should fail for a missing file', async () => {
    const result = await loadRecipe('/nonexistent/recipe.yaml');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Cannot read recipe /nonexistent/recipe.yaml:')).toBe(true);
  });
});

describe('parseRecipe', () => {
  it('should read JSON and fill in defaults', () => {
    const result = parseRecipe(
      JSON.stringify({
        name: 'mini',
        baseImage: 'python:3.12-slim',
        steps: [{ kind: 'pip-install', packages: ['requests'] }, { kind: 'pip-upgrade' }],
      }),
      'mini.json',
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.name).toBe('mini');
      expect(result.value.baseImage).toEqual({ ref: 'python:3.12-slim', repository: 'python', tag: '3.12-slim' });
      expect(result.value.baseTools).toEqual(DEFAULT_BASE_TOOLS);
      expect(result.value.labels).toEqual({});
      expect(result.value.steps.map((step) => step.id)).toEqual(['1-pip-install', '2-pip-upgrade']);
      expect(result.value.steps[1]?.run[0]?.args).toEqual(['install', '--upgrade', 'pip']);
    }
  });

  it('should build generic commands', () => {
    const result = parseRecipe(
      [
        'name: corpora',
        'baseImage: python:3.11',
        'steps:',
        '  - id: punkt',
        '    kind: run',
        '    command: python',
        '    args: [-m, nltk.downloader, punkt]',
        '    env: { NLTK_DATA: /usr/share/nltk_data }',
      ].join('\n'),
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.steps[0]?.run).toEqual([
        {
          command: 'python',
          args: ['-m', 'nltk.downloader', 'punkt'],
          expectedExitCode: 0,
          env: { NLTK_DATA: '/usr/share/nltk_data' },
        },
      ]);
    }
  });

  it('should report schema violations with their path', () => {
    const result = parseRecipe('name: broken\nbaseImage: python:3.11\n', 'broken.yaml');

    expect(result).toEqual({ ok: false, error: 'Invalid recipe broken.yaml: steps: Required' });
  });

  it('should reject unknown step kinds', () => {
    const result = parseRecipe('name: x\nbaseImage: python:3.11\nsteps:\n  - kind: brew\n', 'x.yaml');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toContain('steps.0.kind');
  });

  it('should report unparseable text', () => {
    const result = parseRecipe('name: [unclosed', 'bad.yaml');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Cannot parse bad.yaml:')).toBe(true);
  });

  it('should reject recipe names that are not plain names', () => {
    const result = parseRecipe('name: "agent bench"\nbaseImage: python:3.11\nsteps: []\n', 'spaced.yaml');

    expect(result).toEqual({
      ok: false,
      error: 'Invalid recipe spaced.yaml: name: Recipe name may contain only letters, digits, ".", "_" and "-"',
    });
  });

  it('should reject label keys with whitespace', () => {
    const result = parseRecipe(
      'name: labelled\nbaseImage: python:3.11\nlabels:\n  "bad key": x\nsteps: []\n',
      'labelled.yaml',
    );

    expect(result).toEqual({ ok: false, error: 'Invalid recipe labelled.yaml: labels.bad key: Invalid label key' });
  });

  it('should keep a multi-line description out of the instructions', () => {
    const result = parseRecipe(
      [
        'name: folded',
        'baseImage: python:3.11',
        'steps:',
        '  - id: one',
        '    kind: pip-install',
        '    packages: [requests]',
        '    description: |-',
        '      first line',
        '      RUN false',
      ].join('\n'),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const rendered = renderDockerfile(result.value);
    expect(rendered.content).toBe(
      ['# Recipe: folded', 'FROM python:3.11', '', '# first line', '# RUN false', 'RUN pip install requests', ''].join('\n'),
    );
    expect(stepForInstruction(rendered, 2)).toBe('one');
  });

  it('should reject an invalid base image', () => {
    const result = parseRecipe('name: x\nbaseImage: Not Valid\nsteps: []\n');

    expect(result).toEqual({ ok: false, error: 'Base image reference contains whitespace: Not Valid' });
  });
});

describe('resolveRecipe', () => {
  it('should default to the built-in recipe', async () => {
    expect(await resolveRecipe()).toEqual({ ok: true, value: createAgentBenchRecipe() });
  });

  it('should replace the base image', async () => {
    const result = await resolveRecipe({ baseImage: 'python:3.12' });

    expect(result.ok && result.value.baseImage).toEqual({ ref: 'python:3.12', repository: 'python', tag: '3.12' });
  });

  it('should reject an invalid base image override', async () => {
    expect(await resolveRecipe({ baseImage: 'Bad Ref' })).toEqual({
      ok: false,
      error: 'Base image reference contains whitespace: Bad Ref',
    });
  });
});

describe('recipeJsonSchema', () => {
  it('should describe the recipe file format', () => {
    const schema = recipeJsonSchema();

    expect(schema).toHaveProperty('$ref', '#/definitions/recipe');
    expect(schema).toHaveProperty('definitions.recipe.required', ['name', 'baseImage', 'steps']);
  });
});
