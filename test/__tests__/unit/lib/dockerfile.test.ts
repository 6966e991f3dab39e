/**
 * Unit Tests: Dockerfile rendering
 */

import { renderDockerfile, stepForInstruction } from '../../../../src/lib/dockerfile';
import { createAgentBenchRecipe } from '../../../../src/recipes';
import { runCommand } from '../../../../src/domain/steps';

describe('renderDockerfile', () => {
  const recipe = createAgentBenchRecipe();
  const rendered = renderDockerfile(recipe);

  it('should start from the base image with the maintainer label', () => {
    expect(rendered.content.startsWith(
      [
        '# Recipe: agent-bench',
        'FROM mcr.microsoft.com/devcontainers/python:3.11',
        'LABEL maintainer="AutoGen"',
        '',
        '# ffmpeg and exiftool are needed for document conversion',
        'RUN apt-get update && DEBIAN_FRONTEND=noninteractive apt-get install -y ffmpeg exiftool',
        '',
      ].join('\n'),
    )).toBe(true);
  });

  it('should render one RUN instruction per step, in order', () => {
    const runs = rendered.instructions.filter((instruction) => instruction.text.startsWith('RUN '));

    expect(runs.map((instruction) => instruction.stepId)).toEqual(recipe.steps.map((step) => step.id));
    expect(runs.map((instruction) => instruction.number)).toEqual([3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  it('should render each step kind', () => {
    const textOf = (stepId: string): string | undefined =>
      rendered.instructions.find((instruction) => instruction.stepId === stepId)?.text;

    expect(textOf('timezone')).toBe(
      'RUN ln -snf /usr/share/zoneinfo/US/Pacific /etc/localtime && echo US/Pacific > /etc/timezone',
    );
    expect(textOf('upgrade-pip')).toBe('RUN pip install --upgrade pip');
    expect(textOf('preload-framework')).toBe('RUN pip install autogen-core autogen-agentchat autogen-ext pyyaml');
    expect(textOf('drop-framework')).toBe('RUN pip uninstall --yes autogen-core autogen-agentchat autogen-ext');
    expect(textOf('document-tools')).toBe(
      'RUN pip install markitdown SpeechRecognition pydub youtube_transcript_api==0.6.0',
    );
    expect(textOf('chromium')).toBe('RUN playwright install --with-deps chromium');
  });

  it('should end with a newline after the last instruction', () => {
    expect(rendered.content.endsWith('\n# Fetch browser engines: chromium (with OS dependencies)\nRUN playwright install --with-deps chromium\n')).toBe(true);
  });

  it('should accept a base image override', () => {
    const custom = renderDockerfile(recipe, { baseImage: 'python:3.12-slim' });

    expect(custom.instructions[0]).toEqual({ number: 1, text: 'FROM python:3.12-slim' });
  });

  it('should quote label values', () => {
    const labelled = renderDockerfile({ ...recipe, labels: { description: 'agent "bench" image' } });

    expect(labelled.instructions[1]?.text).toBe('LABEL description="agent \\"bench\\" image"');
  });

  it('should quote label keys that are not plain names', () => {
    const labelled = renderDockerfile({ ...recipe, labels: { 'bad key\nRUN false': 'x' } });

    expect(labelled.instructions[1]?.text).toBe('LABEL "bad key\\nRUN false"="x"');
    expect(labelled.content.split('\n').filter((line) => line.startsWith('RUN false'))).toEqual([]);
  });

  it('should keep every line of a multi-line description inside a comment', () => {
    const multiline = renderDockerfile({
      ...recipe,
      name: 'two\nlines',
      steps: [runCommand('one', 'pip', ['install', 'requests'], { description: 'first line\nRUN false' })],
    });

    expect(multiline.content).toBe(
      [
        '# Recipe: two',
        '# lines',
        'FROM mcr.microsoft.com/devcontainers/python:3.11',
        'LABEL maintainer="AutoGen"',
        '',
        '# first line',
        '# RUN false',
        'RUN pip install requests',
        '',
      ].join('\n'),
    );
    expect(multiline.instructions.map((instruction) => instruction.number)).toEqual([1, 2, 3]);
    expect(stepForInstruction(multiline, 3)).toBe('one');
  });
});

describe('stepForInstruction', () => {
  const rendered = renderDockerfile(createAgentBenchRecipe());

  it('should map an instruction number to its step', () => {
    expect(stepForInstruction(rendered, 4)).toBe('timezone');
    expect(stepForInstruction(rendered, 11)).toBe('chromium');
  });

  it('should return undefined for instructions that are not steps', () => {
    expect(stepForInstruction(rendered, 1)).toBeUndefined();
    expect(stepForInstruction(rendered, 12)).toBeUndefined();
  });
});
