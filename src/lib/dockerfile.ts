/**
 * Dockerfile rendering for recipes.
 *
 * One `RUN` instruction per build step, so each step is exactly one layer and a failing
 * instruction identifies the failing step.
 */

import { formatBaseImage } from '../domain/base-image';
import { renderInvocations } from './shell';
import { LABEL_KEY_PATTERN } from '../domain/validators';
import type { Recipe } from '../domain/types';

export interface DockerfileInstruction {
  /** 1-based instruction number, as Docker reports it in `Step N/M` */
  number: number;
  /** Instruction text without comments */
  text: string;
  /** Build step rendered by this instruction */
  stepId?: string;
}

export interface RenderedDockerfile {
  content: string;
  instructions: DockerfileInstruction[];
}

export interface RenderOptions {
  /** Overrides the recipe's base image reference */
  baseImage?: string;
}

function quoteLabelValue(value: string): string {
  return JSON.stringify(value);
}

/** One `#` line per line of text, so no line of it can become an instruction */
function comment(text: string): string[] {
  return text.split(/\r?\n|\r/).map((line) => `# ${line}`);
}

export function renderDockerfile(recipe: Recipe, options: RenderOptions = {}): RenderedDockerfile {
  const lines: string[] = comment(`Recipe: ${recipe.name}`);
  const instructions: DockerfileInstruction[] = [];

  const push = (text: string, stepId?: string): void => {
    const instruction: DockerfileInstruction = { number: instructions.length + 1, text };
    if (stepId) instruction.stepId = stepId;
    instructions.push(instruction);
    lines.push(text);
  };

  push(`FROM ${options.baseImage ?? formatBaseImage(recipe.baseImage)}`);

  for (const [key, value] of Object.entries(recipe.labels)) {
    const name = LABEL_KEY_PATTERN.test(key) ? key : quoteLabelValue(key);
    push(`LABEL ${name}=${quoteLabelValue(value)}`);
  }

  for (const step of recipe.steps) {
    lines.push('', ...comment(step.description));
    push(`RUN ${renderInvocations(step.run)}`, step.id);
  }

  return { content: `${lines.join('\n')}\n`, instructions };
}

/**
 * Step id for an instruction number reported by the builder.
 */
export function stepForInstruction(rendered: RenderedDockerfile, number: number): string | undefined {
  return rendered.instructions.find((instruction) => instruction.number === number)?.stepId;
}
