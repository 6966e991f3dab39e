/**
 * Render a recipe as a Dockerfile, one RUN layer per build step.
 *
 * @example
 * ```typescript
 * const result = await renderDockerfileFromRecipe({ output: 'build/Dockerfile' }, context);
 * ```
 */

import path from 'node:path';
import { promises as fs } from 'node:fs';
import { renderDockerfile, type DockerfileInstruction } from '../../lib/dockerfile';
import { createTimer } from '../../lib/logger';
import { errorMessage } from '../../errors';
import { Success, Failure, type Result } from '../../domain/types';
import { recipeFor } from '../shared';
import type { ToolContext } from '../types';
import type { RenderDockerfileParams } from './schema';

export interface RenderDockerfileResult {
  recipe: string;
  content: string;
  instructions: DockerfileInstruction[];
  /** Absolute path written, when an output path was given */
  path?: string;
}

export async function renderDockerfileFromRecipe(
  params: RenderDockerfileParams,
  context: ToolContext,
): Promise<Result<RenderDockerfileResult>> {
  const { logger } = context;
  const timer = createTimer(logger, 'render-dockerfile');

  const recipeResult = await recipeFor(params, context);
  if (!recipeResult.ok) {
    timer.error(recipeResult.error);
    return Failure(recipeResult.error);
  }

  const recipe = recipeResult.value;
  const rendered = renderDockerfile(recipe);
  const result: RenderDockerfileResult = {
    recipe: recipe.name,
    content: rendered.content,
    instructions: rendered.instructions,
  };

  if (params.output) {
    const target = path.resolve(params.output);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, rendered.content, 'utf-8');
    } catch (error) {
      timer.error(error);
      return Failure(`Cannot write Dockerfile to ${target}: ${errorMessage(error)}`);
    }
    result.path = target;
  }

  timer.end({ recipe: recipe.name, instructions: rendered.instructions.length });
  return Success(result);
}
