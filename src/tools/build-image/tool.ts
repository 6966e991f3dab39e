/**
 * Build the resulting image of a recipe through the Docker Engine API.
 *
 * The recipe is validated, rendered to a Dockerfile in a temporary build context and built with
 * intermediate containers removed. Progress events are mapped back onto recipe steps; the first
 * failing step ends the build and the tag is never applied.
 *
 * @example
 * ```typescript
 * const result = await buildImage({ tag: 'agent-bench:2024-06' }, context);
 * if (result.ok && result.value.status === 'failed') {
 *   console.error(`step ${result.value.failedStep} exited ${result.value.exitCode}`);
 * }
 * ```
 */

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { nanoid } from 'nanoid';
import { createDockerClient, type DockerBuildOptions } from '../../infrastructure/docker/client';
import { renderDockerfile } from '../../lib/dockerfile';
import { BuildProgressTracker } from '../../lib/build-progress';
import { createTimer } from '../../lib/logger';
import { validateRecipe } from '../../domain/validators';
import { RecipeValidationError, errorMessage } from '../../errors';
import { Success, Failure, type Result, type ProvisionReport } from '../../domain/types';
import { recipeFor } from '../shared';
import type { ToolContext } from '../types';
import type { BuildImageParams } from './schema';

async function buildImageImpl(
  params: BuildImageParams,
  context: ToolContext,
): Promise<Result<ProvisionReport>> {
  const { logger, config } = context;
  const runId = nanoid(10);
  const timer = createTimer(logger, 'build-image', { runId });

  const recipeResult = await recipeFor(params, context);
  if (!recipeResult.ok) {
    timer.error(recipeResult.error);
    return Failure(recipeResult.error);
  }
  const recipe = recipeResult.value;

  const validation = validateRecipe(recipe);
  if (!validation.valid) {
    const error = new RecipeValidationError(`Recipe ${recipe.name} is invalid`, validation.errors);
    logger.error({ error: error.toJSON() }, 'Refusing to build an invalid recipe');
    timer.error(error);
    return Failure(`${error.message}: ${validation.errors.map((issue) => issue.message).join('; ')}`);
  }

  const tag = params.tag ?? config.provisioner.imageTag;
  const rendered = renderDockerfile(recipe);
  const docker = context.docker ?? createDockerClient(logger, { socketPath: config.docker.socketPath });

  let contextDir: string | undefined;
  try {
    contextDir = await fs.mkdtemp(path.join(os.tmpdir(), `provision-${recipe.name}-`));
    await fs.writeFile(path.join(contextDir, 'Dockerfile'), rendered.content, 'utf-8');
    logger.debug({ contextDir }, 'Build context prepared');

    const tracker = new BuildProgressTracker(
      rendered,
      recipe.steps,
      (number, stepId) => {
        if (stepId) {
          const step = recipe.steps.find((s) => s.id === stepId);
          logger.info({ runId, step: stepId, instruction: number }, step?.description ?? stepId);
        }
      },
      config.provisioner.maxOutput,
    );

    const buildOptions: DockerBuildOptions = {
      context: contextDir,
      dockerfile: 'Dockerfile',
      t: tag,
      labels: { 'org.opencontainers.image.title': recipe.name },
    };
    if (params.pull) buildOptions.pull = true;
    if (params.noCache) buildOptions.nocache = true;

    const startTime = Date.now();
    const events = await docker.buildImage(buildOptions, (event) => tracker.handle(event));
    if (!events.ok) {
      tracker.fail(events.error);
    }
    const outcome = tracker.finish();

    // transport failure before any step started
    if (outcome.status === 'failed' && !outcome.failedStep && !events.ok) {
      timer.error(events.error);
      return Failure(events.error);
    }

    const report: ProvisionReport = {
      runId,
      recipe: recipe.name,
      backend: 'docker',
      status: outcome.status,
      steps: outcome.steps,
      exitCode: outcome.exitCode,
      durationMs: Date.now() - startTime,
    };
    if (outcome.failedStep) report.failedStep = outcome.failedStep;

    if (outcome.status === 'succeeded') {
      report.tag = tag;
      if (outcome.imageId) {
        report.imageId = outcome.imageId;
      } else {
        const image = await docker.getImage(tag);
        if (image.ok) report.imageId = image.value.Id;
      }
      timer.end({ tag, imageId: report.imageId });
    } else {
      logger.error(
        { runId, step: report.failedStep, exitCode: report.exitCode, error: outcome.errorMessage },
        'Image build failed',
      );
      timer.error(outcome.errorMessage ?? 'build failed', { step: report.failedStep });
    }

    return Success(report);
  } catch (error) {
    timer.error(error);
    return Failure(errorMessage(error));
  } finally {
    if (contextDir && !config.provisioner.keepContext) {
      await fs.rm(contextDir, { recursive: true, force: true });
    }
  }
}

/**
 * Build image tool
 */
export const buildImage = buildImageImpl;
