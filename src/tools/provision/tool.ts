/**
 * Apply a recipe directly to the machine this process runs on (an existing container or VM),
 * step by step, stopping at the first failure.
 */

import path from 'node:path';
import { promises as fs } from 'node:fs';
import { CommandExecutor, type CommandRunner } from '../../infrastructure/command-executor';
import { runSequence, type InvocationRunner } from '../../lib/sequence';
import { createTimer, type Logger } from '../../lib/logger';
import { validateRecipe } from '../../domain/validators';
import { RecipeValidationError } from '../../errors';
import { Success, Failure, type Result, type ProvisionReport } from '../../domain/types';
import { buildPlan, type PlanResult } from '../plan/tool';
import { recipeFor } from '../shared';
import type { ToolContext } from '../types';
import type { ProvisionParams } from './schema';

export type ProvisionResult = { dryRun: true; plan: PlanResult } | { dryRun: false; report: ProvisionReport };

/**
 * Invocation runner for the local machine. `stdoutTo` files are written only after the command
 * exits as expected.
 */
export function createLocalRunner(executor: CommandRunner, logger: Logger): InvocationRunner {
  return async (invocation) => {
    const env = invocation.env ? { ...process.env, ...invocation.env } : process.env;
    const result = await executor.execute(invocation.command, invocation.args, { env });

    if (result.timedOut) {
      logger.warn({ command: invocation.command }, 'Command killed after exceeding the step timeout');
    }

    if (result.exitCode === invocation.expectedExitCode && invocation.stdoutTo) {
      await fs.mkdir(path.dirname(invocation.stdoutTo), { recursive: true });
      await fs.writeFile(invocation.stdoutTo, `${result.stdout}\n`, 'utf-8');
    }

    return { exitCode: result.exitCode, output: result.stderr || result.stdout };
  };
}

export async function provision(
  params: ProvisionParams,
  context: ToolContext,
): Promise<Result<ProvisionResult>> {
  const { logger, config } = context;
  const timer = createTimer(logger, 'provision');

  const recipeResult = await recipeFor(params, context);
  if (!recipeResult.ok) {
    timer.error(recipeResult.error);
    return Failure(recipeResult.error);
  }
  const recipe = recipeResult.value;

  const validation = validateRecipe(recipe);
  if (!validation.valid) {
    const error = new RecipeValidationError(`Recipe ${recipe.name} is invalid`, validation.errors);
    logger.error({ error: error.toJSON() }, 'Refusing to provision an invalid recipe');
    timer.error(error);
    return Failure(`${error.message}: ${validation.errors.map((issue) => issue.message).join('; ')}`);
  }

  if (params.dryRun) {
    const plan = buildPlan(recipe);
    timer.end({ recipe: recipe.name, dryRun: true });
    return Success({ dryRun: true, plan });
  }

  const executor =
    context.executor ??
    new CommandExecutor(logger, {
      timeout: config.provisioner.stepTimeout,
      maxBuffer: config.provisioner.maxOutput,
    });

  const report = await runSequence(recipe.steps, createLocalRunner(executor, logger), {
    recipe: recipe.name,
    backend: 'local',
    logger,
  });

  if (report.status === 'succeeded') {
    timer.end({ runId: report.runId, steps: report.steps.length });
  } else {
    timer.error(`step ${report.failedStep ?? 'unknown'} exited ${report.exitCode}`, { runId: report.runId });
  }

  return Success({ dryRun: false, report });
}
