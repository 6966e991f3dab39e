/**
 * List the steps of a recipe and the exact commands each one runs, without running anything.
 */

import { formatBaseImage } from '../../domain/base-image';
import { renderInvocation } from '../../lib/shell';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result, type Recipe, type StepKind } from '../../domain/types';
import { recipeFor } from '../shared';
import type { ToolContext } from '../types';
import type { PlanParams } from './schema';

export interface PlanEntry {
  index: number;
  id: string;
  kind: StepKind;
  description: string;
  /** One shell-rendered line per invocation */
  commands: string[];
}

export interface PlanResult {
  recipe: string;
  baseImage: string;
  steps: PlanEntry[];
}

export function buildPlan(recipe: Recipe): PlanResult {
  return {
    recipe: recipe.name,
    baseImage: formatBaseImage(recipe.baseImage),
    steps: recipe.steps.map((step, index) => ({
      index,
      id: step.id,
      kind: step.kind,
      description: step.description,
      commands: step.run.map(renderInvocation),
    })),
  };
}

export async function planRecipe(params: PlanParams, context: ToolContext): Promise<Result<PlanResult>> {
  const timer = createTimer(context.logger, 'plan');

  const recipeResult = await recipeFor(params, context);
  if (!recipeResult.ok) {
    timer.error(recipeResult.error);
    return Failure(recipeResult.error);
  }

  const plan = buildPlan(recipeResult.value);
  timer.end({ recipe: plan.recipe, steps: plan.steps.length });
  return Success(plan);
}
