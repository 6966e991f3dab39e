/**
 * Validate a recipe statically: package specs, step ids, and that every executable a step calls
 * exists by the time the step runs.
 */

import { validateRecipe, type RecipeValidation } from '../../domain/validators';
import { projectPackageState, summarizePackageState } from '../../domain/package-state';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result } from '../../domain/types';
import { recipeFor } from '../shared';
import type { ToolContext } from '../types';
import type { ValidateRecipeParams } from './schema';

export interface ValidateRecipeResult extends RecipeValidation {
  recipe: string;
  steps: number;
  /** What the image should contain once every step has run */
  expected: ReturnType<typeof summarizePackageState>;
}

export async function validateRecipeFile(
  params: ValidateRecipeParams,
  context: ToolContext,
): Promise<Result<ValidateRecipeResult>> {
  const { logger } = context;
  const timer = createTimer(logger, 'validate-recipe');

  const recipeResult = await recipeFor(params, context);
  if (!recipeResult.ok) {
    timer.error(recipeResult.error);
    return Failure(recipeResult.error);
  }

  const recipe = recipeResult.value;
  const validation = validateRecipe(recipe);
  for (const warning of validation.warnings) {
    logger.warn({ code: warning.code, step: warning.stepId }, warning.message);
  }

  timer.end({ recipe: recipe.name, valid: validation.valid, errors: validation.errors.length });
  return Success({
    ...validation,
    recipe: recipe.name,
    steps: recipe.steps.length,
    expected: summarizePackageState(projectPackageState(recipe)),
  });
}
