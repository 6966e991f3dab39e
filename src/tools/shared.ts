/**
 * Helpers shared by the provisioning tools
 */

import { resolveRecipe } from '../recipes';
import type { Recipe, Result } from '../domain/types';
import type { RecipeParams, ToolContext } from './types';

/**
 * Resolve the recipe a tool works on: explicit path, then PROVISIONER_RECIPE, then the built-in one.
 */
export function recipeFor(params: RecipeParams, context: ToolContext): Promise<Result<Recipe>> {
  const recipePath = params.recipePath ?? context.config.provisioner.recipePath;
  return resolveRecipe({
    ...(recipePath ? { recipePath } : {}),
    ...(params.baseImage ? { baseImage: params.baseImage } : {}),
  });
}
