/**
 * Recipe resolution: a recipe file when one is given, the built-in agent-bench recipe otherwise.
 */

import { parseBaseImage } from '../domain/base-image';
import { Failure, Success, type Recipe, type Result } from '../domain/types';
import { createAgentBenchRecipe } from './agent-bench';
import { loadRecipe } from './loader';

export { createAgentBenchRecipe, AGENT_BENCH_BASE_IMAGE, DEFAULT_BASE_TOOLS } from './agent-bench';
export { loadRecipe, parseRecipe, toRecipe } from './loader';
export { recipeFileSchema, recipeJsonSchema, type RecipeFile } from './schema';

export interface RecipeSource {
  /** Path to a YAML or JSON recipe */
  recipePath?: string;
  /** Replaces the recipe's base image */
  baseImage?: string;
}

export async function resolveRecipe(source: RecipeSource = {}): Promise<Result<Recipe>> {
  let recipe: Recipe;
  if (source.recipePath) {
    const loaded = await loadRecipe(source.recipePath);
    if (!loaded.ok) return loaded;
    recipe = loaded.value;
  } else {
    recipe = createAgentBenchRecipe();
  }

  if (source.baseImage) {
    const base = parseBaseImage(source.baseImage);
    if (!base.ok) {
      return Failure(base.error);
    }
    recipe = { ...recipe, baseImage: base.value };
  }

  return Success(recipe);
}
