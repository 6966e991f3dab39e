/**
 * JSON Schema of the recipe file format, for editors and external validators.
 */

import { recipeJsonSchema } from '../../recipes';
import { Success, type Result } from '../../domain/types';
import type { ToolContext } from '../types';

export function recipeSchema(context: ToolContext): Result<object> {
  context.logger.debug('Generating recipe JSON Schema');
  return Success(recipeJsonSchema());
}
