/**
 * Schema definition for recipe files (YAML or JSON)
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { LABEL_KEY_PATTERN, RECIPE_NAME_PATTERN } from '../domain/validators';

const stepCommon = {
  id: z.string().min(1).optional().describe('Unique step identifier (defaults to <position>-<kind>)'),
  description: z.string().optional().describe('Comment rendered above the layer'),
};

const packagesSchema = z.array(z.string()).describe('Package specs, optionally pinned');

export const recipeStepSchema = z.discriminatedUnion('kind', [
  z.object({ ...stepCommon, kind: z.literal('apt-install'), packages: packagesSchema }),
  z.object({ ...stepCommon, kind: z.literal('timezone'), zone: z.string().describe('Zone name, e.g. US/Pacific') }),
  z.object({ ...stepCommon, kind: z.literal('pip-upgrade'), packages: packagesSchema.default(['pip']) }),
  z.object({ ...stepCommon, kind: z.literal('pip-install'), packages: packagesSchema }),
  z.object({ ...stepCommon, kind: z.literal('pip-uninstall'), packages: packagesSchema }),
  z.object({
    ...stepCommon,
    kind: z.literal('playwright-install'),
    browsers: z.array(z.string()).describe('Browser engines to fetch'),
    withDeps: z.boolean().default(true).describe('Also install the engines\' OS dependencies'),
  }),
  z.object({
    ...stepCommon,
    kind: z.literal('run'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    expectedExitCode: z.number().int().min(0).max(255).default(0),
    env: z.record(z.string()).optional(),
    stdoutTo: z.string().optional().describe('File receiving standard output'),
    provides: z.array(z.string()).optional().describe('Executables this command installs'),
  }),
]);

export const recipeFileSchema = z.object({
  name: z
    .string()
    .regex(RECIPE_NAME_PATTERN, 'Recipe name may contain only letters, digits, ".", "_" and "-"')
    .describe('Recipe name'),
  baseImage: z.string().min(1).describe('Registry path and tag of the starting image'),
  baseTools: z.array(z.string()).optional().describe('Executables the base image ships'),
  labels: z
    .record(z.string().regex(LABEL_KEY_PATTERN, 'Invalid label key'), z.string())
    .default({})
    .describe('Image metadata labels'),
  steps: z.array(recipeStepSchema).describe('Ordered build steps'),
});

export type RecipeStepInput = z.infer<typeof recipeStepSchema>;
export type RecipeFile = z.infer<typeof recipeFileSchema>;

/**
 * JSON Schema for editor completion and external validation of recipe files.
 */
export function recipeJsonSchema(): ReturnType<typeof zodToJsonSchema> {
  return zodToJsonSchema(recipeFileSchema, 'recipe');
}
