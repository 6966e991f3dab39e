export { recipeSchema } from './tool';
