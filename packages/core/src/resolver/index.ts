export {
  resolveInputs,
  resolveImageSpec,
  resolveEnvPatches,
  type ResolverInput,
  type ResolvedInputs,
} from './image-resolver.js';
