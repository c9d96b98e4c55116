export {
  ManifestMutator,
  toLabelValue,
  trackingAnnotations,
  type ManifestMutatorOptions,
  type MutationRequest,
  type MutationResult,
} from './manifest-mutator.js';
export { parseEnvSelector, describeEnvTarget, type EnvTarget } from './env-selector.js';
export { KUSTOMIZATION_FILE_NAMES } from './yaml-file.js';
