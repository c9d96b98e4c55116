export { selectDeployMode, type ModeSelection, type ModeSelectionInput } from './mode-selector.js';
export { NamespaceProvisioner, type ProvisionResult } from './namespace-provisioner.js';
export {
  RolloutWaiter,
  type RolloutWaiterOptions,
  type RolloutTarget,
  type RolloutTransition,
  type RolloutWaitResult,
  type TerminalRolloutState,
} from './rollout-waiter.js';
