/**
 * Mode Selector
 */

import { DEPLOY_MODES, GITOPS_MANAGER, type DeployMode, type ForceMode } from '@keelson/shared';

export interface ModeSelectionInput {
  forceMode: ForceMode;
  detectGitops: boolean;
  managedBy?: string;
}

export interface ModeSelection {
  mode: DeployMode;
  reason: 'forced' | 'managed-by-gitops' | 'default';
}

/**
 * An explicit mode always wins. Under 'auto', GitOps is chosen only when
 * detection is on and the primary workload is managed by Argo CD.
 */
export function selectDeployMode(input: ModeSelectionInput): ModeSelection {
  if (input.forceMode !== 'auto') {
    return { mode: input.forceMode, reason: 'forced' };
  }
  if (input.detectGitops && input.managedBy === GITOPS_MANAGER) {
    return { mode: DEPLOY_MODES.GITOPS, reason: 'managed-by-gitops' };
  }
  return { mode: DEPLOY_MODES.KUBECTL, reason: 'default' };
}
