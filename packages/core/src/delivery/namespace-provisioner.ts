/**
 * Namespace Provisioner
 */

import { createLogger, type Logger } from '@keelson/shared';
import type { ClusterClient } from '../types.js';

export type ProvisionResult = 'created' | 'exists' | 'skipped';

export class NamespaceProvisioner {
  private readonly logger: Logger;

  constructor(
    private readonly cluster: Pick<ClusterClient, 'namespaceExists' | 'createNamespace'>,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('NamespaceProvisioner');
  }

  /**
   * Create the namespace when enabled and missing. When disabled nothing is
   * checked; a missing namespace then surfaces as an apply failure.
   */
  async ensure(namespace: string, create: boolean): Promise<ProvisionResult> {
    if (!create) {
      this.logger.debug({ namespace }, 'Namespace creation disabled');
      return 'skipped';
    }

    if (await this.cluster.namespaceExists(namespace)) {
      return 'exists';
    }

    const result = await this.cluster.createNamespace(namespace);
    this.logger.info({ namespace, result }, result === 'created' ? 'Namespace created' : 'Namespace already exists');
    return result;
  }
}
