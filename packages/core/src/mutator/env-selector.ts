/**
 * Targets addressed by env patch selectors:
 *
 *   container.env              every container in the overlay's patch files
 *   <container-name>.env       containers with that name
 *   configMapGenerator.<name>  literals of a configMapGenerator entry
 */

export type EnvTarget =
  | { kind: 'all-containers' }
  | { kind: 'container'; containerName: string }
  | { kind: 'config-map'; generatorName: string };

const CONTAINER_NAME = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const GENERATOR_NAME = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;
const CONFIG_MAP_PREFIX = 'configMapGenerator.';
const ENV_SUFFIX = '.env';

/**
 * Parse a selector, or return undefined when it does not follow the grammar
 */
export function parseEnvSelector(selector: string): EnvTarget | undefined {
  if (selector.startsWith(CONFIG_MAP_PREFIX)) {
    const generatorName = selector.slice(CONFIG_MAP_PREFIX.length);
    return GENERATOR_NAME.test(generatorName) ? { kind: 'config-map', generatorName } : undefined;
  }

  if (selector.endsWith(ENV_SUFFIX)) {
    const containerName = selector.slice(0, -ENV_SUFFIX.length);
    if (containerName === 'container') {
      return { kind: 'all-containers' };
    }
    return CONTAINER_NAME.test(containerName) ? { kind: 'container', containerName } : undefined;
  }

  return undefined;
}

export function describeEnvTarget(target: EnvTarget): string {
  switch (target.kind) {
    case 'all-containers':
      return 'any container';
    case 'container':
      return `a container named '${target.containerName}'`;
    case 'config-map':
      return `a configMapGenerator named '${target.generatorName}'`;
  }
}
