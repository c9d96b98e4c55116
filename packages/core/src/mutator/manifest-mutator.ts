/**
 * Manifest Mutator
 * Writes image overrides, the version label, tracking annotations and env
 * patches into a kustomize overlay. All edits are made in memory first, so an
 * unresolvable selector fails before any file is written.
 */

import { resolve } from 'node:path';
import { isMap, isScalar, isSeq, type YAMLMap, type YAMLSeq } from 'yaml';
import {
  BuildError,
  createLogger,
  VERSION_LABEL,
  type EnvPatchSet,
  type ImageSpec,
  type Logger,
  type RunContext,
} from '@keelson/shared';
import { describeEnvTarget, parseEnvSelector, type EnvTarget } from './env-selector.js';
import {
  ensureMap,
  ensureSeq,
  findKustomizationFile,
  findMapBy,
  loadDocumentsFile,
  loadMappingFile,
  saveIfChanged,
  type YamlFile,
} from './yaml-file.js';

export interface ManifestMutatorOptions {
  /** Domain prefix for tracking annotations */
  annotationPrefix: string;
  logger?: Logger;
}

export interface MutationRequest {
  overlayDir: string;
  imageSpec: ImageSpec;
  envPatches: EnvPatchSet;
  run: RunContext;
}

export interface MutationResult {
  kustomizationPath: string;
  /** Absolute paths of files whose content changed */
  touchedFiles: string[];
  annotations: Record<string, string>;
  versionLabel: string;
}

// Paths from a workload (or a patch of one) to its containers
const CONTAINER_PATHS: readonly (readonly string[])[] = [
  ['spec', 'template', 'spec', 'containers'],
  ['spec', 'jobTemplate', 'spec', 'template', 'spec', 'containers'],
];

const LABEL_VALUE_MAX = 63;

/**
 * Fit an image tag into a label value: at most 63 characters from
 * [A-Za-z0-9-_.], starting and ending alphanumeric
 */
export function toLabelValue(tag: string): string {
  return tag
    .replace(/[^A-Za-z0-9._-]/g, '-')
    .slice(0, LABEL_VALUE_MAX)
    .replace(/^[^A-Za-z0-9]+/, '')
    .replace(/[^A-Za-z0-9]+$/, '');
}

export function trackingAnnotations(prefix: string, run: RunContext, primaryTag: string): Record<string, string> {
  return {
    [`${prefix}/last-deployed-by`]: run.actor,
    [`${prefix}/deployment-id`]: `${run.serviceName}@${primaryTag}`,
    [`${prefix}/run-id`]: run.runId,
    [`${prefix}/environment`]: run.environment,
    [`${prefix}/deployed-at`]: run.timestamp.toISOString(),
  };
}

interface ContainerNode {
  file: YamlFile;
  name: string | undefined;
  node: YAMLMap;
}

export class ManifestMutator {
  private readonly annotationPrefix: string;
  private readonly logger: Logger;

  constructor(options: ManifestMutatorOptions) {
    this.annotationPrefix = options.annotationPrefix;
    this.logger = options.logger ?? createLogger('ManifestMutator');
  }

  async mutate(request: MutationRequest): Promise<MutationResult> {
    const kustomizationPath = await findKustomizationFile(request.overlayDir);
    const { file: kustomization, root } = await loadMappingFile(kustomizationPath, 'kustomization');
    const primaryTag = request.imageSpec.images[0].newTag;

    this.setImages(root, request.imageSpec, kustomizationPath);
    const versionLabel = toLabelValue(primaryTag);
    this.setVersionLabel(root, versionLabel, kustomizationPath);

    const annotations = trackingAnnotations(this.annotationPrefix, request.run, primaryTag);
    const commonAnnotations = ensureMap(root, 'commonAnnotations', kustomizationPath);
    for (const [key, value] of Object.entries(annotations)) {
      commonAnnotations.set(key, value);
    }

    const patchFiles = await this.applyEnvPatches(request, root, kustomizationPath);

    const touchedFiles: string[] = [];
    for (const file of [kustomization, ...patchFiles]) {
      if (await saveIfChanged(file)) {
        touchedFiles.push(resolve(file.path));
      }
    }

    this.logger.info(
      {
        overlayDir: request.overlayDir,
        images: request.imageSpec.images.map((image) => `${image.name}:${image.newTag}`),
        touchedFiles,
      },
      touchedFiles.length > 0 ? 'Overlay updated' : 'Overlay already up to date'
    );

    return { kustomizationPath: resolve(kustomizationPath), touchedFiles, annotations, versionLabel };
  }

  /**
   * Upsert image overrides by repository name. A digest would take precedence
   * over the tag, so it is dropped.
   */
  private setImages(root: YAMLMap, imageSpec: ImageSpec, where: string): void {
    const images = ensureSeq(root, 'images', where);

    for (const ref of imageSpec.images) {
      const existing = findMapBy(images, 'name', ref.name);
      if (existing) {
        existing.set('newTag', ref.newTag);
        existing.delete('digest');
      } else {
        images.add({ name: ref.name, newTag: ref.newTag });
      }
    }
  }

  /**
   * Keep the version label in its own `labels` entry so it never reaches
   * selectors, which are immutable on Deployments
   */
  private setVersionLabel(root: YAMLMap, value: string, where: string): void {
    const labels = ensureSeq(root, 'labels', where);
    let dedicated: YAMLMap | undefined;

    for (const entry of labels.items) {
      if (!isMap(entry)) continue;
      const pairs = entry.get('pairs', true);
      if (!isMap(pairs) || !pairs.has(VERSION_LABEL)) continue;

      if (pairs.items.length === 1 && dedicated === undefined) {
        dedicated = entry;
      } else {
        pairs.delete(VERSION_LABEL);
      }
    }

    if (dedicated) {
      const pairs = ensureMap(dedicated, 'pairs', where);
      pairs.set(VERSION_LABEL, value);
      dedicated.set('includeSelectors', false);
      dedicated.set('includeTemplates', true);
      return;
    }

    labels.add({ pairs: { [VERSION_LABEL]: value }, includeSelectors: false, includeTemplates: true });
  }

  private async applyEnvPatches(request: MutationRequest, root: YAMLMap, where: string): Promise<YamlFile[]> {
    const selectors = Object.entries(request.envPatches);
    if (selectors.length === 0) {
      return [];
    }

    let containers: ContainerNode[] | undefined;
    const loadContainers = async () => {
      containers ??= await this.collectContainers(request.overlayDir, root, where);
      return containers;
    };

    const modified = new Set<YamlFile>();

    for (const [selector, variables] of selectors) {
      const target = parseEnvSelector(selector);
      if (target === undefined) {
        throw new BuildError(`Unsupported env patch selector '${selector}'`, { selector });
      }

      if (target.kind === 'config-map') {
        this.patchGeneratorLiterals(root, target.generatorName, variables, selector, where);
        continue;
      }

      const matched = (await loadContainers()).filter((c) => matchesContainer(target, c.name));
      if (matched.length === 0) {
        throw new BuildError(
          `env_patches selector '${selector}' matches no container: no patch file of ${where} declares ${describeEnvTarget(target)}`,
          { selector }
        );
      }

      for (const container of matched) {
        upsertEnv(container.node, variables, container.file.path);
        modified.add(container.file);
      }
    }

    return [...modified];
  }

  private patchGeneratorLiterals(
    root: YAMLMap,
    generatorName: string,
    variables: Record<string, string>,
    selector: string,
    where: string
  ): void {
    const generators = root.get('configMapGenerator', true);
    const generator = isSeq(generators) ? findMapBy(generators, 'name', generatorName) : undefined;
    if (!generator) {
      throw new BuildError(
        `env_patches selector '${selector}' matches no configMapGenerator named '${generatorName}' in ${where}`,
        { selector }
      );
    }

    const literals = ensureSeq(generator, 'literals', where);
    for (const [key, value] of Object.entries(variables)) {
      upsertLiteral(literals, key, value);
    }
  }

  /**
   * Containers declared in the overlay's strategic-merge patch files
   */
  private async collectContainers(overlayDir: string, root: YAMLMap, where: string): Promise<ContainerNode[]> {
    const containers: ContainerNode[] = [];

    for (const path of patchFilePaths(root)) {
      const file = await loadDocumentsFile(resolve(overlayDir, path), `patch file listed in ${where}`);
      for (const doc of file.documents) {
        const contents = doc.contents;
        if (!isMap(contents)) continue;

        for (const containerPath of CONTAINER_PATHS) {
          const list = contents.getIn(containerPath, true);
          if (!isSeq(list)) continue;
          for (const node of list.items) {
            if (!isMap(node)) continue;
            const name = node.get('name');
            containers.push({ file, name: typeof name === 'string' ? name : undefined, node });
          }
        }
      }
    }

    this.logger.debug({ overlayDir, containers: containers.length }, 'Patch containers collected');
    return containers;
  }
}

function matchesContainer(target: EnvTarget, name: string | undefined): boolean {
  if (target.kind === 'all-containers') return true;
  return target.kind === 'container' && name === target.containerName;
}

/**
 * Relative paths of patch files, from `patches[].path` and string entries of
 * `patchesStrategicMerge` (inline patches are skipped)
 */
function patchFilePaths(root: YAMLMap): string[] {
  const paths = new Set<string>();

  const patches = root.get('patches', true);
  if (isSeq(patches)) {
    for (const entry of patches.items) {
      if (!isMap(entry)) continue;
      const path = entry.get('path');
      if (typeof path === 'string') paths.add(path);
    }
  }

  const strategicMerge = root.get('patchesStrategicMerge', true);
  if (isSeq(strategicMerge)) {
    for (const entry of strategicMerge.items) {
      if (isScalar(entry) && typeof entry.value === 'string' && !entry.value.includes('\n')) {
        paths.add(entry.value);
      }
    }
  }

  return [...paths];
}

/**
 * Set env entries by name. A literal value replaces any valueFrom; entries not
 * named in the patch are left alone.
 */
function upsertEnv(container: YAMLMap, variables: Record<string, string>, where: string): void {
  const env = ensureSeq(container, 'env', where);
  for (const [name, value] of Object.entries(variables)) {
    const existing = findMapBy(env, 'name', name);
    if (existing) {
      existing.set('value', value);
      existing.delete('valueFrom');
    } else {
      env.add({ name, value });
    }
  }
}

function upsertLiteral(literals: YAMLSeq, key: string, value: string): void {
  const literal = `${key}=${value}`;
  const index = literals.items.findIndex(
    (item) => isScalar(item) && typeof item.value === 'string' && item.value.startsWith(`${key}=`)
  );
  if (index === -1) {
    literals.add(literal);
    return;
  }
  literals.set(index, literal);
}
