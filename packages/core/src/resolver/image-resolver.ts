/**
 * Image / Patch Resolver
 * Turns raw image and env patch inputs into typed structures, or fails
 * with a ValidationError before anything is touched.
 */

import { ValidationError, isRecord, type EnvPatchSet, type ImageRef, type ImageSpec } from '@keelson/shared';
import { parseEnvSelector } from '../mutator/env-selector.js';

export interface ResolverInput {
  image?: string;
  tag?: string;
  /** JSON array of { name, newTag } */
  imagesJson?: string;
  /** JSON object: selector -> variable -> value */
  envPatches?: string;
}

export interface ResolvedInputs {
  imageSpec: ImageSpec;
  envPatches: EnvPatchSet;
}

export function resolveInputs(input: ResolverInput): ResolvedInputs {
  return {
    imageSpec: resolveImageSpec(input),
    envPatches: resolveEnvPatches(input.envPatches),
  };
}

/**
 * A repository path with a tag or digest attached (`repo:tag`, `repo@sha256:...`)
 */
function hasTagOrDigest(name: string): boolean {
  const lastSegment = name.slice(name.lastIndexOf('/') + 1);
  return lastSegment.includes(':') || name.includes('@');
}

export function resolveImageSpec(input: ResolverInput): ImageSpec {
  const { image, tag, imagesJson } = input;
  const hasPair = image !== undefined || tag !== undefined;

  if (imagesJson !== undefined && hasPair) {
    throw new ValidationError('Provide either image and tag or images_json, not both');
  }

  if (imagesJson !== undefined) {
    return { source: 'list', images: parseImagesJson(imagesJson) };
  }

  if (!hasPair) {
    throw new ValidationError('Nothing to deploy: provide image and tag, or images_json');
  }
  if (image === undefined || image.trim() === '') {
    throw new ValidationError('tag was given without image');
  }
  if (tag === undefined || tag.trim() === '') {
    throw new ValidationError(`image '${image}' was given without tag`);
  }
  if (hasTagOrDigest(image)) {
    throw new ValidationError(`image '${image}' must be a repository path without a tag or digest`);
  }

  return { source: 'single', images: [{ name: image, newTag: tag }] };
}

function parseImagesJson(raw: string): [ImageRef, ...ImageRef[]] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `images_json is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!Array.isArray(parsed)) {
    throw new ValidationError('images_json must be a JSON array of {"name", "newTag"} objects');
  }

  const refs: ImageRef[] = [];
  const seen = new Map<string, number>();

  parsed.forEach((entry: unknown, index) => {
    const where = `images_json[${index}]`;
    if (!isRecord(entry)) {
      throw new ValidationError(`${where} must be an object`, { index });
    }

    const { name, newTag } = entry;
    if (typeof name !== 'string' || name.trim() === '') {
      throw new ValidationError(`${where}.name must be a non-empty string`, { index });
    }
    if (typeof newTag !== 'string' || newTag.trim() === '') {
      throw new ValidationError(`${where}.newTag must be a non-empty string`, { index });
    }
    if (hasTagOrDigest(name)) {
      throw new ValidationError(`${where}.name '${name}' must be a repository path without a tag or digest`, {
        index,
      });
    }

    const previous = seen.get(name);
    if (previous !== undefined) {
      throw new ValidationError(`${where} repeats image '${name}' already given at images_json[${previous}]`, {
        index,
      });
    }
    seen.set(name, index);
    refs.push({ name, newTag });
  });

  const [primary, ...rest] = refs;
  if (!primary) {
    throw new ValidationError('images_json must list at least one image');
  }
  return [primary, ...rest];
}

export function resolveEnvPatches(raw: string | undefined): EnvPatchSet {
  if (raw === undefined || raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `env_patches is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isRecord(parsed)) {
    throw new ValidationError('env_patches must be a JSON object mapping selectors to variables');
  }

  const patches: EnvPatchSet = {};
  for (const [selector, variables] of Object.entries(parsed)) {
    if (parseEnvSelector(selector) === undefined) {
      throw new ValidationError(
        `env_patches selector '${selector}' is not one of container.env, <container>.env or configMapGenerator.<name>`,
        { selector }
      );
    }
    if (!isRecord(variables)) {
      throw new ValidationError(`env_patches["${selector}"] must be an object of variable names to strings`, {
        selector,
      });
    }

    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(variables)) {
      if (key.trim() === '') {
        throw new ValidationError(`env_patches["${selector}"] contains an empty variable name`, { selector });
      }
      if (typeof value !== 'string') {
        throw new ValidationError(
          `env_patches["${selector}"]["${key}"] must be a string, got ${Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value}`,
          { selector, key }
        );
      }
      entries[key] = value;
    }
    patches[selector] = entries;
  }

  return patches;
}
