/**
 * Kustomize Renderer
 * Renders an overlay directory into resource documents
 */

import { spawn } from 'node:child_process';
import { basename, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { createChildLogger, isRecord, BuildError, type ResourceDoc, type ResourceMetadata } from '@keelson/shared';
import type { KustomizeRendererConfig } from './types.js';
import { DEFAULT_RENDERER_CONFIG } from './types.js';

interface RenderProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Label and annotation values are strings on the wire; YAML may have
 * typed an unquoted value, so stringify scalars.
 */
function toStringMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null || entry === undefined) continue;
    result[key] = typeof entry === 'string' ? entry : String(entry);
  }
  return result;
}

function toResourceDoc(value: unknown): ResourceDoc | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { apiVersion, kind, metadata } = value;
  if (typeof kind !== 'string' || !isRecord(metadata) || typeof metadata.name !== 'string') {
    return undefined;
  }

  const meta: ResourceMetadata = { ...metadata, name: metadata.name };
  if (typeof metadata.namespace === 'string') {
    meta.namespace = metadata.namespace;
  } else {
    delete meta.namespace;
  }
  const labels = toStringMap(metadata.labels);
  if (labels) meta.labels = labels;
  const annotations = toStringMap(metadata.annotations);
  if (annotations) meta.annotations = annotations;

  return {
    ...value,
    apiVersion: typeof apiVersion === 'string' ? apiVersion : '',
    kind,
    metadata: meta,
  };
}

/**
 * Parse multi-document renderer output. Empty documents and documents
 * without kind or metadata.name are dropped; List kinds are flattened.
 */
export function parseRenderedDocuments(output: string): ResourceDoc[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BuildError(`Rendered output is not valid YAML: ${message}`);
  }

  const resources: ResourceDoc[] = [];
  const visit = (doc: unknown): void => {
    if (isRecord(doc) && typeof doc.kind === 'string' && doc.kind.endsWith('List') && Array.isArray(doc.items)) {
      doc.items.forEach(visit);
      return;
    }
    const resource = toResourceDoc(doc);
    if (resource) {
      resources.push(resource);
    }
  };
  documents.forEach(visit);

  return resources;
}

export class KustomizeRenderer {
  private config: KustomizeRendererConfig;
  private logger = createChildLogger({ component: 'KustomizeRenderer' });

  constructor(config: Partial<KustomizeRendererConfig> = {}) {
    this.config = { ...DEFAULT_RENDERER_CONFIG, ...config };
  }

  /**
   * Arguments for the configured binary
   */
  buildArgs(overlayDir: string): string[] {
    const dir = resolve(overlayDir);
    return basename(this.config.binary) === 'kustomize' ? ['build', dir] : ['kustomize', dir];
  }

  async render(overlayDir: string): Promise<ResourceDoc[]> {
    const args = this.buildArgs(overlayDir);
    this.logger.info({ binary: this.config.binary, args }, 'Rendering overlay');

    const result = await this.runRenderer(args);

    if (result.signal !== null) {
      throw new BuildError(
        `Rendering ${overlayDir} was stopped by ${result.signal} after ${result.durationMs}ms`,
        { overlayDir, stderr: result.stderr, timeoutMs: this.config.timeoutMs }
      );
    }

    if (result.exitCode !== 0) {
      throw new BuildError(
        `Rendering ${overlayDir} failed (exit code ${result.exitCode}): ${result.stderr.trim() || 'no output'}`,
        { overlayDir, stderr: result.stderr, exitCode: result.exitCode }
      );
    }

    const resources = parseRenderedDocuments(result.stdout);

    this.logger.info(
      { overlayDir, resourceCount: resources.length, durationMs: result.durationMs },
      'Overlay rendered'
    );

    return resources;
  }

  private runRenderer(args: string[]): Promise<RenderProcessResult> {
    const startTime = Date.now();

    return new Promise((resolvePromise, reject) => {
      const proc = spawn(this.config.binary, args, {
        timeout: this.config.timeoutMs,
      });

      // Decoded once on close; a multi-byte character may span two chunks
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      proc.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr.push(data);
      });

      proc.on('close', (exitCode, signal) => {
        resolvePromise({
          exitCode,
          signal,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
          durationMs: Date.now() - startTime,
        });
      });

      proc.on('error', (error) => {
        reject(new BuildError(`Failed to start ${this.config.binary}: ${error.message}`, {
          binary: this.config.binary,
        }));
      });
    });
  }
}
