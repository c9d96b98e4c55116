/**
 * Configuration management for Keelson
 *
 * Deploy inputs follow the action-style convention of one environment
 * variable per input. Empty strings count as absent, since CI runners pass
 * unset inputs as ''.
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { randomUUID } from 'node:crypto';
import { ConfigurationError } from '../errors/index.js';

const emptyAsUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyAsUndefined, z.string().optional());

const requiredString = (envName: string) =>
  z.preprocess(emptyAsUndefined, z.string({ required_error: `${envName} is required` }).min(1));

const booleanish = (defaultValue: boolean) =>
  z.preprocess(
    emptyAsUndefined,
    z
      .union([z.boolean(), z.string()])
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return defaultValue;
        if (typeof value === 'boolean') return value;
        const normalized = value.trim().toLowerCase();
        if (['true', '1', 'yes'].includes(normalized)) return true;
        if (['false', '0', 'no'].includes(normalized)) return false;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected a boolean (true/false/1/0/yes/no), got '${value}'`,
        });
        return z.NEVER;
      })
  );

const positiveInt = (defaultValue: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(defaultValue));

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.preprocess(emptyAsUndefined, z.enum(['development', 'production', 'test']).default('production')),
  logLevel: z.preprocess(emptyAsUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),

  // Deploy inputs
  deploy: z.object({
    overlayDir: requiredString('OVERLAY_DIR'),
    serviceName: requiredString('SERVICE_NAME'),
    environment: requiredString('ENVIRONMENT'),
    image: optionalString,
    tag: optionalString,
    imagesJson: optionalString,
    envPatches: optionalString,
    actor: z.string().min(1),
    runId: z.string().min(1),
    detectGitops: booleanish(true),
    forceMode: z.preprocess(
      (value) => (typeof value === 'string' ? emptyAsUndefined(value.trim().toLowerCase()) : value),
      z.enum(['auto', 'gitops', 'kubectl']).default('auto')
    ),
    commitMessage: optionalString,
    createNamespace: booleanish(true),
    waitTimeoutSeconds: positiveInt(120),
    dryRun: booleanish(false),
  }),

  // Kubernetes
  kubernetes: z.object({
    kubeconfig: optionalString,
    context: optionalString,
    defaultNamespace: z.preprocess(emptyAsUndefined, z.string().default('default')),
    pollIntervalMs: positiveInt(2000),
  }),

  // Overlay rendering
  kustomize: z.object({
    binary: z.preprocess(emptyAsUndefined, z.string().default('kubectl')),
    timeoutMs: positiveInt(60000),
  }),

  // Git
  git: z.object({
    remote: z.preprocess(emptyAsUndefined, z.string().default('origin')),
    authorName: z.preprocess(emptyAsUndefined, z.string().default('keelson')),
    authorEmail: z.preprocess(emptyAsUndefined, z.string().default('keelson@localhost')),
  }),

  // Tracking annotations
  annotations: z.object({
    prefix: z.preprocess(
      emptyAsUndefined,
      z.string().regex(/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/, 'ANNOTATION_PREFIX must be a DNS subdomain').default('keelson.dev')
    ),
  }),

  // Outputs surface
  outputs: z.object({
    file: optionalString,
  }),
});

export type Config = z.infer<typeof configSchema>;

export type DeployInputs = Config['deploy'];

// Parse and validate configuration
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    deploy: {
      overlayDir: env.OVERLAY_DIR,
      serviceName: env.SERVICE_NAME,
      environment: env.ENVIRONMENT,
      image: env.IMAGE,
      tag: env.TAG,
      imagesJson: env.IMAGES_JSON,
      envPatches: env.ENV_PATCHES,
      actor: env.ACTOR || env.GITHUB_ACTOR || 'unknown',
      runId: env.RUN_ID || env.GITHUB_RUN_ID || randomUUID(),
      detectGitops: env.DETECT_GITOPS,
      forceMode: env.FORCE_MODE,
      commitMessage: env.COMMIT_MESSAGE,
      createNamespace: env.CREATE_NAMESPACE,
      waitTimeoutSeconds: env.WAIT_TIMEOUT,
      dryRun: env.DRY_RUN,
    },

    kubernetes: {
      kubeconfig: env.KUBECONFIG,
      context: env.KUBE_CONTEXT,
      defaultNamespace: env.DEFAULT_NAMESPACE,
      pollIntervalMs: env.ROLLOUT_POLL_INTERVAL_MS,
    },

    kustomize: {
      binary: env.KUSTOMIZE_BINARY,
      timeoutMs: env.KUSTOMIZE_TIMEOUT_MS,
    },

    git: {
      remote: env.GIT_REMOTE,
      authorName: env.GIT_AUTHOR_NAME,
      authorEmail: env.GIT_AUTHOR_EMAIL,
    },

    annotations: {
      prefix: env.ANNOTATION_PREFIX,
    },

    outputs: {
      file: env.GITHUB_OUTPUT,
    },
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, { errors });
  }
  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    dotenvConfig({ path: resolve(process.cwd(), '.env') });
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors?: string[] } {
  try {
    loadConfig(env);
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const errors = error.context.errors;
      return {
        valid: false,
        errors: Array.isArray(errors) ? errors.map(String) : [error.message],
      };
    }
    throw error;
  }
}
