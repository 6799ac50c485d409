/**
 * Pipeline configuration.
 *
 * One explicit PipelineConfig object is built at startup and passed into
 * every constructor; nothing reads process.env after that. Sources, in
 * increasing precedence: built-in defaults, a JSON config file,
 * `SHIPLINE_*` environment variables.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { TagPolicy, imageRepository } from './domain/artifact';
import { DescriptorSpec, HttpProbe, ResourceQuantities, ServiceSpec } from './domain/descriptor';
import { PipelineError, TypedError, createTypedError, validationError } from './domain/errors';
import { FailurePolicy } from './engine/stage-runner';
import { parseLogLevel } from './logger';
import { ContextTemplate, VOLUME_NAMES, VolumeName } from './runtime/execution-context';

/** Context identities the delivery pipeline's stages run in. */
export const CONTEXT_IDENTITIES = {
  source: 'source',
  builder: 'builder',
  deployer: 'deployer',
} as const;

export type DeploymentConfig = Omit<DescriptorSpec, 'image' | 'namespace'>;

export interface PipelineConfig {
  pipelineId: string;
  /** Per-run volumes and per-pipeline build caches live here. */
  workRoot: string;
  /** JSON file holding run history and build numbers. */
  storeFile: string;
  logLevel: string;
  source: {
    repositoryUrl: string;
    branch: string;
  };
  tests: {
    failurePolicy: FailurePolicy;
    installCommand: string[];
    testCommand: string[];
  };
  registry: {
    /** Registry host and namespace, e.g. `registry.example.com/team`. */
    registry: string;
    image: string;
    credentialId: string;
    tagPolicy: TagPolicy;
    /** Optional create-repository command; `{repository}` and `{image}` are substituted. */
    ensureRepositoryCommand?: string[];
  };
  builder: {
    address: string;
    daemonCommand: string[];
    buildctlBinary: string;
    dockerfile: string;
    readinessTimeoutMs: number;
  };
  cluster: {
    kubeconfigCredentialId: string;
    kubectlBinary: string;
    namespace: string;
    rolloutTimeoutMs: number;
    pollIntervalMs: number;
  };
  deployment: DeploymentConfig;
  diagnostics: {
    logTailLines: number;
    eventLimit: number;
  };
  contexts: ContextTemplate[];
  /** Applies to every stage. */
  stageTimeoutMs: number;
  hookTimeoutMs: number;
  /** How long a cancelled command may take to wind down before it is abandoned. */
  cancelGraceMs: number;
  server: {
    port: number;
  };
}

export function defaultConfig(cwd: string = process.cwd()): PipelineConfig {
  return {
    pipelineId: 'web',
    workRoot: path.join(cwd, '.shipline', 'work'),
    storeFile: path.join(cwd, '.shipline', 'runs.json'),
    logLevel: 'info',
    source: {
      repositoryUrl: '',
      branch: 'main',
    },
    tests: {
      failurePolicy: 'absorb',
      installCommand: ['npm', 'install'],
      testCommand: ['npm', 'test'],
    },
    registry: {
      registry: 'registry.example.com',
      image: 'web',
      credentialId: 'registry-credentials',
      tagPolicy: 'fail',
    },
    builder: {
      address: 'unix:///run/buildkit/buildkitd.sock',
      daemonCommand: ['buildkitd'],
      buildctlBinary: 'buildctl',
      dockerfile: 'Dockerfile',
      readinessTimeoutMs: 30_000,
    },
    cluster: {
      kubeconfigCredentialId: 'kubeconfig',
      kubectlBinary: 'kubectl',
      namespace: 'default',
      rolloutTimeoutMs: 120_000,
      pollIntervalMs: 5_000,
    },
    deployment: {
      name: 'web',
      appLabel: 'web',
      containerName: 'web',
      replicas: 3,
      containerPort: 3000,
      resources: {
        requests: { memory: '256Mi', cpu: '100m' },
        limits: { memory: '512Mi', cpu: '500m' },
      },
      readinessProbe: { path: '/ready', initialDelaySeconds: 5, periodSeconds: 10 },
      livenessProbe: { path: '/health', initialDelaySeconds: 5, periodSeconds: 10 },
      service: { name: 'web-service', port: 80, protocol: 'TCP', type: 'LoadBalancer' },
    },
    diagnostics: {
      logTailLines: 100,
      eventLimit: 20,
    },
    contexts: [
      { identity: CONTEXT_IDENTITIES.source, image: 'node:20-alpine', mounts: ['workspace'] },
      { identity: CONTEXT_IDENTITIES.builder, image: 'moby/buildkit:rootless', mounts: ['workspace', 'build-cache', 'cache-config'] },
      { identity: CONTEXT_IDENTITIES.deployer, image: 'bitnami/kubectl:latest', mounts: ['workspace'] },
    ],
    stageTimeoutMs: 30 * 60_000,
    hookTimeoutMs: 5 * 60_000,
    cancelGraceMs: 10_000,
    server: {
      port: 5000,
    },
  };
}

// ---------------------------------------------------------------------------
// Reading untyped input
// ---------------------------------------------------------------------------

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads fields of one JSON object, recording type errors against their path. */
class FieldReader {
  constructor(
    private raw: JsonObject,
    private prefix: string,
    private errors: TypedError[],
  ) {}

  section(key: string): FieldReader {
    const value = this.raw[key];
    if (value === undefined) return new FieldReader({}, this.path(key), this.errors);
    if (!isObject(value)) {
      this.typeError(key, 'an object');
      return new FieldReader({}, this.path(key), this.errors);
    }
    return new FieldReader(value, this.path(key), this.errors);
  }

  string(key: string, fallback: string): string {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value === 'string') return value;
    this.typeError(key, 'a string');
    return fallback;
  }

  number(key: string, fallback: number): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.typeError(key, 'a number');
    return fallback;
  }

  strings(key: string, fallback: string[]): string[] {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    this.typeError(key, 'an array of strings');
    return fallback;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    const match = allowed.find((a) => a === value);
    if (match !== undefined) return match;
    this.typeError(key, `one of ${allowed.join(', ')}`);
    return fallback;
  }

  has(key: string): boolean {
    return this.raw[key] !== undefined;
  }

  array(key: string): FieldReader[] | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
      this.typeError(key, 'an array');
      return undefined;
    }
    return value.map((item, i) => {
      if (isObject(item)) return new FieldReader(item, `${this.path(key)}[${i}]`, this.errors);
      this.typeError(`${key}[${i}]`, 'an object');
      return new FieldReader({}, `${this.path(key)}[${i}]`, this.errors);
    });
  }

  private path(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }

  private typeError(key: string, expected: string): void {
    this.errors.push(createTypedError({
      code: 'VALIDATION.CONFIG_TYPE',
      message: `Config field "${this.path(key)}" must be ${expected}`,
      details: { path: this.path(key) },
    }));
  }
}

function readProbe(reader: FieldReader, key: string, fallback: HttpProbe | undefined): HttpProbe | undefined {
  if (!reader.has(key)) return fallback;
  const probe = reader.section(key);
  const base = fallback ?? { path: '/', initialDelaySeconds: 0, periodSeconds: 10 };
  return {
    path: probe.string('path', base.path),
    initialDelaySeconds: probe.number('initialDelaySeconds', base.initialDelaySeconds),
    periodSeconds: probe.number('periodSeconds', base.periodSeconds),
  };
}

function readQuantities(reader: FieldReader, fallback: ResourceQuantities): ResourceQuantities {
  return { memory: reader.string('memory', fallback.memory), cpu: reader.string('cpu', fallback.cpu) };
}

const FAILURE_POLICIES: readonly FailurePolicy[] = ['fatal', 'absorb'];
const TAG_POLICIES: readonly TagPolicy[] = ['fail', 'overwrite'];
const SERVICE_TYPES: readonly ServiceSpec['type'][] = ['ClusterIP', 'NodePort', 'LoadBalancer'];
const PROTOCOLS: readonly ServiceSpec['protocol'][] = ['TCP', 'UDP'];

/** Overlay a parsed JSON document onto `base`. */
export function applyConfigObject(base: PipelineConfig, raw: unknown, errors: TypedError[]): PipelineConfig {
  if (!isObject(raw)) {
    errors.push(validationError('Config file must contain a JSON object'));
    return base;
  }
  const r = new FieldReader(raw, '', errors);
  const source = r.section('source');
  const tests = r.section('tests');
  const registry = r.section('registry');
  const builder = r.section('builder');
  const cluster = r.section('cluster');
  const deployment = r.section('deployment');
  const resources = deployment.section('resources');
  const service = deployment.section('service');
  const diagnostics = r.section('diagnostics');
  const server = r.section('server');
  const d = base.deployment;

  const contexts = r.array('contexts')?.map((c) => ({
    identity: c.string('identity', ''),
    image: c.string('image', ''),
    mounts: c.strings('mounts', []).flatMap((m): VolumeName[] => {
      const volume = VOLUME_NAMES.find((v) => v === m);
      if (volume) return [volume];
      errors.push(validationError(`Unknown volume "${m}"`, { allowed: VOLUME_NAMES }));
      return [];
    }),
  }));

  const ensureRepositoryCommand = registry.has('ensureRepositoryCommand')
    ? registry.strings('ensureRepositoryCommand', [])
    : base.registry.ensureRepositoryCommand;

  return {
    pipelineId: r.string('pipelineId', base.pipelineId),
    workRoot: r.string('workRoot', base.workRoot),
    storeFile: r.string('storeFile', base.storeFile),
    logLevel: r.string('logLevel', base.logLevel),
    source: {
      repositoryUrl: source.string('repositoryUrl', base.source.repositoryUrl),
      branch: source.string('branch', base.source.branch),
    },
    tests: {
      failurePolicy: tests.oneOf('failurePolicy', FAILURE_POLICIES, base.tests.failurePolicy),
      installCommand: tests.strings('installCommand', base.tests.installCommand),
      testCommand: tests.strings('testCommand', base.tests.testCommand),
    },
    registry: {
      registry: registry.string('registry', base.registry.registry),
      image: registry.string('image', base.registry.image),
      credentialId: registry.string('credentialId', base.registry.credentialId),
      tagPolicy: registry.oneOf('tagPolicy', TAG_POLICIES, base.registry.tagPolicy),
      ensureRepositoryCommand,
    },
    builder: {
      address: builder.string('address', base.builder.address),
      daemonCommand: builder.strings('daemonCommand', base.builder.daemonCommand),
      buildctlBinary: builder.string('buildctlBinary', base.builder.buildctlBinary),
      dockerfile: builder.string('dockerfile', base.builder.dockerfile),
      readinessTimeoutMs: builder.number('readinessTimeoutMs', base.builder.readinessTimeoutMs),
    },
    cluster: {
      kubeconfigCredentialId: cluster.string('kubeconfigCredentialId', base.cluster.kubeconfigCredentialId),
      kubectlBinary: cluster.string('kubectlBinary', base.cluster.kubectlBinary),
      namespace: cluster.string('namespace', base.cluster.namespace),
      rolloutTimeoutMs: cluster.number('rolloutTimeoutMs', base.cluster.rolloutTimeoutMs),
      pollIntervalMs: cluster.number('pollIntervalMs', base.cluster.pollIntervalMs),
    },
    deployment: {
      name: deployment.string('name', d.name),
      appLabel: deployment.string('appLabel', d.appLabel),
      containerName: deployment.string('containerName', d.containerName),
      replicas: deployment.number('replicas', d.replicas),
      containerPort: deployment.number('containerPort', d.containerPort),
      resources: {
        requests: readQuantities(resources.section('requests'), d.resources.requests),
        limits: readQuantities(resources.section('limits'), d.resources.limits),
      },
      readinessProbe: readProbe(deployment, 'readinessProbe', d.readinessProbe),
      livenessProbe: readProbe(deployment, 'livenessProbe', d.livenessProbe),
      service: {
        name: service.string('name', d.service.name),
        port: service.number('port', d.service.port),
        protocol: service.oneOf('protocol', PROTOCOLS, d.service.protocol),
        type: service.oneOf('type', SERVICE_TYPES, d.service.type),
      },
    },
    diagnostics: {
      logTailLines: diagnostics.number('logTailLines', base.diagnostics.logTailLines),
      eventLimit: diagnostics.number('eventLimit', base.diagnostics.eventLimit),
    },
    contexts: contexts ?? base.contexts,
    stageTimeoutMs: r.number('stageTimeoutMs', base.stageTimeoutMs),
    hookTimeoutMs: r.number('hookTimeoutMs', base.hookTimeoutMs),
    cancelGraceMs: r.number('cancelGraceMs', base.cancelGraceMs),
    server: {
      port: server.number('port', base.server.port),
    },
  };
}

/** Environment variables that override single config fields. */
export const ENV_OVERRIDES = {
  SHIPLINE_PIPELINE_ID: 'pipelineId',
  SHIPLINE_WORK_ROOT: 'workRoot',
  SHIPLINE_STORE_FILE: 'storeFile',
  SHIPLINE_LOG_LEVEL: 'logLevel',
  SHIPLINE_REPOSITORY_URL: 'source.repositoryUrl',
  SHIPLINE_BRANCH: 'source.branch',
  SHIPLINE_TEST_FAILURE_POLICY: 'tests.failurePolicy',
  SHIPLINE_REGISTRY: 'registry.registry',
  SHIPLINE_IMAGE: 'registry.image',
  SHIPLINE_TAG_POLICY: 'registry.tagPolicy',
  SHIPLINE_BUILDER_ADDRESS: 'builder.address',
  SHIPLINE_NAMESPACE: 'cluster.namespace',
  SHIPLINE_ROLLOUT_TIMEOUT_MS: 'cluster.rolloutTimeoutMs',
  SHIPLINE_REPLICAS: 'deployment.replicas',
  SHIPLINE_PORT: 'server.port',
} as const;

/** Turn `SHIPLINE_*` variables into a nested object for applyConfigObject. */
export function envToConfigObject(env: Record<string, string | undefined>, errors: TypedError[]): JsonObject {
  const result: JsonObject = {};
  for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
    const raw = env[variable];
    if (raw === undefined || raw === '') continue;
    const numeric = field.endsWith('Ms') || field.endsWith('replicas') || field.endsWith('port');
    let value: string | number = raw;
    if (numeric) {
      value = Number(raw);
      if (!Number.isFinite(value)) {
        errors.push(validationError(`${variable} must be a number`, { variable, value: raw }));
        continue;
      }
    }
    const [head, tail] = field.split('.');
    if (tail === undefined) {
      result[head] = value;
    } else {
      const section = result[head];
      const target: JsonObject = isObject(section) ? section : {};
      target[tail] = value;
      result[head] = target;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ConfigValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

function invalid(errors: TypedError[], field: string, message: string): void {
  errors.push(createTypedError({
    code: 'VALIDATION.CONFIG',
    message: `${field}: ${message}`,
    details: { field },
  }));
}

function positive(errors: TypedError[], field: string, value: number): void {
  if (!(value > 0)) invalid(errors, field, `must be greater than 0 (got ${value})`);
}

function validPort(errors: TypedError[], field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > 65535) invalid(errors, field, `must be a port number (got ${value})`);
}

/** Semantic checks on a fully assembled config. */
export function validateConfig(config: PipelineConfig): ConfigValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (!/^[a-z0-9][a-z0-9-]*$/.test(config.pipelineId)) {
    invalid(errors, 'pipelineId', 'must be lowercase letters, digits and dashes');
  }
  if (!parseLogLevel(config.logLevel)) invalid(errors, 'logLevel', `unknown level "${config.logLevel}"`);
  if (!config.source.repositoryUrl) invalid(errors, 'source.repositoryUrl', 'is required');
  if (!config.source.branch) invalid(errors, 'source.branch', 'is required');
  if (config.tests.installCommand.length === 0) invalid(errors, 'tests.installCommand', 'must not be empty');
  if (config.tests.testCommand.length === 0) invalid(errors, 'tests.testCommand', 'must not be empty');
  if (!config.registry.registry) invalid(errors, 'registry.registry', 'is required');
  if (!/^[a-z0-9]+([._/-][a-z0-9]+)*$/.test(config.registry.image)) {
    invalid(errors, 'registry.image', 'must be a lowercase repository name');
  }
  if (config.builder.daemonCommand.length === 0) invalid(errors, 'builder.daemonCommand', 'must not be empty');
  positive(errors, 'builder.readinessTimeoutMs', config.builder.readinessTimeoutMs);
  positive(errors, 'cluster.rolloutTimeoutMs', config.cluster.rolloutTimeoutMs);
  positive(errors, 'cluster.pollIntervalMs', config.cluster.pollIntervalMs);
  if (!Number.isInteger(config.deployment.replicas) || config.deployment.replicas < 1) {
    invalid(errors, 'deployment.replicas', `must be a positive integer (got ${config.deployment.replicas})`);
  }
  validPort(errors, 'deployment.containerPort', config.deployment.containerPort);
  validPort(errors, 'deployment.service.port', config.deployment.service.port);
  validPort(errors, 'server.port', config.server.port);
  positive(errors, 'stageTimeoutMs', config.stageTimeoutMs);
  positive(errors, 'hookTimeoutMs', config.hookTimeoutMs);
  positive(errors, 'cancelGraceMs', config.cancelGraceMs);
  positive(errors, 'diagnostics.logTailLines', config.diagnostics.logTailLines);
  positive(errors, 'diagnostics.eventLimit', config.diagnostics.eventLimit);

  const required: Record<string, VolumeName[]> = {
    [CONTEXT_IDENTITIES.source]: ['workspace'],
    [CONTEXT_IDENTITIES.builder]: ['workspace', 'build-cache'],
    [CONTEXT_IDENTITIES.deployer]: [],
  };
  for (const [identity, mounts] of Object.entries(required)) {
    const template = config.contexts.find((c) => c.identity === identity);
    if (!template) {
      invalid(errors, 'contexts', `context "${identity}" is not declared`);
      continue;
    }
    for (const mount of mounts) {
      if (!template.mounts.includes(mount)) invalid(errors, 'contexts', `context "${identity}" must mount "${mount}"`);
    }
  }
  const identities = config.contexts.map((c) => c.identity);
  if (new Set(identities).size !== identities.length) invalid(errors, 'contexts', 'identities must be unique');

  if (config.tests.failurePolicy === 'absorb') {
    warnings.push('tests.failurePolicy is "absorb": failing tests do not stop the pipeline');
  }
  if (config.registry.tagPolicy === 'overwrite') {
    warnings.push(`registry.tagPolicy is "overwrite": tags under ${imageRepository(config.registry.registry, config.registry.image)} may be re-pushed`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** JSON config file; missing is an error only when given explicitly. */
  file?: string;
  cwd?: string;
}

export interface LoadedConfig {
  config: PipelineConfig;
  warnings: string[];
}

/**
 * Assemble and validate the config. Rejects with a PipelineError
 * (VALIDATION.CONFIG_INVALID) listing every problem found.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? {};
  const errors: TypedError[] = [];
  let config = defaultConfig(options.cwd);

  const file = options.file ?? env.SHIPLINE_CONFIG;
  if (file) {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      throw new PipelineError(validationError(`Cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`, { file }));
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new PipelineError(validationError(`Config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, { file }));
    }
    config = applyConfigObject(config, parsed, errors);
  }

  config = applyConfigObject(config, envToConfigObject(env, errors), errors);
  const validation = validateConfig(config);
  errors.push(...validation.errors);

  if (errors.length > 0) {
    throw new PipelineError(createTypedError({
      code: 'VALIDATION.CONFIG_INVALID',
      message: `Invalid configuration: ${errors.map((e) => e.message).join('; ')}`,
      details: { errors },
    }));
  }
  return { config, warnings: validation.warnings };
}
