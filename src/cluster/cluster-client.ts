/**
 * Cluster access.
 *
 * The reconciler and the diagnostics collector reach the cluster only
 * through ClusterClient. KubectlClusterClient drives the kubectl CLI inside
 * an execution context, with KUBECONFIG taken from the calling stage's
 * credential scope.
 */

import { CredentialScope } from '../credentials/credential-scope';
import { PipelineError, createTypedError } from '../domain/errors';
import { RolloutCondition, RolloutObservation } from '../domain/rollout';
import { Clock, systemClock } from '../runtime/clock';
import { CommandResult, combinedOutput } from '../runtime/command-runner';
import { ExecutionContext } from '../runtime/execution-context';

export interface AppliedObject {
  kind: string;
  name: string;
  /** `created`, `configured`, `unchanged`, ... as reported by the cluster. */
  action: string;
}

export interface ApplyResult {
  /** False when every object was reported unchanged. */
  changed: boolean;
  objects: AppliedObject[];
}

export interface ClusterClient {
  /** True when cluster access credentials are currently materialized. */
  hasCredentials(): boolean;
  apply(manifest: string, signal?: AbortSignal): Promise<ApplyResult>;
  getRolloutStatus(name: string, namespace: string, signal?: AbortSignal): Promise<RolloutObservation>;
  describe(kind: string, name: string, namespace: string, signal?: AbortSignal): Promise<string>;
  logs(selector: string, namespace: string, tailLines: number, signal?: AbortSignal): Promise<string>;
  /** Recent events, oldest first, at most `limit`. */
  listEvents(namespace: string, limit: number, signal?: AbortSignal): Promise<string>;
  listResources(selector: string, namespace: string, signal?: AbortSignal): Promise<string>;
}

/** The part of a credential scope the client reads. */
export type ClusterAccess = Pick<CredentialScope, 'env' | 'mask'>;

export interface KubectlOptions {
  kubectlBinary: string;
  requestTimeoutMs: number;
}

export const DEFAULT_KUBECTL_OPTIONS: KubectlOptions = {
  kubectlBinary: 'kubectl',
  requestTimeoutMs: 30_000,
};

export class KubectlClusterClient implements ClusterClient {
  private options: KubectlOptions;

  constructor(
    private context: ExecutionContext,
    private access: ClusterAccess,
    options?: Partial<KubectlOptions>,
    private clock: Clock = systemClock,
  ) {
    this.options = { ...DEFAULT_KUBECTL_OPTIONS, ...options };
  }

  hasCredentials(): boolean {
    return Boolean(this.access.env.KUBECONFIG);
  }

  async apply(manifest: string, signal?: AbortSignal): Promise<ApplyResult> {
    const result = await this.kubectl(['apply', '-f', '-'], signal, manifest);
    return parseApplyOutput(result.stdout);
  }

  async getRolloutStatus(name: string, namespace: string, signal?: AbortSignal): Promise<RolloutObservation> {
    const deployment = await this.kubectl(['get', 'deployment', name, '-n', namespace, '-o', 'json'], signal);
    const status = parseDeploymentStatus(deployment.stdout, this.clock.now());
    if (!status.selector || !status.revision) return status.observation;

    // Only pods of the current revision count; old pods are being replaced.
    const sets = await this.kubectl(['get', 'replicasets', '-n', namespace, '-l', status.selector, '-o', 'json'], signal);
    const hash = parseCurrentTemplateHash(sets.stdout, name, status.revision);
    if (hash) {
      const selector = `${status.selector},${POD_TEMPLATE_HASH_LABEL}=${hash}`;
      const pods = await this.kubectl(['get', 'pods', '-n', namespace, '-l', selector, '-o', 'json'], signal);
      status.observation.waitingReasons = parseWaitingReasons(pods.stdout);
    }
    return status.observation;
  }

  async describe(kind: string, name: string, namespace: string, signal?: AbortSignal): Promise<string> {
    return (await this.kubectl(['describe', kind, name, '-n', namespace], signal)).stdout;
  }

  async logs(selector: string, namespace: string, tailLines: number, signal?: AbortSignal): Promise<string> {
    const result = await this.kubectl(
      ['logs', '-l', selector, '-n', namespace, `--tail=${tailLines}`, '--all-containers=true', '--prefix=true'],
      signal,
    );
    return result.stdout;
  }

  async listEvents(namespace: string, limit: number, signal?: AbortSignal): Promise<string> {
    const result = await this.kubectl(['get', 'events', '-n', namespace, '--sort-by=.lastTimestamp'], signal);
    return tailTable(result.stdout, limit);
  }

  async listResources(selector: string, namespace: string, signal?: AbortSignal): Promise<string> {
    return (await this.kubectl(['get', 'all', '-l', selector, '-n', namespace, '-o', 'wide'], signal)).stdout;
  }

  private async kubectl(args: string[], signal?: AbortSignal, input?: string): Promise<CommandResult> {
    const result = await this.context.exec([this.options.kubectlBinary, ...args], {
      env: this.access.env,
      input,
      timeoutMs: this.options.requestTimeoutMs,
      signal,
    });
    if (result.exitCode !== 0) {
      const output = this.access.mask(combinedOutput(result));
      const lastLine = output.split('\n').filter((l) => l.trim().length > 0).pop();
      throw new PipelineError(createTypedError({
        code: 'CLUSTER.COMMAND_FAILED',
        message: `kubectl ${args[0]} failed: ${result.timedOut ? 'request timed out' : lastLine ?? `exit code ${result.exitCode}`}`,
        retryable: true,
        details: { args, exitCode: result.exitCode, output },
      }));
    }
    return result;
  }
}

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

const REVISION_ANNOTATION = 'deployment.kubernetes.io/revision';
const POD_TEMPLATE_HASH_LABEL = 'pod-template-hash';

const APPLY_LINE = /^([^\s/]+)\/(\S+)\s+(\S+)/;

/** Parse `kind.group/name action` lines printed by `kubectl apply`. */
export function parseApplyOutput(stdout: string): ApplyResult {
  const objects: AppliedObject[] = [];
  for (const line of stdout.split('\n')) {
    const match = APPLY_LINE.exec(line.trim());
    if (!match) continue;
    objects.push({ kind: match[1].split('.')[0], name: match[2], action: match[3] });
  }
  return { changed: objects.some((o) => o.action !== 'unchanged'), objects };
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseJson(text: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new PipelineError(createTypedError({
      code: 'CLUSTER.UNEXPECTED_OUTPUT',
      message: `Could not parse ${what}: ${err instanceof Error ? err.message : String(err)}`,
      retryable: true,
    }));
  }
  const record = asRecord(parsed);
  if (!record) {
    throw new PipelineError(createTypedError({
      code: 'CLUSTER.UNEXPECTED_OUTPUT',
      message: `Expected a JSON object for ${what}`,
      retryable: true,
    }));
  }
  return record;
}

/** Observation from `kubectl get deployment -o json`, plus the pod label selector and current revision. */
export function parseDeploymentStatus(
  json: string,
  observedAt: number,
): { observation: RolloutObservation; selector?: string; revision?: string } {
  const doc = parseJson(json, 'deployment status');
  const metadata = asRecord(doc.metadata) ?? {};
  const spec = asRecord(doc.spec) ?? {};
  const status = asRecord(doc.status) ?? {};

  const conditions: RolloutCondition[] = asArray(status.conditions).flatMap((raw) => {
    const c = asRecord(raw);
    const type = asString(c?.type);
    const conditionStatus = asString(c?.status);
    if (!c || !type || !conditionStatus) return [];
    return [{ type, status: conditionStatus, reason: asString(c.reason), message: asString(c.message) }];
  });

  const generation = asNumber(metadata.generation, 0);
  const observedGeneration = asNumber(status.observedGeneration, -1);
  const matchLabels = asRecord(asRecord(spec.selector)?.matchLabels);
  const selector = matchLabels
    ? Object.entries(matchLabels)
        .flatMap(([key, value]) => (typeof value === 'string' ? [`${key}=${value}`] : []))
        .join(',')
    : undefined;

  return {
    observation: {
      desiredReplicas: asNumber(spec.replicas, 1),
      replicas: asNumber(status.replicas, 0),
      updatedReplicas: asNumber(status.updatedReplicas, 0),
      readyReplicas: asNumber(status.readyReplicas, 0),
      availableReplicas: asNumber(status.availableReplicas, 0),
      generationObserved: observedGeneration >= generation,
      conditions,
      waitingReasons: [],
      observedAt,
    },
    selector: selector || undefined,
    revision: asString(asRecord(metadata.annotations)?.[REVISION_ANNOTATION]),
  };
}

/**
 * `pod-template-hash` of the deployment's ReplicaSet at `revision`, from
 * `kubectl get replicasets -o json`. Undefined until the controller has
 * created it.
 */
export function parseCurrentTemplateHash(json: string, deploymentName: string, revision: string): string | undefined {
  const doc = parseJson(json, 'replica set list');
  for (const item of asArray(doc.items)) {
    const metadata = asRecord(asRecord(item)?.metadata);
    if (!metadata) continue;
    if (asString(asRecord(metadata.annotations)?.[REVISION_ANNOTATION]) !== revision) continue;
    const owned = asArray(metadata.ownerReferences).some((raw) => {
      const owner = asRecord(raw);
      return owner?.kind === 'Deployment' && owner.name === deploymentName;
    });
    if (!owned) continue;
    const hash = asString(asRecord(metadata.labels)?.[POD_TEMPLATE_HASH_LABEL]);
    if (hash) return hash;
  }
  return undefined;
}

/** Distinct container waiting reasons from `kubectl get pods -o json`. */
export function parseWaitingReasons(json: string): string[] {
  const doc = parseJson(json, 'pod list');
  const reasons = new Set<string>();
  for (const item of asArray(doc.items)) {
    const status = asRecord(asRecord(item)?.status);
    if (!status) continue;
    const containers = [...asArray(status.initContainerStatuses), ...asArray(status.containerStatuses)];
    for (const container of containers) {
      const waiting = asRecord(asRecord(asRecord(container)?.state)?.waiting);
      const reason = asString(waiting?.reason);
      if (reason) reasons.add(reason);
    }
  }
  return [...reasons];
}

/** Keep a table's header line and its last `limit` rows. */
export function tailTable(output: string, limit: number): string {
  const lines = output.split('\n').filter((line) => line.length > 0);
  if (lines.length <= limit + 1) return lines.join('\n');
  return [lines[0], ...lines.slice(-limit)].join('\n');
}
