/**
 * Typed error model.
 *
 * Stage and run failures are recorded as typed values on the run rather
 * than thrown across the executor boundary, so the failure hook, the API
 * and the CLI all read the same structure.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'STAGE'
  | 'COMMAND'
  | 'RUN'
  | 'PIPELINE'
  | 'SECRETS'
  | 'CONTEXT'
  | 'BUILDER'
  | 'ARTIFACT'
  | 'CACHE'
  | 'CLUSTER'
  | 'SOURCE'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix an operator (or a retrying caller) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and run records. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILDER.UNAVAILABLE"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated stage if applicable. */
  stage?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stage?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stage: params.stage,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error carrying a TypedError, thrown by commands and collaborators. */
export class PipelineError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineError';
  }
}

/** Normalise anything thrown into a TypedError. */
export function toTypedError(err: unknown, fallbackCode: string, stage?: string): TypedError {
  if (err instanceof PipelineError) {
    return stage && !err.typedError.stage ? { ...err.typedError, stage } : err.typedError;
  }
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
    stage,
    retryable: false,
  });
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function commandFailedError(
  stage: string,
  command: string,
  exitCode: number | null,
  output: string,
): TypedError {
  return createTypedError({
    code: 'COMMAND.NON_ZERO_EXIT',
    message: exitCode === null
      ? `Command "${command}" was terminated before it exited`
      : `Command "${command}" exited with code ${exitCode}`,
    stage,
    retryable: false,
    details: { command, exitCode, output },
  });
}

export function stageTimeoutError(stage: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'STAGE.TIMEOUT',
    message: `Stage "${stage}" exceeded its timeout of ${timeoutMs}ms`,
    stage,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function secretMissingError(bindingId: string, stage?: string): TypedError {
  return createTypedError({
    code: 'SECRETS.MISSING',
    message: `Required credential not found: ${bindingId}`,
    stage,
    retryable: false,
    suggestedFixes: [
      { type: 'PROVIDE_SECRET', params: { id: bindingId }, description: `Provide material for credential "${bindingId}"` },
    ],
  });
}

export function unknownContextError(identity: string, stage?: string): TypedError {
  return createTypedError({
    code: 'CONTEXT.UNKNOWN',
    message: `No execution context is declared for identity "${identity}"`,
    stage,
    retryable: false,
    details: { identity },
  });
}

export function volumeNotMountedError(identity: string, volume: string): TypedError {
  return createTypedError({
    code: 'CONTEXT.VOLUME_NOT_MOUNTED',
    message: `Execution context "${identity}" does not mount volume "${volume}"`,
    retryable: false,
    details: { identity, volume },
  });
}

export function builderUnavailableError(waitedMs: number, reason: string): TypedError {
  return createTypedError({
    code: 'BUILDER.UNAVAILABLE',
    message: `builder unavailable: ${reason}`,
    retryable: true,
    details: { waitedMs },
    suggestedFixes: [
      { type: 'INCREASE_READINESS_TIMEOUT', params: { readinessTimeoutMs: waitedMs * 2 } },
    ],
  });
}

export function tagConflictError(imageRef: string, existingRunId: string, existingCommit: string | undefined): TypedError {
  return createTypedError({
    code: 'ARTIFACT.TAG_CONFLICT',
    message: `Image ${imageRef} was already pushed by run ${existingRunId} from a different source`,
    retryable: false,
    details: { imageRef, existingRunId, existingCommit },
    suggestedFixes: [
      { type: 'SET_TAG_POLICY', params: { tagPolicy: 'overwrite' }, description: 'Allow re-pushing an existing tag' },
    ],
  });
}

export function clusterCredentialsMissingError(stage?: string): TypedError {
  return createTypedError({
    code: 'CLUSTER.CREDENTIALS_MISSING',
    message: 'Cluster access credentials are not materialized for this stage',
    stage,
    retryable: false,
    suggestedFixes: [
      { type: 'BIND_CREDENTIAL', params: { kind: 'secretFile' }, description: 'Declare a kubeconfig file binding on the deploy stage' },
    ],
  });
}

export function rolloutTimedOutError(name: string, namespace: string, timeoutMs: number, ready: number, desired: number): TypedError {
  return createTypedError({
    code: 'CLUSTER.ROLLOUT_TIMEOUT',
    message: `Rollout of ${namespace}/${name} did not converge within ${timeoutMs}ms (${ready}/${desired} ready)`,
    retryable: true,
    details: { name, namespace, timeoutMs, readyReplicas: ready, desiredReplicas: desired },
  });
}

export function rolloutFailedError(name: string, namespace: string, reason: string): TypedError {
  return createTypedError({
    code: 'CLUSTER.ROLLOUT_FAILED',
    message: `Rollout of ${namespace}/${name} failed: ${reason}`,
    retryable: false,
    details: { name, namespace, reason },
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runAbortedError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.ABORTED',
    message: reason ? `Run aborted: ${reason}` : 'Run aborted',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of each secret in a message with its masked
 * form. Returns the message unchanged when nothing matches.
 */
export function maskSecretsInMessage(message: string, secrets: readonly string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of secret characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
