import { ApplyResult, ClusterClient } from '../../src/cluster/cluster-client';
import { RolloutObservation } from '../../src/domain/rollout';
import { AbortedError, Clock, abortReason } from '../../src/runtime/clock';
import { BackgroundProcess, CommandResult, CommandRunner, CommandSpec } from '../../src/runtime/command-runner';

/** Time moves only when something sleeps; every sleep returns at once. */
export class VirtualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new AbortedError(abortReason(signal));
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function result(partial: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', durationMs: 1, timedOut: false, aborted: false, ...partial };
}

type Responder = (spec: CommandSpec) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

interface Rule {
  match: (argv: string[]) => boolean;
  respond: Responder;
}

export interface StartedProcess {
  spec: CommandSpec;
  stopped: boolean;
}

/**
 * In-process CommandRunner. Commands are answered by the first matching
 * rule (by argv prefix); unmatched commands succeed with empty output.
 */
export class ScriptedRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];
  readonly started: StartedProcess[] = [];
  private rules: Rule[] = [];
  /** How a started background process behaves: keep running, or exit at once. */
  startBehavior: { exitImmediately?: Partial<CommandResult> } = {};

  on(prefix: string[], respond: Responder | Partial<CommandResult>): this {
    this.rules.push({
      match: (argv) => prefix.every((part, i) => argv[i] === part),
      respond: typeof respond === 'function' ? respond : () => respond,
    });
    return this;
  }

  argvs(): string[][] {
    return this.calls.map((c) => c.argv);
  }

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    const rule = this.rules.find((r) => r.match(spec.argv));
    if (spec.signal?.aborted) return result({ exitCode: null, aborted: true });
    return result(rule ? await rule.respond(spec) : {});
  }

  start(spec: CommandSpec): BackgroundProcess {
    const entry: StartedProcess = { spec, stopped: false };
    this.started.push(entry);
    let done = false;
    let resolveExit: (r: CommandResult) => void = () => undefined;
    const exited = new Promise<CommandResult>((resolve) => {
      resolveExit = (r) => {
        done = true;
        resolve(r);
      };
    });
    const immediate = this.startBehavior.exitImmediately;
    if (immediate) resolveExit(result({ exitCode: 1, ...immediate }));
    return {
      argv: spec.argv,
      exited,
      hasExited: () => done,
      stop: async () => {
        entry.stopped = true;
        if (!done) resolveExit(result({ exitCode: null }));
        await exited;
      },
    };
  }
}

/** A command that never finishes on its own; settles as aborted when its signal fires. */
export function untilAborted(spec: CommandSpec): Promise<Partial<CommandResult>> {
  return new Promise((resolve) => {
    const signal = spec.signal;
    if (!signal) return;
    if (signal.aborted) resolve({ exitCode: null, aborted: true });
    signal.addEventListener('abort', () => resolve({ exitCode: null, aborted: true }), { once: true });
  });
}

export function observation(partial: Partial<RolloutObservation> = {}): RolloutObservation {
  return {
    desiredReplicas: 3,
    replicas: 3,
    updatedReplicas: 0,
    readyReplicas: 0,
    availableReplicas: 0,
    generationObserved: true,
    conditions: [],
    waitingReasons: [],
    observedAt: 0,
    ...partial,
  };
}

/** ClusterClient with scripted rollout observations and per-method failures. */
export class FakeClusterClient implements ClusterClient {
  credentials = true;
  readonly applied: string[] = [];
  readonly calls: string[] = [];
  /** Returned in order; the last one repeats. */
  observations: RolloutObservation[] = [observation({ updatedReplicas: 3, readyReplicas: 3, availableReplicas: 3 })];
  failures: Partial<Record<'describe' | 'logs' | 'listEvents' | 'listResources' | 'getRolloutStatus', string>> = {};
  private applyCount = 0;
  private pollCount = 0;

  hasCredentials(): boolean {
    return this.credentials;
  }

  async apply(manifest: string): Promise<ApplyResult> {
    this.calls.push('apply');
    this.applied.push(manifest);
    const first = this.applyCount++ === 0;
    const action = first ? 'created' : 'unchanged';
    return {
      changed: first,
      objects: [
        { kind: 'deployment', name: 'web', action },
        { kind: 'service', name: 'web-service', action },
      ],
    };
  }

  async getRolloutStatus(): Promise<RolloutObservation> {
    this.calls.push('getRolloutStatus');
    this.fail('getRolloutStatus');
    const index = Math.min(this.pollCount++, this.observations.length - 1);
    return this.observations[index];
  }

  async describe(kind: string, name: string): Promise<string> {
    this.calls.push('describe');
    this.fail('describe');
    return `Name: ${name}\nKind: ${kind}`;
  }

  async logs(selector: string, _namespace: string, tailLines: number): Promise<string> {
    this.calls.push('logs');
    this.fail('logs');
    return `logs for ${selector} (tail ${tailLines})`;
  }

  async listEvents(namespace: string, limit: number): Promise<string> {
    this.calls.push('listEvents');
    this.fail('listEvents');
    return `events in ${namespace} (last ${limit})`;
  }

  async listResources(selector: string): Promise<string> {
    this.calls.push('listResources');
    this.fail('listResources');
    return `resources matching ${selector}`;
  }

  private fail(method: keyof FakeClusterClient['failures']): void {
    const reason = this.failures[method];
    if (reason) throw new Error(reason);
  }
}
