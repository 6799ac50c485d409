/**
 * Credential Scope Manager.
 *
 * Materializes a stage's credential bindings immediately before the stage
 * body runs and removes them on every exit path: normal return, command
 * failure, thrown error or abort. Environment values live in a
 * scope-owned object (never in process.env); files live in a private
 * directory (mode 0700) or at their declared path (mode 0600) and are
 * deleted when the scope ends. Scope is enforced by lifetime, so a file
 * never outlives its stage even when contexts share a volume.
 */

import { chmod, mkdir, mkdtemp, rm, rmdir, writeFile } from 'fs/promises';
import path from 'path';
import {
  CredentialBinding,
  DEFAULT_SECRET_FILE_MODE,
  SecretMaterial,
  secretValues,
} from '../domain/credentials';
import {
  PipelineError,
  createTypedError,
  maskSecretsInMessage,
  secretMissingError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { SecretSource } from './secret-source';

/** Credentials visible to one stage while it runs. */
export class CredentialScope {
  private envValues: Record<string, string> = {};
  private files = new Map<string, string>();
  private extraFiles: string[] = [];
  /** Directories created outside `dir` for absolute file paths, deepest first. */
  private createdDirs: string[] = [];
  private secrets: string[] = [];
  private bindingIds = new Set<string>();
  private revoked = false;

  constructor(
    readonly stage: string,
    readonly dir: string,
  ) {}

  /** Copy of the materialized environment; empty once the scope has ended. */
  get env(): Record<string, string> {
    return this.revoked ? {} : { ...this.envValues };
  }

  get active(): boolean {
    return !this.revoked;
  }

  has(bindingId: string): boolean {
    return !this.revoked && this.bindingIds.has(bindingId);
  }

  /** Path of a file binding, while the scope is active. */
  filePath(bindingId: string): string | undefined {
    return this.revoked ? undefined : this.files.get(bindingId);
  }

  /** Mask every secret value of this scope in `text`. */
  mask(text: string): string {
    return maskSecretsInMessage(text, this.secrets);
  }

  /**
   * Write a file derived from secret material (e.g. a registry auth
   * config) inside the scope directory. Removed with the scope.
   */
  async writeFile(relativePath: string, content: string, mode: number = DEFAULT_SECRET_FILE_MODE): Promise<string> {
    this.assertActive();
    const target = path.join(this.dir, relativePath);
    await writeSecretFile(target, content, mode);
    this.extraFiles.push(target);
    return target;
  }

  /** Register a value to be masked in this scope's output. */
  addSecret(value: string): void {
    if (value.length > 0) this.secrets.push(value);
  }

  /** @internal */
  async materialize(binding: CredentialBinding, material: SecretMaterial): Promise<void> {
    this.assertActive();
    switch (binding.kind) {
      case 'usernamePassword':
        if (material.kind !== 'usernamePassword') throw kindMismatch(binding, material, this.stage);
        this.envValues[binding.usernameVariable] = material.username;
        this.envValues[binding.passwordVariable] = material.password;
        break;
      case 'secretText':
        if (material.kind !== 'secretText') throw kindMismatch(binding, material, this.stage);
        this.envValues[binding.variable] = material.text;
        break;
      case 'secretFile': {
        if (material.kind !== 'secretFile') throw kindMismatch(binding, material, this.stage);
        const declared = binding.path ?? binding.id;
        const target = path.isAbsolute(declared) ? declared : path.join(this.dir, declared);
        // Registered before writing so a failed write is still cleaned up.
        this.files.set(binding.id, target);
        const created = await writeSecretFile(target, material.content, binding.mode ?? DEFAULT_SECRET_FILE_MODE);
        if (path.isAbsolute(declared)) this.createdDirs.unshift(...created);
        if (binding.variable) this.envValues[binding.variable] = target;
        break;
      }
    }
    for (const value of secretValues(material)) this.addSecret(value);
    this.bindingIds.add(binding.id);
  }

  /** @internal Remove every materialization. Returns the paths that could not be removed. */
  async revoke(): Promise<string[]> {
    this.revoked = true;
    this.envValues = {};
    this.secrets = [];
    this.bindingIds.clear();
    const failures: string[] = [];
    const targets = [...this.files.values(), ...this.extraFiles, this.dir];
    const dirs = this.createdDirs;
    this.files.clear();
    this.extraFiles = [];
    this.createdDirs = [];
    for (const target of targets) {
      try {
        await rm(target, { recursive: true, force: true });
      } catch {
        failures.push(target);
      }
    }
    for (const dir of dirs) {
      try {
        await rmdir(dir);
      } catch (err) {
        // Something other than the scope wrote there; it stays.
        if (!hasErrorCode(err, 'ENOTEMPTY') && !hasErrorCode(err, 'ENOENT')) failures.push(dir);
      }
    }
    return failures;
  }

  private assertActive(): void {
    if (this.revoked) {
      throw new PipelineError(createTypedError({
        code: 'SECRETS.SCOPE_ENDED',
        message: `Credential scope of stage "${this.stage}" has ended`,
        stage: this.stage,
      }));
    }
  }
}

/** Write a secret file. Returns the directories it had to create, deepest first. */
async function writeSecretFile(target: string, content: string, mode: number): Promise<string[]> {
  const parent = path.dirname(target);
  const first = await mkdir(parent, { recursive: true, mode: 0o700 });
  const created: string[] = [];
  if (first) {
    for (let dir = parent; dir !== first && dir.startsWith(first); dir = path.dirname(dir)) created.push(dir);
    created.push(first);
  }
  await writeFile(target, content, { mode });
  // writeFile's mode is subject to umask and ignored for existing files.
  await chmod(target, mode);
  return created;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function kindMismatch(binding: CredentialBinding, material: SecretMaterial, stage: string): PipelineError {
  return new PipelineError(createTypedError({
    code: 'SECRETS.KIND_MISMATCH',
    message: `Credential "${binding.id}" is a ${material.kind}, but the binding expects a ${binding.kind}`,
    stage,
    details: { id: binding.id, expected: binding.kind, actual: material.kind },
  }));
}

export interface CredentialScopeOptions {
  /** Parent directory for per-scope private directories. */
  scopeRoot: string;
}

export class CredentialScopeManager {
  private active = new Map<CredentialScope, readonly CredentialBinding[]>();

  constructor(
    private source: SecretSource,
    private options: CredentialScopeOptions,
    private log: Logger = rootLogger.child({ module: 'credentials' }),
  ) {}

  /**
   * Run `fn` with `bindings` materialized. Resolution failures reject
   * before `fn` runs; materializations made so far are still removed.
   */
  async withScope<T>(
    stage: string,
    bindings: readonly CredentialBinding[],
    fn: (scope: CredentialScope) => Promise<T>,
  ): Promise<T> {
    await mkdir(this.options.scopeRoot, { recursive: true, mode: 0o700 });
    const dir = await mkdtemp(path.join(this.options.scopeRoot, 'scope-'));
    await chmod(dir, 0o700);
    const scope = new CredentialScope(stage, dir);
    this.active.set(scope, bindings);

    let result: T;
    try {
      for (const binding of bindings) {
        const material = await this.source.resolve(binding.id, binding.kind);
        if (!material) {
          throw new PipelineError(secretMissingError(binding.id, stage));
        }
        await scope.materialize(binding, material);
      }
      this.log.debug('Credentials materialized', { stage, bindings: bindings.map((b) => b.id) });
      result = await fn(scope);
    } catch (err) {
      await this.endScope(scope, false);
      throw err;
    }
    await this.endScope(scope, true);
    return result;
  }

  /** True while any active scope holds the binding. */
  isMaterialized(bindingId: string): boolean {
    for (const scope of this.active.keys()) {
      if (scope.has(bindingId)) return true;
    }
    return false;
  }

  /** Stage names with an open scope. */
  activeScopes(): string[] {
    return [...this.active.keys()].map((scope) => scope.stage);
  }

  private async endScope(scope: CredentialScope, surfaceFailure: boolean): Promise<void> {
    this.active.delete(scope);
    const failures = await scope.revoke();
    if (failures.length === 0) return;
    this.log.error('Credential cleanup failed', { stage: scope.stage, paths: failures });
    // When the body already failed, its error is the one reported.
    if (surfaceFailure) {
      throw new PipelineError(createTypedError({
        code: 'SECRETS.CLEANUP_FAILED',
        message: `Could not remove ${failures.length} credential file(s) of stage "${scope.stage}"`,
        stage: scope.stage,
        details: { paths: failures },
      }));
    }
  }
}
