/**
 * Secret sources.
 *
 * The secret-storage backend is external; the pipeline only asks it for
 * material by binding id. Two sources are provided: one reading a
 * snapshot of environment variables, one in memory.
 */

import { readFile } from 'fs/promises';
import { CredentialKind, SecretMaterial } from '../domain/credentials';

export interface SecretSource {
  /** Returns undefined when the source holds nothing of that kind under `id`. */
  resolve(id: string, kind: CredentialKind): Promise<SecretMaterial | undefined>;
}

/** `registry-credentials` -> `SHIPLINE_SECRET_REGISTRY_CREDENTIALS`. */
export function secretEnvPrefix(id: string): string {
  return `SHIPLINE_SECRET_${id.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}`;
}

/**
 * Reads secrets from an environment snapshot taken at construction:
 *
 * - usernamePassword: `<PREFIX>_USERNAME`, `<PREFIX>_PASSWORD`
 * - secretText: `<PREFIX>_TEXT`
 * - secretFile: `<PREFIX>_FILE` (path to read) or `<PREFIX>_CONTENT`
 */
export class EnvSecretSource implements SecretSource {
  private env: Record<string, string | undefined>;

  constructor(env: Record<string, string | undefined>) {
    this.env = { ...env };
  }

  async resolve(id: string, kind: CredentialKind): Promise<SecretMaterial | undefined> {
    const prefix = secretEnvPrefix(id);
    switch (kind) {
      case 'usernamePassword': {
        const username = this.env[`${prefix}_USERNAME`];
        const password = this.env[`${prefix}_PASSWORD`];
        return username !== undefined && password !== undefined
          ? { kind, username, password }
          : undefined;
      }
      case 'secretText': {
        const text = this.env[`${prefix}_TEXT`];
        return text !== undefined ? { kind, text } : undefined;
      }
      case 'secretFile': {
        const inline = this.env[`${prefix}_CONTENT`];
        if (inline !== undefined) return { kind, content: inline };
        const file = this.env[`${prefix}_FILE`];
        if (file === undefined) return undefined;
        return { kind, content: await readFile(file, 'utf8') };
      }
    }
  }
}

/** In-memory source keyed by binding id. */
export class MemorySecretSource implements SecretSource {
  private secrets = new Map<string, SecretMaterial>();

  constructor(entries: Record<string, SecretMaterial> = {}) {
    for (const [id, material] of Object.entries(entries)) this.secrets.set(id, material);
  }

  set(id: string, material: SecretMaterial): void {
    this.secrets.set(id, material);
  }

  async resolve(id: string, kind: CredentialKind): Promise<SecretMaterial | undefined> {
    const material = this.secrets.get(id);
    return material && material.kind === kind ? material : undefined;
  }
}
