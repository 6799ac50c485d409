/**
 * Credential bindings.
 *
 * A binding names a secret held outside the pipeline and says how to
 * materialize it for one stage: as environment values or as a file.
 */

export type CredentialBinding =
  | {
      kind: 'usernamePassword';
      id: string;
      usernameVariable: string;
      passwordVariable: string;
    }
  | {
      kind: 'secretText';
      id: string;
      variable: string;
    }
  | {
      kind: 'secretFile';
      id: string;
      /** Relative paths resolve inside the scope's private directory. */
      path?: string;
      /** Environment variable set to the file's path (e.g. KUBECONFIG). */
      variable?: string;
      /** File mode; defaults to owner read/write only. */
      mode?: number;
    };

export type CredentialKind = CredentialBinding['kind'];

/** Secret material as returned by a SecretSource. */
export type SecretMaterial =
  | { kind: 'usernamePassword'; username: string; password: string }
  | { kind: 'secretText'; text: string }
  | { kind: 'secretFile'; content: string };

export const DEFAULT_SECRET_FILE_MODE = 0o600;

/** Secret values that must never appear unmasked in output. */
export function secretValues(material: SecretMaterial): string[] {
  switch (material.kind) {
    case 'usernamePassword':
      return [material.password];
    case 'secretText':
      return [material.text];
    case 'secretFile':
      return [];
  }
}
