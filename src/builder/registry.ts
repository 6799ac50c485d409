/**
 * Registry helpers: auth config rendering and the optional
 * create-repository call.
 */

import { parseImageRef } from '../domain/artifact';

export interface RegistryCredentials {
  username: string;
  password: string;
}

const DOCKER_HUB_AUTH_KEY = 'https://index.docker.io/v1/';

/**
 * Registry host of a repository. The first path segment is a host only
 * when it looks like one (contains a dot or port, or is localhost);
 * otherwise the image lives on Docker Hub.
 */
export function registryHost(ref: string): string {
  const { repository } = parseImageRef(ref);
  const slash = repository.indexOf('/');
  if (slash === -1) return DOCKER_HUB_AUTH_KEY;
  const first = repository.slice(0, slash);
  if (first === 'docker.io' || first === 'index.docker.io') return DOCKER_HUB_AUTH_KEY;
  if (first.includes('.') || first.includes(':') || first === 'localhost') return first;
  return DOCKER_HUB_AUTH_KEY;
}

/** Contents of a `config.json` the builder reads through DOCKER_CONFIG. */
export function renderRegistryAuthConfig(ref: string, credentials: RegistryCredentials): string {
  const auth = registryAuthToken(credentials);
  return `${JSON.stringify({ auths: { [registryHost(ref)]: { auth } } }, null, 2)}\n`;
}

/** base64 `user:password`; masked in output like the password itself. */
export function registryAuthToken(credentials: RegistryCredentials): string {
  return Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
}

/** Substitute `{repository}` and `{image}` placeholders in a create-repository argv. */
export function expandRepositoryCommand(argv: readonly string[], repository: string, image: string): string[] {
  return argv.map((arg) => arg.split('{repository}').join(repository).split('{image}').join(image));
}
