/**
 * Build artifact domain model.
 *
 * The image produced by the build-and-push stage, referenced as
 * `<registry>/<image>:<tag>` where the tag is the run's build number.
 */

/** What to do when a tag about to be pushed was already pushed from another source. */
export type TagPolicy = 'fail' | 'overwrite';

/** Where a pushed image came from. */
export interface ArtifactProvenance {
  runId: string;
  pipelineId: string;
  buildNumber: number;
  commit?: string;
}

/** A pushed image. */
export interface BuildArtifact {
  /** `<registry>/<image>` without tag. */
  repository: string;
  tag: string;
  /** Full reference, `<repository>:<tag>`. */
  ref: string;
  provenance: ArtifactProvenance;
  pushedAt: string;
}

/** Join registry and image name into a repository, tolerating a trailing slash. */
export function imageRepository(registry: string, image: string): string {
  const host = registry.replace(/\/+$/, '');
  return host ? `${host}/${image}` : image;
}

/** Full image reference for a build number. */
export function imageRef(registry: string, image: string, buildNumber: number): string {
  return `${imageRepository(registry, image)}:${buildNumber}`;
}

/**
 * Split an image reference into repository and tag. A colon inside the
 * registry host (port) is not a tag separator.
 */
export function parseImageRef(ref: string): { repository: string; tag?: string } {
  const lastSlash = ref.lastIndexOf('/');
  const lastColon = ref.lastIndexOf(':');
  if (lastColon > lastSlash) {
    return { repository: ref.slice(0, lastColon), tag: ref.slice(lastColon + 1) };
  }
  return { repository: ref };
}

/**
 * Two pushes of the same tag conflict when they come from different
 * sources. Same run (a retried push) or the same commit is not a conflict.
 */
export function isProvenanceConflict(existing: ArtifactProvenance, incoming: ArtifactProvenance): boolean {
  if (existing.runId === incoming.runId) return false;
  if (existing.commit && incoming.commit && existing.commit === incoming.commit) return false;
  return true;
}
