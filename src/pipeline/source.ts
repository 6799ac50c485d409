/**
 * Source provider: a shallow git checkout of one branch into the
 * workspace volume.
 */

import { Command, StageContext, actionCommand, execChecked } from '../engine/stage-runner';

/** Checkout directory, relative to the workspace volume. */
export const SOURCE_DIR = 'source';

export interface CheckoutRequest {
  repositoryUrl: string;
  branch: string;
  /** Relative to the workspace volume. */
  dir: string;
}

export interface SourceProvider {
  checkout(ctx: StageContext, request: CheckoutRequest): Promise<{ commit: string }>;
}

export class GitSourceProvider implements SourceProvider {
  constructor(private gitBinary: string = 'git') {}

  async checkout(ctx: StageContext, request: CheckoutRequest): Promise<{ commit: string }> {
    await execChecked(ctx, 'git clone', [
      this.gitBinary, 'clone',
      '--branch', request.branch,
      '--depth', '1',
      '--', request.repositoryUrl, request.dir,
    ]);
    const head = await execChecked(ctx, 'git rev-parse', [this.gitBinary, 'rev-parse', 'HEAD'], { cwd: request.dir });
    return { commit: head.stdout.trim() };
  }
}

/**
 * The checkout command. A `branch` run parameter overrides the configured
 * branch. Records the resolved commit on the run.
 */
export function checkoutCommand(
  provider: SourceProvider,
  source: { repositoryUrl: string; branch: string },
): Command {
  return actionCommand('checkout', async (ctx) => {
    const branch = ctx.run.parameters.branch || source.branch;
    const { commit } = await provider.checkout(ctx, {
      repositoryUrl: source.repositoryUrl,
      branch,
      dir: SOURCE_DIR,
    });
    ctx.facts.commit = commit;
    ctx.log.info('Source checked out', { branch, commit });
  });
}
