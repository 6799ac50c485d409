import { Command, FailurePolicy, shellCommand } from '../engine/stage-runner';
import { Logger } from '../logger';
import { SOURCE_DIR } from './source';

export interface PackageManagerOptions {
  installCommand: string[];
  testCommand: string[];
  /** Applies to the test command only; installation failures are always fatal. */
  failurePolicy: FailurePolicy;
}

/** installDependencies() and runTests(), run in the checked-out source tree. */
export function packageManagerCommands(options: PackageManagerOptions, log: Logger): Command[] {
  if (options.failurePolicy === 'absorb') {
    log.warn('Test failures will be absorbed; a failing test suite does not stop the pipeline', {
      testCommand: options.testCommand.join(' '),
    });
  }
  return [
    shellCommand('install dependencies', options.installCommand, { cwd: SOURCE_DIR }),
    shellCommand('run tests', options.testCommand, { cwd: SOURCE_DIR, onFailure: options.failurePolicy }),
  ];
}
