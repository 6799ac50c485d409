import {
  PipelineError,
  commandFailedError,
  maskSecret,
  maskSecretsInMessage,
  toTypedError,
  validationError,
} from '../../src/domain/errors';

describe('maskSecret', () => {
  it('keeps the last four characters of long secrets', () => {
    expect(maskSecret('test-secret-value')).toBe('*************alue');
  });

  it('fully masks short secrets', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });
});

describe('maskSecretsInMessage', () => {
  it('replaces every occurrence of every secret', () => {
    const message = 'login test-secret ok; retry test-secret; token abc';
    expect(maskSecretsInMessage(message, ['test-secret', 'abc'])).toBe(
      'login *******cret ok; retry *******cret; token ****',
    );
  });

  it('treats regex characters in secrets literally', () => {
    expect(maskSecretsInMessage('pw=a.b*c+d?e', ['a.b*c+d?e'])).toBe('pw=*****+d?e');
  });

  it('ignores empty secrets', () => {
    expect(maskSecretsInMessage('nothing here', [''])).toBe('nothing here');
  });
});

describe('toTypedError', () => {
  it('unwraps a PipelineError and fills in the stage', () => {
    const typed = toTypedError(new PipelineError(validationError('bad input')), 'STAGE.FAILED', 'Deploy');
    expect(typed.code).toBe('VALIDATION.SCHEMA');
    expect(typed.stage).toBe('Deploy');
  });

  it('keeps a stage the error already names', () => {
    const typed = toTypedError(
      new PipelineError(commandFailedError('Checkout', 'git clone', 128, 'fatal')),
      'STAGE.FAILED',
      'Deploy',
    );
    expect(typed.stage).toBe('Checkout');
  });

  it('wraps plain errors under the fallback code', () => {
    const typed = toTypedError(new Error('boom'), 'HOOK.FAILED');
    expect(typed).toEqual({
      code: 'HOOK.FAILED',
      message: 'boom',
      stage: undefined,
      runId: undefined,
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
  });
});

describe('commandFailedError', () => {
  it('describes a non-zero exit', () => {
    const error = commandFailedError('Install & Test', 'run tests', 1, 'FAIL src/app.test.ts');
    expect(error.code).toBe('COMMAND.NON_ZERO_EXIT');
    expect(error.message).toBe('Command "run tests" exited with code 1');
    expect(error.details).toEqual({ command: 'run tests', exitCode: 1, output: 'FAIL src/app.test.ts' });
  });

  it('describes a process killed before exiting', () => {
    expect(commandFailedError('Deploy', 'kubectl', null, '').message).toBe('Command "kubectl" was terminated before it exited');
  });
});
