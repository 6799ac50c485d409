import path from 'path';
import {
  ExecutionContext,
  ExecutionContextPool,
  hostEnvironment,
  planRunVolumes,
} from '../../src/runtime/execution-context';
import { ScriptedRunner } from '../helpers/fakes';

const volumes = planRunVolumes('/work', 'web-4', '/work/web/build-cache');

describe('planRunVolumes', () => {
  it('puts run volumes under a per-run root and shares the build cache', () => {
    expect(volumes).toEqual({
      root: path.join('/work', 'web-4'),
      paths: {
        workspace: path.join('/work', 'web-4', 'workspace'),
        'cache-config': path.join('/work', 'web-4', 'cache-config'),
        'build-cache': '/work/web/build-cache',
      },
    });
  });
});

describe('ExecutionContext', () => {
  const runner = new ScriptedRunner();
  const context = new ExecutionContext(
    { identity: 'source', image: 'node:20-alpine', mounts: ['workspace'], env: { CI: 'true' } },
    volumes,
    runner,
    { PATH: '/usr/bin', CI: 'false' },
  );

  it('only exposes the volumes it mounts', () => {
    expect(context.volume('workspace')).toBe(path.join('/work', 'web-4', 'workspace'));
    expect(() => context.volume('build-cache')).toThrow('Execution context "source" does not mount volume "build-cache"');
  });

  it('runs in the workspace with its own environment layered over the host', async () => {
    await context.exec(['npm', 'test'], { cwd: 'source', env: { API_TOKEN: 'test-secret' } });
    await context.exec(['ls'], { cwd: '/tmp' });

    expect(runner.calls[0].cwd).toBe(path.join('/work', 'web-4', 'workspace', 'source'));
    expect(runner.calls[0].env).toEqual({ PATH: '/usr/bin', CI: 'true', API_TOKEN: 'test-secret' });
    expect(runner.calls[1].cwd).toBe('/tmp');
  });
});

describe('ExecutionContextPool', () => {
  const pool = new ExecutionContextPool([
    { identity: 'source', image: 'node:20-alpine', mounts: ['workspace'] },
    { identity: 'builder', image: 'moby/buildkit:rootless', mounts: ['workspace', 'build-cache'] },
  ], new ScriptedRunner());

  it('acquires declared contexts only', () => {
    expect(pool.identities()).toEqual(['source', 'builder']);
    expect(pool.acquire('builder', volumes).volume('build-cache')).toBe('/work/web/build-cache');
    expect(() => pool.acquire('deployer', volumes, 'Deploy')).toThrow('No execution context is declared for identity "deployer"');
  });
});

describe('hostEnvironment', () => {
  it('passes through only the basic host variables', () => {
    expect(hostEnvironment({ PATH: '/usr/bin', HOME: '/home/ci', AWS_SECRET_ACCESS_KEY: 'test-secret', LANG: undefined }))
      .toEqual({ PATH: '/usr/bin', HOME: '/home/ci' });
  });
});
