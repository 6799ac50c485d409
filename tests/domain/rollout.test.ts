import { classifyObservation } from '../../src/domain/rollout';
import { observation } from '../helpers/fakes';

const converged = { updatedReplicas: 3, readyReplicas: 3, availableReplicas: 3 };

describe('classifyObservation', () => {
  it('is converged when every desired replica is updated, ready and available', () => {
    expect(classifyObservation(observation(converged))).toEqual({ kind: 'converged' });
  });

  it('keeps progressing while old pods remain', () => {
    expect(classifyObservation(observation({ ...converged, replicas: 4 }))).toEqual({ kind: 'progressing' });
  });

  it('keeps progressing until the controller has seen the new spec', () => {
    expect(classifyObservation(observation({ ...converged, generationObserved: false }))).toEqual({ kind: 'progressing' });
  });

  it('keeps progressing while replicas are not ready', () => {
    expect(classifyObservation(observation({ updatedReplicas: 3, readyReplicas: 2, availableReplicas: 2 }))).toEqual({ kind: 'progressing' });
  });

  it('fails on an exceeded progress deadline', () => {
    const verdict = classifyObservation(observation({
      conditions: [{
        type: 'Progressing',
        status: 'False',
        reason: 'ProgressDeadlineExceeded',
        message: 'ReplicaSet "web-6d4f" has timed out progressing.',
      }],
    }));
    expect(verdict).toEqual({ kind: 'failed', reason: 'ReplicaSet "web-6d4f" has timed out progressing.' });
  });

  it('fails on a terminal pod waiting reason', () => {
    expect(classifyObservation(observation({ waitingReasons: ['ContainerCreating', 'ImagePullBackOff'] })))
      .toEqual({ kind: 'failed', reason: 'ImagePullBackOff' });
  });

  it('does not treat transient waiting reasons as terminal', () => {
    expect(classifyObservation(observation({ waitingReasons: ['ContainerCreating'] }))).toEqual({ kind: 'progressing' });
    expect(classifyObservation(observation({ waitingReasons: ['ErrImagePull'] }))).toEqual({ kind: 'progressing' });
  });
});
