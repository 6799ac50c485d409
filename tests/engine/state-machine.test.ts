import {
  isTerminalStageStatus,
  transitionRunStatus,
  transitionStageStatus,
} from '../../src/engine/state-machine';
import { RunStatus, StageRunStatus, isTerminalRunStatus } from '../../src/domain/run';

describe('Run State Machine', () => {
  test('valid transition: created -> running', () => {
    const result = transitionRunStatus(RunStatus.Created, RunStatus.Running);
    expect(result).toEqual({ success: true, newStatus: RunStatus.Running });
  });

  test('valid transition: created -> aborted', () => {
    expect(transitionRunStatus(RunStatus.Created, RunStatus.Aborted).success).toBe(true);
  });

  test.each([RunStatus.Succeeded, RunStatus.Failed, RunStatus.Aborted])('valid transition: running -> %s', (target) => {
    expect(transitionRunStatus(RunStatus.Running, target).success).toBe(true);
  });

  test('invalid transition: created -> succeeded', () => {
    const result = transitionRunStatus(RunStatus.Created, RunStatus.Succeeded);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('RUN.INVALID_TRANSITION');
      expect(result.error.message).toBe('Invalid run state transition: created -> succeeded');
    }
  });

  test.each([RunStatus.Succeeded, RunStatus.Failed, RunStatus.Aborted])('terminal status %s cannot change', (terminal) => {
    for (const target of Object.values(RunStatus)) {
      expect(transitionRunStatus(terminal, target).success).toBe(false);
    }
  });

  test('terminal run statuses', () => {
    expect(isTerminalRunStatus(RunStatus.Created)).toBe(false);
    expect(isTerminalRunStatus(RunStatus.Running)).toBe(false);
    expect(isTerminalRunStatus(RunStatus.Succeeded)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Failed)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Aborted)).toBe(true);
  });
});

describe('Stage State Machine', () => {
  test('valid transition: pending -> running -> succeeded', () => {
    expect(transitionStageStatus(StageRunStatus.Pending, StageRunStatus.Running).success).toBe(true);
    expect(transitionStageStatus(StageRunStatus.Running, StageRunStatus.Succeeded).success).toBe(true);
  });

  test('valid transition: pending -> skipped', () => {
    expect(transitionStageStatus(StageRunStatus.Pending, StageRunStatus.Skipped).success).toBe(true);
  });

  test('invalid transition: skipped -> running', () => {
    const result = transitionStageStatus(StageRunStatus.Skipped, StageRunStatus.Running);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('STAGE.INVALID_TRANSITION');
  });

  test('terminal stage statuses', () => {
    expect(isTerminalStageStatus(StageRunStatus.Pending)).toBe(false);
    expect(isTerminalStageStatus(StageRunStatus.Running)).toBe(false);
    expect(isTerminalStageStatus(StageRunStatus.Succeeded)).toBe(true);
    expect(isTerminalStageStatus(StageRunStatus.Failed)).toBe(true);
    expect(isTerminalStageStatus(StageRunStatus.Aborted)).toBe(true);
    expect(isTerminalStageStatus(StageRunStatus.Skipped)).toBe(true);
  });
});
