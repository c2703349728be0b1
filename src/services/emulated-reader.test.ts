import { afterEach, describe, expect, it, vi } from 'vitest';
import { ReaderState } from '../types';
import { EmulatedReader } from './emulated-reader';
import { SweepState } from './sweep-state';

describe('EmulatedReader', () => {
  let reader: EmulatedReader | null = null;

  afterEach(async () => {
    await reader?.stop();
    reader = null;
  });

  it('runs the serial path against the emulated firmware', async () => {
    const sweep = new SweepState(90);
    reader = new EmulatedReader(sweep, {
      path: '/dev/ttyEMU',
      baudRate: 115200,
      settleMs: 0,
      emulator: { cycleIntervalMs: 5, waitIntervalMs: 5, measure: () => 120 },
    });

    await reader.start();
    expect(reader.state).toBe(ReaderState.RUNNING);

    // FWR приходит раньше Distance, поэтому первое значение ложится в шаг 1
    await vi.waitFor(() => {
      expect(sweep.distanceAt(1)).toBe(120);
    });
    expect(sweep.distanceAt(0)).toBe(0);
    expect(sweep.direction).toBe(1);
  });

  it('stops both the emulator and the port', async () => {
    const sweep = new SweepState(90);
    reader = new EmulatedReader(sweep, {
      path: '/dev/ttyEMU',
      baudRate: 115200,
      settleMs: 0,
      emulator: { cycleIntervalMs: 5, waitIntervalMs: 5, measure: () => 120 },
    });

    await reader.start();
    await reader.stop();
    reader = null;

    const step = sweep.currentStep;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(sweep.currentStep).toBe(step);
  });

  it('does not start with an already aborted signal', async () => {
    const sweep = new SweepState(90);
    reader = new EmulatedReader(sweep, {
      path: '/dev/ttyEMU',
      baudRate: 115200,
      settleMs: 0,
      emulator: { cycleIntervalMs: 5, waitIntervalMs: 5, measure: () => 120 },
    });
    const controller = new AbortController();
    controller.abort();

    await reader.start(controller.signal);
    expect(reader.state).toBe(ReaderState.STOPPED);

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(sweep.currentStep).toBe(0);
  });
});
