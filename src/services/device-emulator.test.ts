import { describe, expect, it } from 'vitest';
import { DeviceEmulator, clampMeasurement, formatDistanceLine } from './device-emulator';
import type { DeviceLink } from './device-emulator';

class FakeLink implements DeviceLink {
  recording = Buffer.alloc(0);
  readonly sent: string[] = [];

  emitData(data: string | Buffer): void {
    this.sent.push(data.toString());
  }
}

function readyEmulator(measure: () => number = () => 120) {
  const link = new FakeLink();
  const emulator = new DeviceEmulator(() => link, { measure });
  link.recording = Buffer.from('RDY\r\n');
  emulator.step();
  link.sent.length = 0;
  return { link, emulator };
}

describe('clampMeasurement', () => {
  it('keeps readings inside the sensor window and zeroes the rest', () => {
    expect(clampMeasurement(2)).toBe(2);
    expect(clampMeasurement(400)).toBe(400);
    expect(clampMeasurement(1.9)).toBe(0);
    expect(clampMeasurement(400.1)).toBe(0);
  });
});

describe('formatDistanceLine', () => {
  it('prints six decimals like printf %f', () => {
    expect(formatDistanceLine(123.456)).toBe('Distance: 123.456000');
    expect(formatDistanceLine(0)).toBe('Distance: 0.000000');
  });
});

describe('DeviceEmulator', () => {
  it('does nothing until the port is open', () => {
    const emulator = new DeviceEmulator(() => undefined);
    expect(() => emulator.step()).not.toThrow();
    expect(emulator.isReady).toBe(false);
  });

  it('waits for RDY before sending measurements', () => {
    const link = new FakeLink();
    const emulator = new DeviceEmulator(() => link);

    emulator.step();
    expect(link.sent).toEqual(['ESP32: Waiting for RDY signal...\n\r']);
    expect(emulator.isReady).toBe(false);

    link.recording = Buffer.from('RDY\r\n');
    emulator.step();
    expect(emulator.isReady).toBe(true);
    expect(link.sent[1]).toBe('ESP32: Ready signal received.\n\r');
  });

  it('sends FWR then the distance on each cycle', () => {
    const { link, emulator } = readyEmulator(() => 123.456);

    emulator.step();

    expect(link.sent).toEqual(['FWR\n\r', 'Distance: 123.456000\n\r']);
  });

  it('reports out-of-range readings as zero', () => {
    const { link, emulator } = readyEmulator(() => 450);

    emulator.step();

    expect(link.sent[1]).toBe('Distance: 0.000000\n\r');
  });

  it('changes direction after 91 measurements, then every 90', () => {
    const { link, emulator } = readyEmulator();
    const cdrCount = () => link.sent.filter((line) => line === 'CDR\n\r').length;

    for (let i = 0; i < 90; i++) emulator.step();
    expect(cdrCount()).toBe(0);

    emulator.step();
    expect(cdrCount()).toBe(1);
    expect(link.sent[link.sent.length - 1]).toBe('CDR\n\r');

    for (let i = 0; i < 89; i++) emulator.step();
    expect(cdrCount()).toBe(1);

    emulator.step();
    expect(cdrCount()).toBe(2);
  });
});
