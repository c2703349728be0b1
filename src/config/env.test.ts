import { describe, expect, it } from 'vitest';
import { ReaderMode } from '../types';
import { LogLevel } from '../utils/logger';
import { loadConfig } from './env';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      mode: ReaderMode.SERIAL,
      serial: { path: '/dev/ttyUSB0', baudRate: 115200, settleMs: 2000 },
      sweep: { stepDegrees: 4, stepCount: 90, maxRange: 400 },
      simulation: { intervalMs: 80, minDistance: 50, maxDistance: 400 },
      display: { host: '127.0.0.1', port: 8080, frameIntervalMs: 50 },
      logLevel: LogLevel.INFO,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      RADAR_MODE: 'emulated',
      RADAR_PORT: '/dev/ttyACM1',
      RADAR_BAUD_RATE: '9600',
      RADAR_STEP_DEG: '10',
      RADAR_MAX_RANGE: '200',
      RADAR_SETTLE_MS: '0',
      RADAR_HTTP_PORT: '9000',
      RADAR_LOG_LEVEL: 'debug',
    });

    expect(config.mode).toBe(ReaderMode.EMULATED);
    expect(config.serial).toEqual({ path: '/dev/ttyACM1', baudRate: 9600, settleMs: 0 });
    expect(config.sweep).toEqual({ stepDegrees: 10, stepCount: 36, maxRange: 200 });
    expect(config.simulation.maxDistance).toBe(200);
    expect(config.display.port).toBe(9000);
    expect(config.logLevel).toBe(LogLevel.DEBUG);
  });

  it('lets RADAR_SIMULATE override the mode', () => {
    expect(loadConfig({ RADAR_MODE: 'serial', RADAR_SIMULATE: 'true' }).mode).toBe(ReaderMode.SIMULATED);
    expect(loadConfig({ RADAR_SIMULATE: '0' }).mode).toBe(ReaderMode.SERIAL);
  });

  it('keeps the simulated minimum inside a short range', () => {
    expect(loadConfig({ RADAR_MAX_RANGE: '30' }).simulation).toEqual({
      intervalMs: 80,
      minDistance: 30,
      maxDistance: 30,
    });
  });

  it('rejects a step size that does not divide 360', () => {
    expect(() => loadConfig({ RADAR_STEP_DEG: '7' })).toThrow(
      'Некорректная конфигурация: RADAR_STEP_DEG: шаг должен делить 360'
    );
  });

  it('rejects an unknown mode and a bad baud rate', () => {
    expect(() => loadConfig({ RADAR_MODE: 'bogus' })).toThrow(/RADAR_MODE/);
    expect(() => loadConfig({ RADAR_BAUD_RATE: 'fast' })).toThrow(/RADAR_BAUD_RATE/);
  });
});
