import { describe, it, expect } from 'vitest';
import {
  degToRad,
  polarToCartesian,
  stepAngles,
  stepCountFor,
  worldLengthToCanvas,
  worldToCanvas,
  wrapStep,
} from './transforms';

const viewport = { width: 600, height: 600, extent: 400 };

describe('transforms', () => {
  it('converts degrees to radians', () => {
    expect(degToRad(180)).toBeCloseTo(Math.PI);
    expect(degToRad(4)).toBeCloseTo(0.0698132, 6);
  });

  it('derives the step count from the step size', () => {
    expect(stepCountFor(4)).toBe(90);
    expect(stepCountFor(1)).toBe(360);
    expect(() => stepCountFor(7)).toThrow('Шаг 7° не делит 360°');
  });

  it('returns one angle per step in ascending order', () => {
    const angles = stepAngles(90, 4);
    expect(angles).toHaveLength(4);
    expect(angles[0]).toBe(0);
    expect(angles[1]).toBeCloseTo(Math.PI / 2);
    expect(angles[2]).toBeCloseTo(Math.PI);
    expect(angles[3]).toBeCloseTo((3 * Math.PI) / 2);
  });

  it('projects polar coordinates to cartesian', () => {
    expect(polarToCartesian(100, 0)).toEqual({ x: 100, y: 0 });

    const up = polarToCartesian(100, Math.PI / 2);
    expect(up.x).toBeCloseTo(0);
    expect(up.y).toBeCloseTo(100);
  });

  it('wraps step indices in both directions', () => {
    expect(wrapStep(89, 1, 90)).toBe(0);
    expect(wrapStep(0, -1, 90)).toBe(89);
    expect(wrapStep(10, 0, 90)).toBe(10);
    expect(wrapStep(3, 180, 90)).toBe(3);
  });

  it('maps world coordinates to canvas pixels with Y pointing up', () => {
    expect(worldToCanvas({ x: 0, y: 0 }, viewport)).toEqual({ x: 300, y: 300 });
    expect(worldToCanvas({ x: 400, y: 400 }, viewport)).toEqual({ x: 600, y: 0 });
    expect(worldToCanvas({ x: -400, y: -400 }, viewport)).toEqual({ x: 0, y: 600 });
  });

  it('scales lengths to pixels', () => {
    expect(worldLengthToCanvas(200, viewport)).toBe(150);
  });
});
