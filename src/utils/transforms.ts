/**
 * Утилиты для преобразования координат
 */

import type { CanvasViewport, Point2D } from '../types';
import { SWEEP_CONFIG } from '../config';

/**
 * Градусы в радианы
 */
export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Количество шагов на полный оборот; шаг обязан делить 360
 */
export function stepCountFor(stepDegrees: number): number {
  const count = SWEEP_CONFIG.FULL_CIRCLE_DEG / stepDegrees;
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Шаг ${stepDegrees}° не делит ${SWEEP_CONFIG.FULL_CIRCLE_DEG}°`);
  }
  return count;
}

/**
 * Углы (рад) для каждого индекса шага, по возрастанию
 */
export function stepAngles(stepDegrees: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => degToRad(i * stepDegrees));
}

/**
 * Полярные координаты в декартовы
 */
export function polarToCartesian(distance: number, angle: number): Point2D {
  return {
    x: distance * Math.cos(angle),
    y: distance * Math.sin(angle),
  };
}

/**
 * Сдвиг индекса шага по кругу: (step + delta) mod count, всегда неотрицательный
 */
export function wrapStep(step: number, delta: number, count: number): number {
  return (((step + delta) % count) + count) % count;
}

/**
 * Преобразует мировые координаты (см, ось Y вверх) в пиксели canvas
 */
export function worldToCanvas(point: Point2D, viewport: CanvasViewport): Point2D {
  const scale = Math.min(viewport.width, viewport.height) / (2 * viewport.extent);
  return {
    x: viewport.width / 2 + point.x * scale,
    y: viewport.height / 2 - point.y * scale, // Инвертируем Y
  };
}

/**
 * Длина в см в пикселях canvas
 */
export function worldLengthToCanvas(length: number, viewport: CanvasViewport): number {
  return (length * Math.min(viewport.width, viewport.height)) / (2 * viewport.extent);
}
