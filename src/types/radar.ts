/**
 * Типы состояния развёртки и кадра радара
 */

/**
 * Направление развёртки: +1 по часовой стрелке прошивки, -1 обратно
 */
export type SweepDirection = 1 | -1;

/**
 * Согласованная копия состояния развёртки
 */
export interface SweepSnapshot {
  readonly distances: readonly number[];
  readonly currentStep: number;
  readonly direction: SweepDirection;
  readonly isRunning: boolean;
}

export interface Point2D {
  x: number;
  y: number;
}

/**
 * Луч от центра до границы дальности
 */
export interface BeamSegment {
  from: Point2D;
  to: Point2D;
}

/**
 * Результат одного вызова рендерера
 */
export interface RadarFrame {
  points: Point2D[];
  beam: BeamSegment;
  beamAngle: number;
  currentStep: number;
  isRunning: boolean;
}
