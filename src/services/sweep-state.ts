/**
 * Общее состояние развёртки: текущий шаг, направление, флаг работы
 * и буфер расстояний по шагам.
 *
 * Пишет в него только активный ридер, рендерер лишь снимает копию.
 * Все методы синхронные: в одном event loop каждый вызов выполняется
 * целиком, без вклинивания другого кода, поэтому запись расстояния и
 * снимок всегда согласованы между собой.
 */

import type { SweepDirection, SweepSnapshot } from '../types';
import { wrapStep } from '../utils';

export interface SweepStateInit {
  currentStep?: number;
  direction?: SweepDirection;
  isRunning?: boolean;
}

export class SweepState {
  private readonly distances: Float64Array;
  private step: number;
  private dir: SweepDirection;
  private running: boolean;

  constructor(readonly stepCount: number, init: SweepStateInit = {}) {
    if (!Number.isInteger(stepCount) || stepCount < 1) {
      throw new Error(`Некорректное число шагов: ${stepCount}`);
    }
    this.distances = new Float64Array(stepCount);
    this.step = wrapStep(init.currentStep ?? 0, 0, stepCount);
    this.dir = init.direction ?? 1;
    this.running = init.isRunning ?? true;
  }

  get currentStep(): number {
    return this.step;
  }

  get direction(): SweepDirection {
    return this.dir;
  }

  get isRunning(): boolean {
    return this.running;
  }

  distanceAt(index: number): number {
    return this.distances[wrapStep(index, 0, this.stepCount)];
  }

  /**
   * Записывает расстояние в ячейку текущего шага, возвращает индекс
   */
  recordDistance(value: number): number {
    this.distances[this.step] = value;
    return this.step;
  }

  /**
   * Сдвигает шаг на direction по кругу
   */
  advance(): number {
    this.step = wrapStep(this.step, this.dir, this.stepCount);
    return this.step;
  }

  /**
   * Запись и сдвиг одним действием (так работает симулятор)
   */
  recordAndAdvance(value: number): number {
    this.recordDistance(value);
    return this.advance();
  }

  /**
   * Меняет направление развёртки на противоположное
   */
  reverse(): SweepDirection {
    this.dir = this.dir === 1 ? -1 : 1;
    return this.dir;
  }

  setRunning(running: boolean): void {
    this.running = running;
  }

  /**
   * Копия состояния для рендерера
   */
  snapshot(): SweepSnapshot {
    return {
      distances: Array.from(this.distances),
      currentStep: this.step,
      direction: this.dir,
      isRunning: this.running,
    };
  }
}
