/**
 * Симулятор радара: случайные расстояния без железа
 */

import { LOG_CONFIG } from '../config';
import { ReaderState } from '../types';
import { delay, logger } from '../utils';
import type { SweepReader } from './sweep-reader';
import type { SweepState } from './sweep-state';

const PREFIX = LOG_CONFIG.PREFIXES.SIM;

export interface SimulatedReaderOptions {
  intervalMs: number;
  minDistance: number;
  maxDistance: number;
  /**
   * Источник случайных чисел в [0, 1)
   */
  random?: () => number;
}

export class SimulatedReader implements SweepReader {
  readonly name = 'simulated';
  private currentState = ReaderState.IDLE;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly sweep: SweepState,
    private readonly options: SimulatedReaderOptions
  ) {}

  get state(): ReaderState {
    return this.currentState;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.currentState !== ReaderState.IDLE) return;
    if (signal?.aborted) {
      this.currentState = ReaderState.STOPPED;
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    signal?.addEventListener('abort', () => controller.abort(), { once: true });

    this.currentState = ReaderState.RUNNING;
    logger.info(PREFIX, `Симуляция запущена, такт ${this.options.intervalMs} мс`);
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
  }

  /**
   * Один такт: случайное расстояние в текущий шаг и сдвиг
   */
  tick(): void {
    if (!this.sweep.isRunning) return;
    const { minDistance, maxDistance } = this.options;
    const random = this.options.random ?? Math.random;
    const distance = minDistance + random() * (maxDistance - minDistance);
    this.sweep.recordAndAdvance(distance);
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        this.tick();
      } catch (err) {
        logger.error(PREFIX, 'Ошибка такта симуляции:', err);
      }
      await delay(this.options.intervalMs, signal);
    }
    this.currentState = ReaderState.STOPPED;
    logger.info(PREFIX, 'Симуляция остановлена');
  }
}
