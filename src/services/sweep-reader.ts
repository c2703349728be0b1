/**
 * Общий контракт источников данных развёртки
 */

import type { ReaderState } from '../types';

export interface SweepReader {
  readonly name: string;
  readonly state: ReaderState;

  /**
   * Запускает фоновую задачу. Резолвится, когда ридер вышел на рабочий
   * режим или не смог запуститься (ошибка логируется, не пробрасывается).
   * Отмена сигнала равносильна stop().
   */
  start(signal?: AbortSignal): Promise<void>;

  /**
   * Останавливает задачу и дожидается её завершения
   */
  stop(): Promise<void>;
}
