/**
 * Экспорт всех типов
 */

export * from './radar';
export * from './messages';
export * from './canvas';

/**
 * Внутренние типы приложения
 */

export enum ReaderMode {
  SERIAL = 'serial',
  SIMULATED = 'simulated',
  EMULATED = 'emulated',
}

export enum ReaderState {
  IDLE = 'idle',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPED = 'stopped',
  FAILED = 'failed',
}
