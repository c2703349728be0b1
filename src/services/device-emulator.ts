/**
 * Эмулятор прошивки ESP32 поверх mock-порта.
 *
 * Повторяет цикл прошивки: ждёт "RDY", затем на каждом измерении шлёт
 * FWR и Distance, а после каждых 90 измерений (первый раз после 91-го,
 * как в прошивке) шлёт CDR.
 */

import { EMULATOR_CONFIG, LOG_CONFIG, PROTOCOL } from '../config';
import { delay, logger } from '../utils';

const PREFIX = LOG_CONFIG.PREFIXES.EMULATOR;

/**
 * Сторона устройства у mock-порта (привязка SerialPortMock)
 */
export interface DeviceLink {
  emitData(data: string | Buffer): void;
  readonly recording: Buffer;
}

export interface DeviceEmulatorOptions {
  cycleIntervalMs?: number;
  waitIntervalMs?: number;
  /**
   * Сырое измерение датчика в см
   */
  measure?: () => number;
}

/**
 * Прошивка отбрасывает значения вне рабочего диапазона датчика
 */
export function clampMeasurement(distance: number): number {
  if (distance >= EMULATOR_CONFIG.MIN_VALID_DISTANCE && distance <= EMULATOR_CONFIG.MAX_VALID_DISTANCE) {
    return distance;
  }
  return 0;
}

/**
 * Строка Distance в формате printf("%f")
 */
export function formatDistanceLine(distance: number): string {
  return `${PROTOCOL.DISTANCE_PREFIX} ${distance.toFixed(6)}`;
}

function defaultMeasure(): number {
  return Math.random() * 450;
}

export class DeviceEmulator {
  private ready = false;
  private measureCounter = 0;
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;

  constructor(
    private readonly link: () => DeviceLink | undefined,
    private readonly options: DeviceEmulatorOptions = {}
  ) {}

  get isReady(): boolean {
    return this.ready;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
  }

  /**
   * Один проход loop() прошивки (или ожидание RDY, пока его не было)
   */
  step(): void {
    const link = this.link();
    if (!link) return;

    if (!this.ready) {
      if (link.recording.toString('utf8').includes(`${PROTOCOL.READY}\r`)) {
        this.ready = true;
        this.send(link, EMULATOR_CONFIG.READY_MESSAGE);
        logger.info(PREFIX, 'Получен RDY, начинаем развёртку');
      } else {
        this.send(link, EMULATOR_CONFIG.WAITING_MESSAGE);
      }
      return;
    }

    const measure = this.options.measure ?? defaultMeasure;
    this.send(link, PROTOCOL.FORWARD);
    this.send(link, formatDistanceLine(clampMeasurement(measure())));

    if (this.measureCounter > EMULATOR_CONFIG.MEASUREMENTS_PER_SWEEP - 1) {
      this.measureCounter = 0;
      this.send(link, PROTOCOL.CHANGE_DIRECTION);
    }
    this.measureCounter++;
  }

  private send(link: DeviceLink, line: string): void {
    link.emitData(`${line}${EMULATOR_CONFIG.LINE_ENDING}`);
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        this.step();
      } catch (err) {
        logger.error(PREFIX, 'Ошибка эмуляции:', err);
      }
      const interval = this.ready
        ? this.options.cycleIntervalMs ?? EMULATOR_CONFIG.CYCLE_INTERVAL
        : this.options.waitIntervalMs ?? EMULATOR_CONFIG.WAIT_INTERVAL;
      await delay(interval, signal);
    }
  }
}
