/**
 * Полный аппаратный путь без железа: SerialReader читает mock-порт,
 * в который пишет эмулятор прошивки
 */

import { SerialPortMock } from 'serialport';
import { LOG_CONFIG } from '../config';
import type { ReaderState } from '../types';
import { logger } from '../utils';
import { DeviceEmulator } from './device-emulator';
import type { DeviceEmulatorOptions } from './device-emulator';
import { SerialReader } from './serial-reader';
import type { SweepReader } from './sweep-reader';
import type { SweepState } from './sweep-state';

export interface EmulatedReaderOptions {
  path: string;
  baudRate: number;
  settleMs: number;
  emulator?: DeviceEmulatorOptions;
}

export class EmulatedReader implements SweepReader {
  readonly name = 'emulated';
  private readonly serial: SerialReader;
  private readonly emulator: DeviceEmulator;
  private port: SerialPortMock | null = null;

  constructor(sweep: SweepState, private readonly options: EmulatedReaderOptions) {
    this.serial = new SerialReader(sweep, {
      path: options.path,
      baudRate: options.baudRate,
      settleMs: options.settleMs,
      createPort: ({ path, baudRate }) => {
        const port = new SerialPortMock({ path, baudRate, autoOpen: false });
        this.port = port;
        return port;
      },
    });
    this.emulator = new DeviceEmulator(() => this.port?.port, options.emulator);
  }

  get state(): ReaderState {
    return this.serial.state;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      await this.serial.stop();
      return;
    }
    // Реестр mock-портов общий с тем, что открывает SerialPortMock
    SerialPortMock.binding.createPort(this.options.path, { echo: false, record: true });
    logger.info(LOG_CONFIG.PREFIXES.EMULATOR, `Эмулируемое устройство на ${this.options.path}`);
    this.emulator.start();
    signal?.addEventListener('abort', () => {
      this.emulator.stop().catch((err: unknown) => {
        logger.error(LOG_CONFIG.PREFIXES.EMULATOR, 'Ошибка остановки эмулятора:', err);
      });
    }, { once: true });
    await this.serial.start(signal);
  }

  async stop(): Promise<void> {
    await this.emulator.stop();
    await this.serial.stop();
    SerialPortMock.binding.reset();
  }
}
