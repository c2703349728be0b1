/**
 * Ридер аппаратного радара по последовательному порту
 */

import { ReadlineParser, SerialPort } from 'serialport';
import { LOG_CONFIG, PROTOCOL } from '../config';
import { ReaderState } from '../types';
import type { DeviceMessage } from '../types';
import { decodeLine, delay, encodeReadyToken, logger, parseDeviceLine } from '../utils';
import type { SweepReader } from './sweep-reader';
import type { SweepState } from './sweep-state';

const PREFIX = LOG_CONFIG.PREFIXES.SERIAL;

/**
 * То, что ридеру нужно от порта. Подходят SerialPort и SerialPortMock.
 */
export interface SerialChannel {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  write(chunk: string, callback: (err: Error | null | undefined) => void): boolean;
  close(callback: (err?: Error | null) => void): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export interface SerialChannelOptions {
  path: string;
  baudRate: number;
}

export interface SerialReaderOptions extends SerialChannelOptions {
  settleMs: number;
  createPort?: (options: SerialChannelOptions) => SerialChannel;
}

function createHardwarePort({ path, baudRate }: SerialChannelOptions): SerialChannel {
  return new SerialPort({ path, baudRate, autoOpen: false });
}

function openPort(port: SerialChannel): Promise<void> {
  return new Promise((resolve, reject) => {
    port.open((err) => (err ? reject(err) : resolve()));
  });
}

function closePort(port: SerialChannel): Promise<void> {
  return new Promise((resolve, reject) => {
    port.close((err) => (err ? reject(err) : resolve()));
  });
}

function writePort(port: SerialChannel, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    port.write(data, (err) => (err ? reject(err) : resolve()));
  });
}

export class SerialReader implements SweepReader {
  readonly name = 'serial';
  private currentState = ReaderState.IDLE;
  private port: SerialChannel | null = null;
  private controller: AbortController | null = null;
  private stopping = false;

  constructor(
    private readonly sweep: SweepState,
    private readonly options: SerialReaderOptions
  ) {}

  get state(): ReaderState {
    return this.currentState;
  }

  /**
   * Открывает порт, ждёт перезагрузку ESP и отправляет RDY
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.currentState !== ReaderState.IDLE) return;
    if (signal?.aborted) {
      await this.stop();
      return;
    }
    this.currentState = ReaderState.STARTING;

    const controller = new AbortController();
    this.controller = controller;
    signal?.addEventListener('abort', () => {
      this.stop().catch((err: unknown) => {
        logger.error(PREFIX, 'Ошибка остановки ридера:', err);
      });
    }, { once: true });

    const { path, baudRate, settleMs } = this.options;
    const createPort = this.options.createPort ?? createHardwarePort;

    let port: SerialChannel;
    try {
      port = createPort({ path, baudRate });
      await openPort(port);
    } catch (err) {
      logger.error(PREFIX, `Не удалось открыть порт ${path}:`, err);
      this.currentState = ReaderState.FAILED;
      return;
    }

    if (this.stopping) {
      await closePort(port).catch((err: unknown) => {
        logger.warn(PREFIX, 'Ошибка закрытия порта:', err);
      });
      return;
    }

    this.port = port;
    port.on('error', (err) => {
      logger.error(PREFIX, 'Ошибка чтения последовательного порта:', err);
    });
    port.on('close', () => this.handleClose());

    const parser = port.pipe(new ReadlineParser({ delimiter: PROTOCOL.LINE_DELIMITER }));
    parser.on('data', (raw: string) => this.handleRawLine(raw));

    logger.info(PREFIX, `Порт ${path} открыт (${baudRate} бод), ждём ${settleMs} мс перезагрузки ESP...`);
    await delay(settleMs, controller.signal);
    if (controller.signal.aborted) return;

    try {
      await writePort(port, encodeReadyToken());
      logger.info(PREFIX, `Отправлен сигнал ${PROTOCOL.READY}`);
    } catch (err) {
      logger.error(PREFIX, `Ошибка отправки ${PROTOCOL.READY}:`, err);
    }

    if (this.currentState === ReaderState.STARTING) {
      this.currentState = ReaderState.RUNNING;
    }
  }

  /**
   * Закрывает порт
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.controller?.abort();

    const port = this.port;
    this.port = null;
    if (port?.isOpen) {
      try {
        await closePort(port);
      } catch (err) {
        logger.warn(PREFIX, 'Ошибка закрытия порта:', err);
      }
    }

    if (this.currentState !== ReaderState.FAILED) {
      this.currentState = ReaderState.STOPPED;
    }
    logger.info(PREFIX, 'Ридер остановлен');
  }

  /**
   * Одна строка из порта; ошибка обработки не прерывает чтение
   */
  handleRawLine(raw: string): void {
    try {
      const message = parseDeviceLine(decodeLine(raw));
      if (message) this.apply(message);
    } catch (err) {
      logger.error(PREFIX, 'Ошибка обработки строки:', err);
    }
  }

  private apply(message: DeviceMessage): void {
    switch (message.type) {
      case 'distance': {
        const step = this.sweep.recordDistance(message.value);
        logger.debug(PREFIX, `Расстояние ${message.value} см (шаг ${step})`);
        break;
      }
      case 'forward': {
        const step = this.sweep.advance();
        logger.debug(PREFIX, `Шаг ${step}`);
        break;
      }
      case 'change-direction': {
        const direction = this.sweep.reverse();
        logger.info(PREFIX, `Смена направления: ${direction > 0 ? '+1' : '-1'}`);
        break;
      }
      case 'malformed-distance':
        logger.warn(PREFIX, 'Ошибка разбора расстояния:', message.raw);
        break;
      case 'unknown':
        logger.info(PREFIX, 'Неизвестная команда:', message.raw);
        break;
    }
  }

  /**
   * Порт закрылся не по нашей команде: развёртка встаёт, луч замирает
   */
  private handleClose(): void {
    if (this.stopping) return;
    logger.warn(PREFIX, 'Порт закрыт, развёртка остановлена');
    this.sweep.setRunning(false);
    this.port = null;
    this.currentState = ReaderState.STOPPED;
  }
}
