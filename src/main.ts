/**
 * Главная точка входа приложения
 * Радар: ридер развёртки + перерисовка каждые 50 мс + живой просмотр
 */

import type { Server } from 'node:http';
import { loadConfig } from './config/env';
import { LOG_CONFIG } from './config';
import { SweepState, createReader } from './services';
import type { SweepReader } from './services';
import { RadarRenderer } from './renderers';
import { RadarDisplay, createLiveViewApp, startLiveView, stopLiveView } from './ui';
import { logger } from './utils';

const PREFIX = LOG_CONFIG.PREFIXES.APP;

// ==================== Shutdown ====================

function installShutdown(reader: SweepReader, display: RadarDisplay, server: Server): void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(PREFIX, `Получен ${signal}, останавливаемся...`);

    display.stop();
    Promise.all([reader.stop(), stopLiveView(server)])
      .then(() => {
        logger.info(PREFIX, 'Остановлено');
      })
      .catch((err: unknown) => {
        logger.error(PREFIX, 'Ошибка при остановке:', err);
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// ==================== Initialization ====================

async function init(): Promise<void> {
  const config = loadConfig(process.env);
  logger.setLevel(config.logLevel);
  logger.info(PREFIX, `Режим: ${config.mode}, шаг ${config.sweep.stepDegrees}°, дальность ${config.sweep.maxRange} см`);

  const sweep = new SweepState(config.sweep.stepCount);
  const reader = createReader(config, sweep);

  const renderer = new RadarRenderer(sweep, config.sweep);
  const display = new RadarDisplay(renderer, sweep, {
    maxRange: config.sweep.maxRange,
    frameIntervalMs: config.display.frameIntervalMs,
  });

  const server = await startLiveView(createLiveViewApp(display), config.display.host, config.display.port);
  display.start();
  installShutdown(reader, display, server);

  // Ошибка открытия порта не останавливает отображение
  await reader.start();
  logger.info(PREFIX, `Ридер ${reader.name}: ${reader.state}`);
}

// Запуск приложения
init().catch((err: unknown) => {
  logger.error(PREFIX, 'Ошибка инициализации:', err);
  process.exitCode = 1;
});
