/**
 * Живой просмотр радара в браузере.
 *
 * GET /          страница с <img>, который читает /stream
 * GET /stream    multipart/x-mixed-replace, по PNG на кадр
 * GET /frame.png последний кадр
 * GET /state     состояние развёртки в JSON
 */

import express from 'express';
import type { Express, Response } from 'express';
import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import { DISPLAY_CONFIG, LOG_CONFIG } from '@config';
import { logger } from '@utils';
import type { FrameSource } from './radar-display';

const PREFIX = LOG_CONFIG.PREFIXES.DISPLAY;
const PUBLIC_DIR = fileURLToPath(new URL('../../public', import.meta.url));
const BOUNDARY = DISPLAY_CONFIG.STREAM_BOUNDARY;

/**
 * Пишет одну часть multipart; false, если буфер сокета переполнен
 */
function writeFramePart(res: Response, png: Buffer): boolean {
  res.write(`--${BOUNDARY}\r\nContent-Type: image/png\r\nContent-Length: ${png.length}\r\n\r\n`);
  res.write(png);
  res.write('\r\n');
  return !res.writableNeedDrain;
}

/**
 * Отправка кадров одному зрителю. Пока клиент не вычитал прошлое,
 * держим только последний кадр.
 */
function createFrameSender(res: Response): (png: Buffer) => void {
  let waitingDrain = false;
  let pending: Buffer | null = null;

  const send = (png: Buffer): void => {
    if (waitingDrain) {
      pending = png;
      return;
    }
    if (writeFramePart(res, png)) return;

    waitingDrain = true;
    res.once('drain', () => {
      waitingDrain = false;
      const next = pending;
      pending = null;
      if (next) send(next);
    });
  };

  return send;
}

export function createLiveViewApp(source: FrameSource): Express {
  const app = express();

  app.use(express.static(PUBLIC_DIR));

  app.get('/state', (_req, res) => {
    const { distances, currentStep, direction, isRunning } = source.snapshot();
    const frame = source.latestFrame();
    res.json({
      currentStep,
      direction,
      isRunning,
      stepCount: distances.length,
      beamAngle: frame?.beamAngle ?? null,
      distances,
    });
  });

  app.get('/frame.png', (_req, res) => {
    try {
      const png = source.encodePng();
      res.type('png').send(png);
    } catch (err) {
      logger.error(PREFIX, 'Ошибка кодирования кадра:', err);
      res.status(500).json({ error: 'frame encoding failed' });
    }
  });

  app.get('/stream', (_req, res) => {
    res.writeHead(200, {
      'Content-Type': `multipart/x-mixed-replace; boundary=${BOUNDARY}`,
      'Cache-Control': 'no-cache, no-store',
      Connection: 'keep-alive',
      Pragma: 'no-cache',
    });
    res.flushHeaders();

    const unsubscribe = source.subscribe(createFrameSender(res));
    logger.debug(PREFIX, 'Зритель подключился к потоку');

    res.on('close', () => {
      unsubscribe();
      logger.debug(PREFIX, 'Зритель отключился');
    });
  });

  return app;
}

/**
 * Поднимает HTTP-сервер; резолвится, когда порт слушается
 */
export function startLiveView(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      logger.info(PREFIX, `Радар доступен на http://${host}:${port}/`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopLiveView(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
