/**
 * Поверхность отображения: canvas, таймер перерисовки и раздача кадров
 */

import { createCanvas } from '@napi-rs/canvas';
import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import type { CanvasViewport, RadarFrame, SweepSnapshot } from '@types';
import { CANVAS_CONFIG, LOG_CONFIG } from '@config';
import { logger } from '@utils';
import { drawRadarBackground } from '../renderers/radar-background';
import type { RadarRenderer } from '../renderers/radar-renderer';
import type { SweepState } from '../services/sweep-state';

const PREFIX = LOG_CONFIG.PREFIXES.DISPLAY;

export type FrameListener = (png: Buffer) => void;

/**
 * То, что живой просмотр берёт у дисплея
 */
export interface FrameSource {
  latestFrame(): RadarFrame | null;
  snapshot(): SweepSnapshot;
  encodePng(): Buffer;
  subscribe(listener: FrameListener): () => void;
}

export interface RadarDisplayOptions {
  maxRange: number;
  frameIntervalMs: number;
}

export class RadarDisplay implements FrameSource {
  private readonly canvas: Canvas;
  private readonly ctx: SKRSContext2D;
  private readonly background: Canvas;
  private readonly viewport: CanvasViewport;
  private readonly listeners = new Set<FrameListener>();
  private timer: NodeJS.Timeout | null = null;
  private frame: RadarFrame | null = null;

  constructor(
    private readonly renderer: RadarRenderer,
    private readonly sweep: SweepState,
    private readonly options: RadarDisplayOptions
  ) {
    const { WIDTH, HEIGHT } = CANVAS_CONFIG.RADAR;
    this.viewport = {
      width: WIDTH,
      height: HEIGHT,
      extent: options.maxRange * CANVAS_CONFIG.VIEW_PADDING,
    };

    this.canvas = createCanvas(WIDTH, HEIGHT);
    this.ctx = this.canvas.getContext('2d');

    // Фон рисуется один раз
    this.background = createCanvas(WIDTH, HEIGHT);
    drawRadarBackground(this.background.getContext('2d'), this.viewport, options.maxRange);
  }

  /**
   * Запускает перерисовку по таймеру
   */
  start(): void {
    if (this.timer) return;
    this.draw();
    this.timer = setInterval(() => this.draw(), this.options.frameIntervalMs);
    logger.info(PREFIX, `Перерисовка каждые ${this.options.frameIntervalMs} мс`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.listeners.clear();
  }

  latestFrame(): RadarFrame | null {
    return this.frame;
  }

  snapshot(): SweepSnapshot {
    return this.sweep.snapshot();
  }

  encodePng(): Buffer {
    return this.canvas.toBuffer('image/png');
  }

  /**
   * Подписка на PNG каждого нового кадра; возвращает отписку
   */
  subscribe(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Один кадр: фон, точки, луч. Ошибка кадра не останавливает таймер.
   */
  private draw(): void {
    try {
      const { width, height } = this.viewport;
      this.ctx.clearRect(0, 0, width, height);
      this.ctx.drawImage(this.background, 0, 0);
      this.frame = this.renderer.render(this.ctx, this.viewport);

      // PNG кодируем только при наличии зрителей
      if (this.listeners.size > 0) {
        const png = this.encodePng();
        for (const listener of this.listeners) {
          listener(png);
        }
      }
    } catch (err) {
      logger.error(PREFIX, 'Ошибка отрисовки кадра:', err);
    }
  }
}
