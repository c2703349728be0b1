/**
 * Рендерер развёртки: луч и точки измерений
 */

import type { CanvasViewport, Point2D, RadarDrawingContext, RadarFrame } from '@types';
import { RENDER_CONFIG } from '@config';
import { polarToCartesian, stepAngles, worldToCanvas } from '@utils';
import type { SweepState } from '../services/sweep-state';

export interface RadarRendererOptions {
  stepDegrees: number;
  maxRange: number;
}

const ORIGIN: Point2D = { x: 0, y: 0 };

export class RadarRenderer {
  private readonly angles: number[];
  private lastBeamAngle = 0;

  constructor(
    private readonly sweep: SweepState,
    private readonly options: RadarRendererOptions
  ) {
    this.angles = stepAngles(options.stepDegrees, sweep.stepCount);
  }

  /**
   * Угол луча, сохранённый с прошлого кадра (рад)
   */
  get beamAngle(): number {
    return this.lastBeamAngle;
  }

  /**
   * Снимает состояние и пересчитывает кадр.
   * Если развёртка стоит, луч остаётся на последнем угле.
   */
  update(): RadarFrame {
    const { distances, currentStep, isRunning } = this.sweep.snapshot();

    const points = distances.map((distance, i) => polarToCartesian(distance, this.angles[i]));

    if (isRunning) {
      this.lastBeamAngle = this.angles[currentStep];
    }

    return {
      points,
      beam: {
        from: ORIGIN,
        to: polarToCartesian(this.options.maxRange, this.lastBeamAngle),
      },
      beamAngle: this.lastBeamAngle,
      currentStep,
      isRunning,
    };
  }

  /**
   * Пересчитывает кадр и рисует динамические слои поверх фона
   */
  render(ctx: RadarDrawingContext, viewport: CanvasViewport): RadarFrame {
    const frame = this.update();
    this.drawPoints(ctx, viewport, frame.points);
    this.drawBeam(ctx, viewport, frame);
    return frame;
  }

  private drawPoints(ctx: RadarDrawingContext, viewport: CanvasViewport, points: Point2D[]): void {
    ctx.fillStyle = RENDER_CONFIG.COLORS.POINT;

    for (const point of points) {
      const { x, y } = worldToCanvas(point, viewport);
      ctx.beginPath();
      ctx.arc(x, y, RENDER_CONFIG.SIZES.POINT_RADIUS, 0, 2 * Math.PI);
      ctx.fill();
    }
  }

  private drawBeam(ctx: RadarDrawingContext, viewport: CanvasViewport, frame: RadarFrame): void {
    const from = worldToCanvas(frame.beam.from, viewport);
    const to = worldToCanvas(frame.beam.to, viewport);

    ctx.strokeStyle = RENDER_CONFIG.COLORS.BEAM;
    ctx.lineWidth = RENDER_CONFIG.SIZES.BEAM_WIDTH;
    ctx.beginPath();
    ctx.moveTo(from.x, from.y);
    ctx.lineTo(to.x, to.y);
    ctx.stroke();
  }
}
