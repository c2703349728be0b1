/**
 * Статичный фон радара: кольца дальности, спицы через 45° и подписи.
 * Рисуется один раз при старте.
 */

import type { CanvasViewport, RadarDrawingContext } from '@types';
import { RENDER_CONFIG } from '@config';
import { degToRad, polarToCartesian, worldLengthToCanvas, worldToCanvas } from '@utils';

/**
 * Радиусы колец: maxRange / RING_COUNT * k, k = 1..RING_COUNT
 */
export function ringRadii(maxRange: number): number[] {
  const count = RENDER_CONFIG.RING_COUNT;
  return Array.from({ length: count }, (_, i) => (maxRange * (i + 1)) / count);
}

/**
 * Углы спиц в градусах: 0, 45, ..., 315
 */
export function spokeAngles(): number[] {
  const step = RENDER_CONFIG.SPOKE_STEP_DEG;
  return Array.from({ length: 360 / step }, (_, i) => i * step);
}

export function drawRadarBackground(
  ctx: RadarDrawingContext,
  viewport: CanvasViewport,
  maxRange: number
): void {
  ctx.fillStyle = RENDER_CONFIG.COLORS.BACKGROUND;
  ctx.fillRect(0, 0, viewport.width, viewport.height);

  const center = worldToCanvas({ x: 0, y: 0 }, viewport);

  ctx.strokeStyle = RENDER_CONFIG.COLORS.GRID;
  ctx.lineWidth = RENDER_CONFIG.SIZES.GRID_LINE_WIDTH;

  // Кольца
  for (const radius of ringRadii(maxRange)) {
    ctx.beginPath();
    ctx.arc(center.x, center.y, worldLengthToCanvas(radius, viewport), 0, 2 * Math.PI);
    ctx.stroke();
  }

  // Спицы и подписи
  ctx.fillStyle = RENDER_CONFIG.COLORS.GRID;
  ctx.font = RENDER_CONFIG.SIZES.LABEL_FONT;
  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';

  for (const deg of spokeAngles()) {
    const rad = degToRad(deg);
    const end = worldToCanvas(polarToCartesian(maxRange, rad), viewport);
    ctx.beginPath();
    ctx.moveTo(center.x, center.y);
    ctx.lineTo(end.x, end.y);
    ctx.stroke();

    const label = worldToCanvas(
      polarToCartesian(RENDER_CONFIG.LABEL_RADIUS_FACTOR * maxRange, rad),
      viewport
    );
    ctx.fillText(`${deg}°`, label.x, label.y);
  }
}
