/**
 * Минимальный 2D-контекст, который нужен рендерерам.
 * Ему соответствует SKRSContext2D из @napi-rs/canvas.
 */
export interface RadarDrawingContext {
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  font: string;
  textAlign: string;
  textBaseline: string;

  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  stroke(): void;
  fill(): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  clearRect(x: number, y: number, width: number, height: number): void;
  fillText(text: string, x: number, y: number): void;
}

/**
 * Геометрия холста: размер в пикселях и видимая дальность в см
 */
export interface CanvasViewport {
  width: number;
  height: number;
  extent: number;
}
