import type { RadarDrawingContext } from '../types';

export interface DrawCall {
  name: string;
  args: Array<number | string>;
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
}

/**
 * 2D-контекст для тестов: ничего не рисует, записывает вызовы
 */
export class RecordingContext implements RadarDrawingContext {
  fillStyle: string | object = '#000';
  strokeStyle: string | object = '#000';
  lineWidth = 1;
  font = '10px sans-serif';
  textAlign = 'start';
  textBaseline = 'alphabetic';

  readonly calls: DrawCall[] = [];

  beginPath(): void {
    this.record('beginPath');
  }

  moveTo(x: number, y: number): void {
    this.record('moveTo', x, y);
  }

  lineTo(x: number, y: number): void {
    this.record('lineTo', x, y);
  }

  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void {
    this.record('arc', x, y, radius, startAngle, endAngle);
  }

  stroke(): void {
    this.record('stroke');
  }

  fill(): void {
    this.record('fill');
  }

  fillRect(x: number, y: number, width: number, height: number): void {
    this.record('fillRect', x, y, width, height);
  }

  clearRect(x: number, y: number, width: number, height: number): void {
    this.record('clearRect', x, y, width, height);
  }

  fillText(text: string, x: number, y: number): void {
    this.record('fillText', text, x, y);
  }

  callsNamed(name: string): DrawCall[] {
    return this.calls.filter((call) => call.name === name);
  }

  private record(name: string, ...args: Array<number | string>): void {
    this.calls.push({
      name,
      args,
      fillStyle: this.fillStyle,
      strokeStyle: this.strokeStyle,
      lineWidth: this.lineWidth,
    });
  }
}
