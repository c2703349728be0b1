/**
 * Утилиты для разбора строк протокола
 */

import type { DeviceMessage } from '../types';
import { PROTOCOL } from '../config';
import { isNumericLiteral } from './validators';

const REPLACEMENT_CHAR = /\uFFFD/g;

/**
 * Убирает байты, которые не декодировались как UTF-8, и пробелы по краям
 */
export function decodeLine(raw: string): string {
  return raw.replace(REPLACEMENT_CHAR, '').trim();
}

/**
 * Разбирает одну строку от устройства.
 * Пустая строка даёт null.
 */
export function parseDeviceLine(line: string): DeviceMessage | null {
  if (!line) return null;

  if (line.startsWith(PROTOCOL.DISTANCE_PREFIX)) {
    const payload = line.slice(PROTOCOL.DISTANCE_PREFIX.length).trim();
    if (!isNumericLiteral(payload)) {
      return { type: 'malformed-distance', raw: line };
    }
    return { type: 'distance', value: Number(payload) };
  }

  if (line === PROTOCOL.FORWARD) return { type: 'forward' };
  if (line === PROTOCOL.CHANGE_DIRECTION) return { type: 'change-direction' };

  return { type: 'unknown', raw: line };
}

/**
 * Строка для отправки на устройство
 */
export function encodeReadyToken(): string {
  return `${PROTOCOL.READY}${PROTOCOL.READY_TERMINATOR}`;
}
