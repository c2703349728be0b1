/**
 * Сообщения от устройства (одна строка = одно сообщение)
 */

export type DeviceMessage =
  | { type: 'distance'; value: number }
  | { type: 'forward' }
  | { type: 'change-direction' }
  | { type: 'malformed-distance'; raw: string }
  | { type: 'unknown'; raw: string };
