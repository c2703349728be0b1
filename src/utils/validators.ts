/**
 * Валидаторы для данных с устройства
 */

const NUMERIC_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Проверяет, что строка целиком является десятичным числом
 * ("12", "-3.5", "1e3"; без "0x", "Infinity" и пустых строк)
 */
export function isNumericLiteral(text: string): boolean {
  return NUMERIC_LITERAL.test(text);
}

