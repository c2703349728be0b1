/**
 * Конфигурация приложения
 * Все настройки и константы в одном месте
 */

/**
 * Настройки последовательного порта
 */
export const SERIAL_CONFIG = {
  /**
   * Порт, к которому подключена ESP32
   * Можно переопределить через RADAR_PORT
   */
  DEFAULT_PATH: '/dev/ttyUSB0',

  DEFAULT_BAUD_RATE: 115200,

  /**
   * Пауза после открытия порта (мс): ESP перезагружается при подключении
   */
  SETTLE_DELAY: 2000,
} as const;

/**
 * Протокол обмена с прошивкой
 */
export const PROTOCOL = {
  DISTANCE_PREFIX: 'Distance:',
  FORWARD: 'FWR',
  CHANGE_DIRECTION: 'CDR',
  READY: 'RDY',
  /**
   * Прошивка ждёт строку "RDY\r", поэтому токен уходит с CRLF
   */
  READY_TERMINATOR: '\r\n',
  LINE_DELIMITER: '\n',
} as const;

/**
 * Параметры развёртки
 */
export const SWEEP_CONFIG = {
  DEFAULT_STEP_DEG: 4,          // градусов на шаг мотора
  DEFAULT_MAX_RANGE: 400,       // см
  FULL_CIRCLE_DEG: 360,
} as const;

/**
 * Симулятор (без железа)
 */
export const SIMULATION_CONFIG = {
  /**
   * 70 мс движения мотора + 60 мс стабилизации, округлено
   */
  TICK_INTERVAL: 80,
  MIN_DISTANCE: 50,
} as const;

/**
 * Эмулятор прошивки поверх mock-порта
 */
export const EMULATOR_CONFIG = {
  CYCLE_INTERVAL: 130,
  WAIT_INTERVAL: 100,
  MEASUREMENTS_PER_SWEEP: 90,
  /**
   * Рабочий диапазон HC-SR04 (см); вне диапазона прошивка шлёт 0
   */
  MIN_VALID_DISTANCE: 2,
  MAX_VALID_DISTANCE: 400,
  LINE_ENDING: '\n\r',
  WAITING_MESSAGE: 'ESP32: Waiting for RDY signal...',
  READY_MESSAGE: 'ESP32: Ready signal received.',
} as const;

/**
 * Настройки Canvas
 */
export const CANVAS_CONFIG = {
  RADAR: {
    WIDTH: 600,
    HEIGHT: 600,
  },
  /**
   * Запас вокруг внешнего кольца, чтобы подписи углов не обрезались
   */
  VIEW_PADDING: 1.15,
} as const;

/**
 * Настройки отрисовки
 */
export const RENDER_CONFIG = {
  /**
   * Период перерисовки (мс)
   */
  FRAME_INTERVAL: 50,

  COLORS: {
    BACKGROUND: 'white',
    GRID: 'green',
    BEAM: 'lime',
    POINT: 'blue',
  },

  SIZES: {
    GRID_LINE_WIDTH: 0.5,
    BEAM_WIDTH: 2,
    POINT_RADIUS: 2,
    LABEL_FONT: '12px sans-serif',
  },

  RING_COUNT: 4,
  SPOKE_STEP_DEG: 45,
  LABEL_RADIUS_FACTOR: 1.05,
} as const;

/**
 * Живой просмотр в браузере
 */
export const DISPLAY_CONFIG = {
  DEFAULT_HOST: '127.0.0.1',
  DEFAULT_PORT: 8080,
  STREAM_BOUNDARY: 'radarframe',
} as const;

/**
 * Логирование
 */
export const LOG_CONFIG = {
  /**
   * Включить отладочные сообщения
   */
  DEBUG: process.env.NODE_ENV === 'development',

  /**
   * Префиксы для разных модулей
   */
  PREFIXES: {
    APP: '[App]',
    SERIAL: '[Serial]',
    SIM: '[Sim]',
    EMULATOR: '[Emulator]',
    RENDERER: '[Renderer]',
    DISPLAY: '[Display]',
  },
} as const;
