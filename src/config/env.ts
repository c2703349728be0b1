/**
 * Загрузка конфигурации из переменных окружения.
 * Читается один раз при старте, во время работы не меняется.
 */

import { z } from 'zod';
import {
  DISPLAY_CONFIG,
  RENDER_CONFIG,
  SERIAL_CONFIG,
  SIMULATION_CONFIG,
  SWEEP_CONFIG,
} from './index';
import { LogLevel } from '../utils/logger';
import { ReaderMode } from '../types';

const flag = z
  .enum(['1', '0', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true');

const logLevels = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
} as const;

export const envSchema = z.object({
  RADAR_MODE: z.nativeEnum(ReaderMode).default(ReaderMode.SERIAL),
  RADAR_SIMULATE: flag.optional(),
  RADAR_PORT: z.string().min(1).default(SERIAL_CONFIG.DEFAULT_PATH),
  RADAR_BAUD_RATE: z.coerce.number().int().positive().default(SERIAL_CONFIG.DEFAULT_BAUD_RATE),
  RADAR_STEP_DEG: z.coerce
    .number()
    .int()
    .positive()
    .refine((deg) => SWEEP_CONFIG.FULL_CIRCLE_DEG % deg === 0, {
      message: `шаг должен делить ${SWEEP_CONFIG.FULL_CIRCLE_DEG}`,
    })
    .default(SWEEP_CONFIG.DEFAULT_STEP_DEG),
  RADAR_MAX_RANGE: z.coerce.number().positive().default(SWEEP_CONFIG.DEFAULT_MAX_RANGE),
  RADAR_SETTLE_MS: z.coerce.number().int().nonnegative().default(SERIAL_CONFIG.SETTLE_DELAY),
  RADAR_SIM_INTERVAL_MS: z.coerce.number().int().positive().default(SIMULATION_CONFIG.TICK_INTERVAL),
  RADAR_HTTP_HOST: z.string().min(1).default(DISPLAY_CONFIG.DEFAULT_HOST),
  RADAR_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(DISPLAY_CONFIG.DEFAULT_PORT),
  RADAR_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface RadarConfig {
  mode: ReaderMode;
  serial: {
    path: string;
    baudRate: number;
    settleMs: number;
  };
  sweep: {
    stepDegrees: number;
    stepCount: number;
    maxRange: number;
  };
  simulation: {
    intervalMs: number;
    minDistance: number;
    maxDistance: number;
  };
  display: {
    host: string;
    port: number;
    frameIntervalMs: number;
  };
  logLevel: LogLevel;
}

/**
 * Разбирает окружение в конфигурацию; бросает Error со списком
 * некорректных переменных
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RadarConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Некорректная конфигурация: ${details}`);
  }

  const vars = parsed.data;
  const maxRange = vars.RADAR_MAX_RANGE;

  return {
    mode: vars.RADAR_SIMULATE ? ReaderMode.SIMULATED : vars.RADAR_MODE,
    serial: {
      path: vars.RADAR_PORT,
      baudRate: vars.RADAR_BAUD_RATE,
      settleMs: vars.RADAR_SETTLE_MS,
    },
    sweep: {
      stepDegrees: vars.RADAR_STEP_DEG,
      stepCount: SWEEP_CONFIG.FULL_CIRCLE_DEG / vars.RADAR_STEP_DEG,
      maxRange,
    },
    simulation: {
      intervalMs: vars.RADAR_SIM_INTERVAL_MS,
      minDistance: Math.min(SIMULATION_CONFIG.MIN_DISTANCE, maxRange),
      maxDistance: maxRange,
    },
    display: {
      host: vars.RADAR_HTTP_HOST,
      port: vars.RADAR_HTTP_PORT,
      frameIntervalMs: RENDER_CONFIG.FRAME_INTERVAL,
    },
    logLevel: logLevels[vars.RADAR_LOG_LEVEL],
  };
}
