/**
 * Выбор ридера по конфигурации
 */

import type { RadarConfig } from '../config/env';
import { ReaderMode } from '../types';
import { EmulatedReader } from './emulated-reader';
import { SerialReader } from './serial-reader';
import { SimulatedReader } from './simulated-reader';
import type { SweepReader } from './sweep-reader';
import type { SweepState } from './sweep-state';

export function createReader(config: RadarConfig, sweep: SweepState): SweepReader {
  switch (config.mode) {
    case ReaderMode.SIMULATED:
      return new SimulatedReader(sweep, config.simulation);
    case ReaderMode.EMULATED:
      return new EmulatedReader(sweep, config.serial);
    case ReaderMode.SERIAL:
      return new SerialReader(sweep, config.serial);
  }
}
