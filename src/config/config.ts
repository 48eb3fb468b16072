/**
 * @file Defaults and normalization for controller configuration.
 */

import {
  DEFAULT_CONTROLLER_CLOCK_HZ,
  DEFAULT_DEBOUNCE_CYCLES,
  DEFAULT_DEVICE_COUNT,
  DEFAULT_MARGIN_CYCLES,
  DEFAULT_SETTLE_CYCLES,
  DEFAULT_SPI_CLOCK_HZ,
  DEFAULT_TIMEOUT_CYCLES,
  WORD_BITS,
} from '../controller/constants';
import {
  BitstreamLayout,
  ControllerConfig,
  ControllerConfigNormalized,
  MutrigVariant,
} from './types';

/**
 * Default bitstream layouts per silicon revision. Payload lengths follow the
 * revisions' configuration registers; the record geometry can be overridden
 * through `layout` in the configuration file.
 */
export const VARIANT_LAYOUTS: Readonly<Record<MutrigVariant, Readonly<BitstreamLayout>>> = {
  mutrig1: { lengthBits: 2358, headerBits: 0, channelBits: 67, tthOffset: 35, ethOffset: 41 },
  mutrig2: { lengthBits: 2719, headerBits: 0, channelBits: 78, tthOffset: 43, ethOffset: 49 },
  mutrig3: { lengthBits: 2662, headerBits: 0, channelBits: 78, tthOffset: 43, ethOffset: 49 },
};

export const DEFAULT_VARIANT: MutrigVariant = 'mutrig3';

/**
 * Words needed to hold `lengthBits`, rounded up to whole words.
 */
export function wordsForBits(lengthBits: number): number {
  return Math.ceil(lengthBits / WORD_BITS);
}

/**
 * Smallest power of two not below `value` (1 for non-positive input).
 */
export function nextPowerOfTwo(value: number): number {
  let result = 1;
  while (result < value) {
    result *= 2;
  }
  return result;
}

/**
 * Applies defaults and derives the storage geometry. Values are taken as
 * given; run {@link validateControllerConfig} first for untrusted input.
 */
export function normalizeControllerConfig(cfg?: ControllerConfig): ControllerConfigNormalized {
  const config = cfg ?? {};
  const variant = config.variant ?? DEFAULT_VARIANT;
  const layout: BitstreamLayout = { ...VARIANT_LAYOUTS[variant], ...config.layout };
  const payloadWords = wordsForBits(layout.lengthBits);
  const controllerClockHz = config.controllerClockHz ?? DEFAULT_CONTROLLER_CLOCK_HZ;

  return {
    deviceCount: config.deviceCount ?? DEFAULT_DEVICE_COUNT,
    variant,
    layout,
    controllerClockHz,
    spiClockHz: config.spiClockHz ?? DEFAULT_SPI_CLOCK_HZ,
    counterBaseAddress: config.counterBaseAddress ?? 0,
    subroutines: config.subroutines ?? 'both',
    settleCycles: config.settleCycles ?? DEFAULT_SETTLE_CYCLES,
    debounceCycles: config.debounceCycles ?? DEFAULT_DEBOUNCE_CYCLES,
    monitorWindowCycles: config.monitorWindowCycles ?? controllerClockHz,
    marginCycles: config.marginCycles ?? DEFAULT_MARGIN_CYCLES,
    timeoutCycles: config.timeoutCycles ?? DEFAULT_TIMEOUT_CYCLES,
    partitionWords: nextPowerOfTwo(payloadWords),
    roundedBits: payloadWords * WORD_BITS,
  };
}
