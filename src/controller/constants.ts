/**
 * @file Constants for the MuTRiG controller model.
 */

/** Channels per MuTRiG. */
export const CHANNELS_PER_DEVICE = 32;
/** Width of the per-channel threshold fields. */
export const THRESHOLD_BITS = 6;
/** Largest threshold value, also the last scan step. */
export const THRESHOLD_MAX = (1 << THRESHOLD_BITS) - 1;
/** Steps in one scan (0..63 inclusive). */
export const SCAN_STEPS = THRESHOLD_MAX + 1;
/** Device ids are 4 bits wide. */
export const MAX_DEVICES = 16;
export const WORD_BITS = 32;

// Command codes, bits [31:20] of the command word.
export const CMD_CONFIGURE = 0x011;
export const CMD_TTH_SCAN_ONE = 0x013;
export const CMD_TTH_SCAN_ALL = 0x014;
export const CMD_ETH_SCAN_ONE = 0x016;
export const CMD_ETH_SCAN_ALL = 0x017;

/** Completion code reported in the status register when idle. */
export const STATUS_OK = 0;

// Default timing, in cycles of the owning clock domain.
export const DEFAULT_SETTLE_CYCLES = 1000;
export const DEFAULT_DEBOUNCE_CYCLES = 5;
export const DEFAULT_MARGIN_CYCLES = 5;
export const DEFAULT_TIMEOUT_CYCLES = 500;

export const DEFAULT_CONTROLLER_CLOCK_HZ = 156_250_000;
export const DEFAULT_SPI_CLOCK_HZ = 40_000_000;
export const DEFAULT_DEVICE_COUNT = 8;

/** Largest burst the 8-bit burst-count port can request. */
export const MAX_BURST_WORDS = 255;
