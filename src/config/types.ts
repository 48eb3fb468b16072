/**
 * @file Configuration types for the controller model.
 */

/** Supported MuTRiG silicon revisions. */
export const MUTRIG_VARIANTS = ['mutrig1', 'mutrig2', 'mutrig3'] as const;
export type MutrigVariant = (typeof MUTRIG_VARIANTS)[number];

/** Which routines the controller accepts commands for. */
export const SUBROUTINE_SELECTIONS = ['both', 'mcc-only', 'tsa-only'] as const;
export type SubroutineSelection = (typeof SUBROUTINE_SELECTIONS)[number];

/**
 * Placement of the per-channel records and their threshold fields inside one
 * device's configuration bitstream. All positions are storage bit indices.
 */
export interface BitstreamLayout {
  /** Payload length of one device, in bits */
  lengthBits: number;
  /** Bits preceding the first channel record */
  headerBits: number;
  /** Length of one channel record */
  channelBits: number;
  /** Offset of the time-threshold field inside a channel record */
  tthOffset: number;
  /** Offset of the energy-threshold field inside a channel record */
  ethOffset: number;
}

/**
 * Controller configuration as written in mutrig.json. Every field is optional.
 */
export interface ControllerConfig {
  deviceCount?: number;
  variant?: MutrigVariant;
  layout?: Partial<BitstreamLayout>;
  controllerClockHz?: number;
  spiClockHz?: number;
  /** Word address of device 0's counters on the counter bus */
  counterBaseAddress?: number;
  subroutines?: SubroutineSelection;
  /** Serial-domain cycles held before each write pass */
  settleCycles?: number;
  /** Control-domain cycles before the counter-clear pulse */
  debounceCycles?: number;
  /** Control-domain cycles of rate accumulation (defaults to one second) */
  monitorWindowCycles?: number;
  marginCycles?: number;
  /** Idle cycles tolerated on the counter bus before a read is aborted */
  timeoutCycles?: number;
}

export interface ControllerConfigNormalized {
  deviceCount: number;
  variant: MutrigVariant;
  layout: BitstreamLayout;
  controllerClockHz: number;
  spiClockHz: number;
  counterBaseAddress: number;
  subroutines: SubroutineSelection;
  settleCycles: number;
  debounceCycles: number;
  monitorWindowCycles: number;
  marginCycles: number;
  timeoutCycles: number;
  /** Words reserved per device in the configuration store (power of two) */
  partitionWords: number;
  /** Payload length rounded up to whole words, in bits */
  roundedBits: number;
}
