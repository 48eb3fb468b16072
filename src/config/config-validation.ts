/**
 * @file Validation of controller configuration files.
 * @description Checks untrusted configuration input (parsed JSON) and reports
 * every problem found, so a broken mutrig.json can be fixed in one pass.
 * @module config/config-validation
 */

import { ConfigurationError } from '../errors';
import { MAX_DEVICES } from '../controller/constants';
import { layoutProblems } from '../controller/field-layout';
import { normalizeControllerConfig } from './config';
import {
  BitstreamLayout,
  ControllerConfig,
  MUTRIG_VARIANTS,
  MutrigVariant,
  SUBROUTINE_SELECTIONS,
  SubroutineSelection,
} from './types';

// ============================================================================
// Constants
// ============================================================================

const CLOCK_HZ_MAX = 1_000_000_000;
/** The MuTRiG SPI domain is constrained to 80 MHz */
const SPI_CLOCK_HZ_MAX = 80_000_000;
/** Word address offset of the counter bank, a 31-bit field */
const COUNTER_ADDRESS_MAX = 0x7fffffff;
const LAYOUT_LENGTH_MAX = 1_000_000;
const CYCLES_MAX = 1_000_000_000;
/** Windows above ten simulated seconds make scans impractically slow */
const WINDOW_WARN_SECONDS = 10;

const LAYOUT_KEYS: readonly (keyof BitstreamLayout)[] = [
  'lengthBits',
  'headerBits',
  'channelBits',
  'tthOffset',
  'ethOffset',
];

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Validation result containing all issues found.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** List of error messages */
  errors: string[];
  /** List of warning messages */
  warnings: string[];
}

// ============================================================================
// Individual Validators
// ============================================================================

/**
 * Validates an optional integer within an inclusive range.
 */
export function validateInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'number') {
    errors.push(`${fieldName} must be a number, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (!Number.isInteger(value)) {
    errors.push(`${fieldName} must be an integer, got ${value}`);
    return { valid: false, errors, warnings };
  }

  if (value < min || value > max) {
    errors.push(`${fieldName} must be between ${min} and ${max}, got ${value}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates an optional string against a fixed set of choices.
 */
export function validateChoice<T extends string>(
  value: unknown,
  fieldName: string,
  choices: readonly T[]
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'string') {
    errors.push(`${fieldName} must be a string, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (!choices.some((choice) => choice === value)) {
    errors.push(`Unsupported ${fieldName} "${value}". Valid values: ${choices.join(', ')}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates the optional layout override object field by field.
 */
export function validateLayoutOverride(value: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }

  if (!isRecord(value)) {
    errors.push(`layout must be an object, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  const results = LAYOUT_KEYS.map((key) =>
    validateInteger(value[key], `layout.${key}`, 0, LAYOUT_LENGTH_MAX)
  );
  for (const key of Object.keys(value)) {
    if (!LAYOUT_KEYS.some((known) => known === key)) {
      warnings.push(`layout.${key} is not a layout field and is ignored`);
    }
  }
  results.push({ valid: true, errors, warnings });
  return mergeResults(results);
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validates a parsed configuration object. Field checks run first; when they
 * pass, the effective layout is checked for fields that do not fit.
 */
export function validateControllerConfig(config: unknown): ValidationResult {
  if (config === undefined || config === null) {
    return { valid: true, errors: [], warnings: [] };
  }

  if (!isRecord(config)) {
    return {
      valid: false,
      errors: [`Configuration must be an object, got ${typeof config}`],
      warnings: [],
    };
  }

  const results: ValidationResult[] = [];

  results.push(validateInteger(config.deviceCount, 'deviceCount', 1, MAX_DEVICES));
  results.push(validateChoice(config.variant, 'variant', MUTRIG_VARIANTS));
  results.push(validateChoice(config.subroutines, 'subroutines', SUBROUTINE_SELECTIONS));
  results.push(validateInteger(config.controllerClockHz, 'controllerClockHz', 1, CLOCK_HZ_MAX));
  results.push(validateInteger(config.spiClockHz, 'spiClockHz', 1, SPI_CLOCK_HZ_MAX));
  results.push(
    validateInteger(config.counterBaseAddress, 'counterBaseAddress', 0, COUNTER_ADDRESS_MAX)
  );
  results.push(validateInteger(config.settleCycles, 'settleCycles', 0, CYCLES_MAX));
  results.push(validateInteger(config.debounceCycles, 'debounceCycles', 1, CYCLES_MAX));
  results.push(validateInteger(config.monitorWindowCycles, 'monitorWindowCycles', 0, CYCLES_MAX));
  results.push(validateInteger(config.marginCycles, 'marginCycles', 0, CYCLES_MAX));
  results.push(validateInteger(config.timeoutCycles, 'timeoutCycles', 1, CYCLES_MAX));
  results.push(validateLayoutOverride(config.layout));

  const merged = mergeResults(results);
  if (!merged.valid) {
    return merged;
  }

  const normalized = normalizeControllerConfig(toControllerConfig(config));
  const problems = layoutProblems(normalized.layout);
  const warnings = [...merged.warnings];
  if (normalized.monitorWindowCycles > normalized.controllerClockHz * WINDOW_WARN_SECONDS) {
    warnings.push(
      `monitorWindowCycles is very large (${normalized.monitorWindowCycles}). Scans will be slow to simulate.`
    );
  }
  return {
    valid: problems.length === 0,
    errors: problems,
    warnings,
  };
}

/**
 * Validates a configuration and returns it typed, or throws.
 * @throws {ConfigurationError} If validation fails
 */
export function assertValidConfig(config: unknown): ControllerConfig {
  const result = validateControllerConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(
      `Invalid controller configuration:\n- ${result.errors.join('\n- ')}`,
      result.errors
    );
  }
  return isRecord(config) ? toControllerConfig(config) : {};
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function isVariant(value: unknown): value is MutrigVariant {
  return MUTRIG_VARIANTS.some((variant) => variant === value);
}

function isSubroutineSelection(value: unknown): value is SubroutineSelection {
  return SUBROUTINE_SELECTIONS.some((selection) => selection === value);
}

/**
 * Copies the recognised fields of an already validated object.
 */
function toControllerConfig(raw: Record<string, unknown>): ControllerConfig {
  const config: ControllerConfig = {};
  const numericKeys = [
    'deviceCount',
    'controllerClockHz',
    'spiClockHz',
    'counterBaseAddress',
    'settleCycles',
    'debounceCycles',
    'monitorWindowCycles',
    'marginCycles',
    'timeoutCycles',
  ] as const;
  for (const key of numericKeys) {
    const value = optionalNumber(raw[key]);
    if (value !== undefined) {
      config[key] = value;
    }
  }
  if (isVariant(raw.variant)) {
    config.variant = raw.variant;
  }
  if (isSubroutineSelection(raw.subroutines)) {
    config.subroutines = raw.subroutines;
  }
  const layout = raw.layout;
  if (isRecord(layout)) {
    const override: Partial<BitstreamLayout> = {};
    for (const key of LAYOUT_KEYS) {
      const value = optionalNumber(layout[key]);
      if (value !== undefined) {
        override[key] = value;
      }
    }
    config.layout = override;
  }
  return config;
}

/**
 * Merges multiple validation results into one.
 */
function mergeResults(results: ValidationResult[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let valid = true;

  for (const result of results) {
    if (!result.valid) {
      valid = false;
    }
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid, errors, warnings };
}
