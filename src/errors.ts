/**
 * @file Error types for the MuTRiG controller model and its tooling.
 * @description Structured errors carrying a stable code and optional context.
 * Conditions the controller absorbs at run time (bus timeouts, dropped
 * commands) are logged instead of thrown; these classes cover configuration,
 * file parsing, the MCC exception trap and simulation limits.
 * @module errors
 */

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all controller errors.
 */
export class MutrigError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'MutrigError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    // Maintains proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Error thrown when a controller configuration is invalid.
 */
export class ConfigurationError extends MutrigError {
  /** Individual validation messages, when the error came from a validator */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { ...context, issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when a bitstream layout cannot hold the per-channel fields.
 */
export class LayoutError extends MutrigError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LAYOUT_ERROR', context);
    this.name = 'LayoutError';
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

/**
 * Error thrown when parsing fails.
 */
export class ParseError extends MutrigError {
  /** The line number where parsing failed (1-based) */
  readonly line?: number;
  /** The content that caused the parse failure */
  readonly content?: string;

  constructor(message: string, line?: number, content?: string) {
    super(message, 'PARSE_ERROR', { line, content });
    this.name = 'ParseError';
    if (line !== undefined) {
      this.line = line;
    }
    if (content !== undefined) {
      this.content = content;
    }
  }
}

/**
 * Error thrown when a bitstream file holds something other than 32-bit words.
 */
export class BitstreamParseError extends ParseError {
  /**
   * @param token - The offending token
   * @param lineNumber - Line number in the file
   */
  constructor(token: string, lineNumber?: number) {
    const where = lineNumber !== undefined ? ` on line ${lineNumber}` : '';
    super(`Invalid bitstream word "${token}"${where}`, lineNumber, token);
    this.name = 'BitstreamParseError';
  }
}

// ============================================================================
// Runtime Errors
// ============================================================================

/**
 * Describes the handshake inconsistency that traps the configuration
 * controller. The trap is a state, so this error is recorded on the
 * controller rather than thrown.
 */
export class HandshakeFaultError extends MutrigError {
  /** Name of the sub-routine whose handshake was inconsistent */
  readonly subroutine: string;

  constructor(subroutine: string, detail: string) {
    super(`Handshake fault in ${subroutine}: ${detail}`, 'HANDSHAKE_FAULT', { subroutine });
    this.name = 'HandshakeFaultError';
    this.subroutine = subroutine;
  }
}

/**
 * Error thrown when a simulation run does not settle within its time limit.
 */
export class SimulationTimeoutError extends MutrigError {
  /** Simulated time in picoseconds when the run was abandoned */
  readonly atPs: number;

  constructor(message: string, atPs: number) {
    super(message, 'SIMULATION_TIMEOUT', { atPs });
    this.name = 'SimulationTimeoutError';
    this.atPs = atPs;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Type guard to check if an error is a MutrigError.
 */
export function isMutrigError(error: unknown): error is MutrigError {
  return error instanceof MutrigError;
}

/**
 * Type guard to check if an error is a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Wraps an unknown error in a MutrigError if it isn't already one.
 * @param defaultMessage - Message used when the value is not an Error
 */
export function wrapError(
  error: unknown,
  defaultMessage = 'An unknown error occurred'
): MutrigError {
  if (isMutrigError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new MutrigError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }
  return new MutrigError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

/**
 * Extracts a user-friendly message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
