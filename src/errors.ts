/**
 * Consolidated error system for maya-calendar.
 *
 * All error classes extend MayaCalendarError, which carries a typed error code.
 * Modules re-export the classes they throw.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const MayaCalendarErrorCode = {
  // Calendar date components
  INVALID_NUMBER: 'INVALID_NUMBER',
  INVALID_NAME: 'INVALID_NAME',

  // Gregorian input
  INVALID_DATE: 'INVALID_DATE',
} as const

export type MayaCalendarErrorCode = (typeof MayaCalendarErrorCode)[keyof typeof MayaCalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class MayaCalendarError extends Error {
  readonly code: MayaCalendarErrorCode

  constructor(code: MayaCalendarErrorCode, message: string) {
    super(message)
    this.name = 'MayaCalendarError'
    this.code = code
  }
}

// ============================================================================
// Calendar Date Errors
// ============================================================================

/** Day number outside the range of its cycle (or of the month it names). */
export class InvalidNumberError extends MayaCalendarError {
  constructor(message: string) {
    super(MayaCalendarErrorCode.INVALID_NUMBER, message)
    this.name = 'InvalidNumberError'
  }
}

/** Name index or name string that is not in the fixed name table. */
export class InvalidNameError extends MayaCalendarError {
  constructor(message: string) {
    super(MayaCalendarErrorCode.INVALID_NAME, message)
    this.name = 'InvalidNameError'
  }
}

// ============================================================================
// Gregorian Date Errors
// ============================================================================

export class InvalidDateError extends MayaCalendarError {
  constructor(message: string) {
    super(MayaCalendarErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}
