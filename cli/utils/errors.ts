/**
 * Error formatting utilities for CLI
 */

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Format error for CLI output
 *
 * Format: nandfs <command>: <message>
 */
export function formatError(command: string, err: unknown): string {
  return `nandfs ${command}: ${getErrorMessage(err)}`
}

/**
 * Create a missing argument error message
 */
export function missingArgumentError(command: string, argName: string): string {
  return `nandfs ${command}: missing ${argName} argument`
}

/**
 * Create an unknown command error message
 */
export function unknownCommandError(command: string): string {
  return `nandfs: unknown command '${command}'`
}

/**
 * Create an invalid option value error message
 */
export function invalidOptionError(option: string, value: unknown): string {
  return `nandfs: invalid value for --${option}: '${String(value)}'`
}
