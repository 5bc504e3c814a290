/**
 * CLI utilities - barrel export
 */

export { formatLsOutput, formatPermissions, formatStat, formatNandStats, formatDirectoryStats } from './format.js'
export { formatError, missingArgumentError, unknownCommandError, invalidOptionError, getErrorMessage } from './errors.js'
