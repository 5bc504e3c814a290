/**
 * Help text for CLI commands
 */

import { VERSION } from './version.js'

interface CommandHelp {
  usage: string
  description: string
  options: Array<[flags: string, description: string]>
}

const GLOBAL_OPTIONS: Array<[string, string]> = [
  ['--root <dir>', 'NAND directory (default: $NANDFS_ROOT)'],
  ['--uid <uid>', 'Caller user id (default: 0)'],
  ['--gid <gid>', 'Caller group id (default: 0)'],
  ['-h, --help', 'Display this message'],
]

const COMMANDS: Record<string, CommandHelp> = {
  ls: {
    usage: 'ls [path]',
    description: 'list directory contents',
    options: [['-l, --long', 'Use long listing format']],
  },
  stat: {
    usage: 'stat <path>',
    description: 'show the metadata of an entry',
    options: [],
  },
  cat: {
    usage: 'cat <files...>',
    description: 'read and concatenate file contents',
    options: [],
  },
  put: {
    usage: 'put <path> <content>',
    description: 'write text to a file, replacing any existing file',
    options: [],
  },
  mkdir: {
    usage: 'mkdir <paths...>',
    description: 'create directories',
    options: [['-p, --parents', 'Create parent directories as needed']],
  },
  rm: {
    usage: 'rm <paths...>',
    description: 'remove files or directories',
    options: [['-r, --recursive', 'Remove directories and their contents recursively']],
  },
  mv: {
    usage: 'mv <source> <dest>',
    description: 'move or rename an entry',
    options: [],
  },
  df: {
    usage: 'df',
    description: 'show usage of the whole NAND',
    options: [],
  },
  du: {
    usage: 'du [path]',
    description: 'show usage of a directory tree',
    options: [],
  },
  format: {
    usage: 'format',
    description: 'erase the NAND, leaving an empty root owned by the caller',
    options: [],
  },
}

/**
 * Names of all commands, in help order
 */
export const COMMAND_NAMES: readonly string[] = Object.keys(COMMANDS)

function formatOptions(options: Array<[string, string]>): string {
  const width = Math.max(...options.map(([flags]) => flags.length))
  return options.map(([flags, description]) => `  ${flags.padEnd(width)}  ${description}`).join('\n')
}

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  const width = Math.max(...Object.values(COMMANDS).map((c) => c.usage.length))
  const commands = Object.values(COMMANDS)
    .map((c) => `  ${c.usage.padEnd(width)}  ${c.description}`)
    .join('\n')

  return `nandfs/${VERSION}

Usage:
  $ nandfs <command> [options]

Commands:
${commands}

For more info, run any command with the --help flag:
  $ nandfs ls --help

Options:
${formatOptions([['-v, --version', 'Display version number'], ...GLOBAL_OPTIONS])}
`
}

/**
 * Get help text for a specific command
 */
export function getCommandHelp(command: string): string | null {
  if (!Object.prototype.hasOwnProperty.call(COMMANDS, command)) return null
  const help = COMMANDS[command]
  if (!help) return null

  return `nandfs/${VERSION}

Usage:
  $ nandfs ${help.usage}

Options:
${formatOptions([...help.options, ...GLOBAL_OPTIONS])}

Description:
  ${help.description}
`
}
