/**
 * CLI for nandfs - inspect and edit a NAND image directory
 *
 * Commands:
 * - ls [path]             - list directory contents
 * - stat <path>           - show entry metadata
 * - cat <files...>        - print file contents
 * - put <path> <content>  - write a file
 * - mkdir <paths...>      - create directories
 * - rm <paths...>         - remove files or directories
 * - mv <src> <dest>       - move an entry
 * - df                    - usage of the whole NAND
 * - du [path]             - usage of a directory tree
 * - format                - erase the NAND
 *
 * Every command runs under the caller identity given by `--uid` and `--gid`
 * (both default to 0, the privileged uid), so permission checks apply as they
 * would to that caller.
 */

import { cac, type CAC } from 'cac'

import { FsError } from '../core/errors.js'
import type { FileSystem } from '../core/filesystem.js'
import { join, normalize } from '../core/path.js'
import { check, unwrap } from '../core/result.js'
import { Mode } from '../core/types.js'
import { getCommandHelp, mainHelp, COMMAND_NAMES } from './help.js'
import type { CLIContext, CommandResult, Identity, LsEntry } from './types.js'
import {
  formatDirectoryStats,
  formatError,
  formatLsOutput,
  formatNandStats,
  formatStat,
  invalidOptionError,
  missingArgumentError,
  unknownCommandError,
} from './utils/index.js'
import { VERSION } from './version.js'

export { formatLsOutput } from './utils/index.js'
export type { CLIContext, CommandResult } from './types.js'

type Output = (text: string) => void

/**
 * Create and return the CLI instance with all commands registered
 */
export function createCLI(): { name: string; commands: readonly string[]; cli: CAC } {
  const cli = cac('nandfs')

  cli.option('--root <dir>', 'NAND directory')
  cli.option('--uid <uid>', 'Caller user id', { default: 0 })
  cli.option('--gid <gid>', 'Caller group id', { default: 0 })

  cli.command('ls [path]', 'list directory contents').option('-l, --long', 'Use long listing format')
  cli.command('stat <path>', 'show the metadata of an entry')
  cli.command('cat <files...>', 'read and concatenate file contents')
  cli.command('put <path> <content>', 'write text to a file')
  cli.command('mkdir <paths...>', 'create directories').option('-p, --parents', 'Create parent directories as needed')
  cli.command('rm <paths...>', 'remove files or directories').option('-r, --recursive', 'Remove directories recursively')
  cli.command('mv <source> <dest>', 'move or rename an entry')
  cli.command('df', 'show usage of the whole NAND')
  cli.command('du [path]', 'show usage of a directory tree')
  cli.command('format', 'erase the NAND')

  return { name: 'nandfs', commands: COMMAND_NAMES, cli }
}

/**
 * Parse a uid/gid option value
 */
function parseId(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value : typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : NaN
  return Number.isInteger(n) && n >= 0 && n <= 0xffffffff ? n : undefined
}

/**
 * Execute a CLI command with the given arguments and context
 */
export function runCLI(args: string[], context: CLIContext): CommandResult {
  const { stdout, stderr } = context

  if (args.includes('--version') || args.includes('-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  if (args.length === 0 || (args.length === 1 && (args[0] === '--help' || args[0] === '-h'))) {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const { cli } = createCLI()
  const parsed = cli.parse(['node', 'nandfs', ...args], { run: false })
  const command = cli.matchedCommandName
  const positional = parsed.args.map(String)
  const options: Record<string, unknown> = parsed.options

  if (command === undefined) {
    if (positional.length === 0) {
      stdout(mainHelp())
      return { exitCode: 0 }
    }
    const name = positional[0] ?? ''
    stderr(unknownCommandError(name))
    return { exitCode: 1, error: `unknown command '${name}'` }
  }

  if (options.help === true || options.h === true) {
    stdout(getCommandHelp(command) ?? mainHelp())
    return { exitCode: 0 }
  }

  const uid = parseId(options.uid)
  if (uid === undefined) {
    stderr(invalidOptionError('uid', options.uid))
    return { exitCode: 1, error: 'invalid uid' }
  }
  const gid = parseId(options.gid)
  if (gid === undefined) {
    stderr(invalidOptionError('gid', options.gid))
    return { exitCode: 1, error: 'invalid gid' }
  }

  const root = options.root === undefined ? undefined : String(options.root)
  const opened = context.openFileSystem(root)
  if (!opened.ok) {
    const message = formatError(command, new FsError(opened.code, 'mount', root))
    stderr(message)
    return { exitCode: 1, error: message }
  }

  const run: CommandRun = { fs: opened.value, who: { uid, gid }, args: positional, options, stdout, stderr }

  try {
    switch (command) {
      case 'ls':
        return executeLs(run)
      case 'stat':
        return executeStat(run)
      case 'cat':
        return executeCat(run)
      case 'put':
        return executePut(run)
      case 'mkdir':
        return executeMkdir(run)
      case 'rm':
        return executeRm(run)
      case 'mv':
        return executeMv(run)
      case 'df':
        return executeDf(run)
      case 'du':
        return executeDu(run)
      case 'format':
        return executeFormat(run)
      default:
        stderr(unknownCommandError(command))
        return { exitCode: 1, error: `unknown command '${command}'` }
    }
  } catch (err: unknown) {
    const message = formatError(command, err)
    stderr(message)
    return { exitCode: 1, error: message }
  }
}

interface CommandRun {
  fs: FileSystem
  who: Identity
  args: string[]
  options: Record<string, unknown>
  stdout: Output
  stderr: Output
}

function missing(run: CommandRun, command: string, argName: string): CommandResult {
  run.stderr(missingArgumentError(command, argName))
  return { exitCode: 1, error: `missing ${argName} argument` }
}

// =============================================================================
// Commands
// =============================================================================

function executeLs({ fs, who, args, options, stdout }: CommandRun): CommandResult {
  const target = normalize(args[0] ?? '/')
  const meta = unwrap(fs.getMetadata(who.uid, who.gid, target), 'getMetadata', target)

  let entries: LsEntry[]
  if (meta.isFile) {
    const name = target.split('/').pop() ?? target
    entries = [{ name, ...meta }]
  } else {
    const names = unwrap(fs.readDirectory(who.uid, who.gid, target), 'readDirectory', target)
    entries = names.map((name) => {
      const path = join(target, name)
      return { name, ...unwrap(fs.getMetadata(who.uid, who.gid, path), 'getMetadata', path) }
    })
  }

  const output = formatLsOutput(entries, { long: options.long === true })
  if (output.length > 0) stdout(output)
  return { exitCode: 0 }
}

function executeStat(run: CommandRun): CommandResult {
  const { fs, who, args, stdout } = run
  const [path] = args
  if (path === undefined) return missing(run, 'stat', 'path')

  const target = normalize(path)
  stdout(formatStat(target, unwrap(fs.getMetadata(who.uid, who.gid, target), 'getMetadata', target)))
  return { exitCode: 0 }
}

function executeCat(run: CommandRun): CommandResult {
  const { fs, who, args, stdout } = run
  if (args.length === 0) return missing(run, 'cat', 'file')

  const decoder = new TextDecoder()
  const contents: string[] = []
  for (const path of args) {
    const target = normalize(path)
    const handle = unwrap(fs.openFile(who.uid, who.gid, target, Mode.Read), 'openFile', target)
    try {
      const { size } = unwrap(handle.getStatus(), 'getFileStatus', target)
      contents.push(decoder.decode(unwrap(handle.readBytes(size), 'readBytesFromFile', target)))
    } finally {
      handle.close()
    }
  }
  stdout(contents.join(''))
  return { exitCode: 0 }
}

function executePut(run: CommandRun): CommandResult {
  const { fs, who, args } = run
  const [path, content] = args
  if (path === undefined) return missing(run, 'put', 'path')
  if (content === undefined) return missing(run, 'put', 'content')

  const target = normalize(path)
  const existing = fs.getMetadata(who.uid, who.gid, target)
  if (existing.ok) {
    check(fs.delete(who.uid, who.gid, target), 'delete', target)
  } else if (existing.code !== 'NotFound') {
    check(existing.code, 'getMetadata', target)
  }

  check(fs.createFile(who.uid, who.gid, target, 0, Mode.ReadWrite, Mode.ReadWrite, Mode.Read), 'createFile', target)
  const handle = unwrap(fs.openFile(who.uid, who.gid, target, Mode.Write), 'openFile', target)
  try {
    unwrap(handle.write(new TextEncoder().encode(content)), 'writeBytesToFile', target)
  } finally {
    handle.close()
  }
  return { exitCode: 0 }
}

function executeMkdir(run: CommandRun): CommandResult {
  const { fs, who, args, options } = run
  if (args.length === 0) return missing(run, 'mkdir', 'directory')

  const create = (path: string) =>
    fs.createDirectory(who.uid, who.gid, path, 0, Mode.ReadWrite, Mode.ReadWrite, Mode.Read)

  for (const path of args) {
    const target = normalize(path)
    if (options.parents !== true) {
      check(create(target), 'createDirectory', target)
      continue
    }

    // With -p, create each missing ancestor and tolerate existing ones
    let current = '/'
    for (const part of target.split('/').filter(Boolean)) {
      current = join(current, part)
      const code = create(current)
      if (code !== 'AlreadyExists') check(code, 'createDirectory', current)
    }
  }
  return { exitCode: 0 }
}

function executeRm(run: CommandRun): CommandResult {
  const { fs, who, args, options } = run
  if (args.length === 0) return missing(run, 'rm', 'file')

  const remove = (path: string): void => {
    if (options.recursive === true) {
      const meta = unwrap(fs.getMetadata(who.uid, who.gid, path), 'getMetadata', path)
      if (!meta.isFile) {
        for (const name of unwrap(fs.readDirectory(who.uid, who.gid, path), 'readDirectory', path)) {
          remove(join(path, name))
        }
      }
    }
    check(fs.delete(who.uid, who.gid, path), 'delete', path)
  }

  for (const path of args) {
    remove(normalize(path))
  }
  return { exitCode: 0 }
}

function executeMv(run: CommandRun): CommandResult {
  const { fs, who, args } = run
  const [source, dest] = args
  if (source === undefined) return missing(run, 'mv', 'source')
  if (dest === undefined) return missing(run, 'mv', 'destination')

  check(fs.rename(who.uid, who.gid, normalize(source), normalize(dest)), 'rename', normalize(source))
  return { exitCode: 0 }
}

function executeDf({ fs, stdout }: CommandRun): CommandResult {
  stdout(formatNandStats(unwrap(fs.getNandStats(), 'getNandStats')))
  return { exitCode: 0 }
}

function executeDu({ fs, args, stdout }: CommandRun): CommandResult {
  const target = normalize(args[0] ?? '/')
  stdout(formatDirectoryStats(target, unwrap(fs.getDirectoryStats(target), 'getDirectoryStats', target)))
  return { exitCode: 0 }
}

function executeFormat({ fs, who, stdout }: CommandRun): CommandResult {
  check(fs.format(who.uid), 'format')
  stdout(`formatted, root owned by uid ${who.uid}`)
  return { exitCode: 0 }
}
