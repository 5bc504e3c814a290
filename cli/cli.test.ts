/**
 * CLI tests
 *
 * Commands run against an in-memory NAND injected through the context, with
 * stdout and stderr captured.
 */

import { describe, it, expect, beforeEach } from 'vitest'

import { runCLI, createCLI } from './index.js'
import { getCommandHelp, mainHelp } from './help.js'
import type { CLIContext } from './types.js'
import type { NandFileSystem } from '../core/engine.js'
import { err, ok } from '../core/result.js'
import { createTestFilesystem } from '../tests/test-utils.js'

interface Harness {
  context: CLIContext
  out: string[]
  errors: string[]
  roots: Array<string | undefined>
}

function createHarness(fs: NandFileSystem): Harness {
  const out: string[] = []
  const errors: string[] = []
  const roots: Array<string | undefined> = []
  return {
    out,
    errors,
    roots,
    context: {
      openFileSystem: (root) => {
        roots.push(root)
        return ok(fs)
      },
      stdout: (text) => out.push(text),
      stderr: (text) => errors.push(text),
    },
  }
}

describe('CLI', () => {
  let fs: NandFileSystem
  let h: Harness

  const run = (...args: string[]) => runCLI(args, h.context)

  beforeEach(() => {
    fs = createTestFilesystem().fs
    h = createHarness(fs)
  })

  // ===========================================================================
  // Setup
  // ===========================================================================

  describe('createCLI', () => {
    it('should register every command', () => {
      const { name, commands } = createCLI()
      expect(name).toBe('nandfs')
      expect(commands).toEqual(['ls', 'stat', 'cat', 'put', 'mkdir', 'rm', 'mv', 'df', 'du', 'format'])
    })
  })

  describe('help and version', () => {
    it('should print the version', () => {
      expect(run('--version')).toEqual({ exitCode: 0 })
      expect(h.out).toEqual(['0.1.0'])
    })

    it('should print the main help with no arguments', () => {
      expect(run()).toEqual({ exitCode: 0 })
      expect(h.out).toEqual([mainHelp()])
      expect(h.roots).toEqual([])
    })

    it('should print command help', () => {
      expect(run('ls', '--help')).toEqual({ exitCode: 0 })
      expect(h.out).toEqual([getCommandHelp('ls')])
    })

    it('should not resolve help for prototype keys', () => {
      expect(getCommandHelp('toString')).toBeNull()
    })

    it('should reject unknown commands', () => {
      expect(run('frob').exitCode).toBe(1)
      expect(h.errors).toEqual(["nandfs: unknown command 'frob'"])
    })
  })

  // ===========================================================================
  // Commands
  // ===========================================================================

  describe('put / cat', () => {
    it('should write a file and print it back', () => {
      expect(run('put', '/a', 'hello')).toEqual({ exitCode: 0 })
      expect(run('cat', '/a')).toEqual({ exitCode: 0 })
      expect(h.out).toEqual(['hello'])
    })

    it('should replace an existing file', () => {
      run('put', '/a', 'hello')
      run('put', '/a', 'hi')
      run('cat', '/a')
      expect(h.out).toEqual(['hi'])
    })

    it('should concatenate several files', () => {
      run('put', '/a', 'one ')
      run('put', '/b', 'two')
      run('cat', '/a', '/b')
      expect(h.out).toEqual(['one two'])
    })

    it('should report a missing file', () => {
      expect(run('cat', '/missing').exitCode).toBe(1)
      expect(h.errors).toEqual(["nandfs cat: NotFound: no such file or directory, openFile '/missing'"])
    })

    it('should report missing arguments', () => {
      expect(run('put', '/a').exitCode).toBe(1)
      expect(h.errors).toEqual(['nandfs put: missing content argument'])
    })
  })

  describe('ls / stat', () => {
    beforeEach(() => {
      run('mkdir', '/title')
      run('put', '/a', 'hello')
    })

    it('should list names in creation order', () => {
      run('ls')
      expect(h.out).toEqual(['title\na'])
    })

    it('should list details with --long', () => {
      run('ls', '-l', '/')
      expect(h.out).toEqual(['drwrwr- 0 0          0 title\n-rwrwr- 0 0          5 a'])
    })

    it('should print nothing for an empty directory', () => {
      expect(run('ls', '/title')).toEqual({ exitCode: 0 })
      expect(h.out).toEqual([])
    })

    it('should show metadata', () => {
      run('stat', '/a')
      expect(h.out).toEqual([
        ['path: /a', 'type: file', 'size: 5', 'uid: 0', 'gid: 0', 'attribute: 0', 'permissions: -rwrwr-', 'index: 2'].join(
          '\n'
        ),
      ])
    })

    it('should report a missing path for stat', () => {
      expect(run('stat').exitCode).toBe(1)
      expect(h.errors).toEqual(['nandfs stat: missing path argument'])
    })
  })

  describe('mkdir / rm / mv', () => {
    it('should create parents with -p', () => {
      expect(run('mkdir', '-p', '/a/b/c')).toEqual({ exitCode: 0 })
      expect(run('mkdir', '-p', '/a/b/d')).toEqual({ exitCode: 0 })
      run('ls', '/a/b')
      expect(h.out).toEqual(['c\nd'])
    })

    it('should fail without -p when the parent is missing', () => {
      expect(run('mkdir', '/x/y').exitCode).toBe(1)
      expect(h.errors).toEqual(["nandfs mkdir: NotFound: no such file or directory, createDirectory '/x/y'"])
    })

    it('should refuse a non-empty directory without -r', () => {
      run('mkdir', '/d')
      run('put', '/d/f', 'x')

      expect(run('rm', '/d').exitCode).toBe(1)
      expect(h.errors).toEqual(["nandfs rm: FileNotEmpty: directory not empty, delete '/d'"])
      expect(run('rm', '-r', '/d')).toEqual({ exitCode: 0 })
      expect(fs.readDirectory(0, 0, '/')).toEqual({ ok: true, value: [] })
    })

    it('should move entries', () => {
      run('mkdir', '/d')
      run('put', '/f', 'x')
      expect(run('mv', '/f', '/d/g')).toEqual({ exitCode: 0 })
      run('ls', '/d')
      expect(h.out).toEqual(['g'])
    })
  })

  describe('df / du / format', () => {
    it('should show NAND usage', () => {
      run('mkdir', '/title')
      run('put', '/title/save', 'x'.repeat(20))
      run('df')
      expect(h.out).toEqual([
        [
          'cluster size: 16',
          'clusters used: 2',
          'clusters free: 6',
          'clusters reserved: 2',
          'clusters bad: 0',
          'inodes used: 3',
          'inodes free: 5',
        ].join('\n'),
      ])
    })

    it('should show usage of a subtree', () => {
      run('mkdir', '/title')
      run('put', '/title/save', 'x'.repeat(20))
      run('du', '/title')
      run('du')
      expect(h.out).toEqual(['2\t2\t/title', '2\t3\t/'])
    })

    it('should format with the caller as root owner', () => {
      run('put', '/a', 'x')
      expect(run('--uid', '7', 'format')).toEqual({ exitCode: 0 })
      expect(h.out).toEqual(['formatted, root owned by uid 7'])
      expect(fs.readDirectory(0, 0, '/')).toEqual({ ok: true, value: [] })
    })
  })

  // ===========================================================================
  // Identity & Mounting
  // ===========================================================================

  describe('caller identity', () => {
    it('should apply permissions to the given uid and gid', () => {
      run('mkdir', '/title')

      expect(run('--uid', '1000', '--gid', '1', 'put', '/title/x', 'hi').exitCode).toBe(1)
      expect(h.errors).toEqual(["nandfs put: AccessDenied: permission denied, createFile '/title/x'"])
    })

    it('should reject a malformed uid', () => {
      expect(run('--uid', 'abc', 'ls').exitCode).toBe(1)
      expect(h.errors).toEqual(["nandfs: invalid value for --uid: 'abc'"])
    })
  })

  describe('mounting', () => {
    it('should pass the root directory through', () => {
      run('--root', '/tmp/nand', 'ls')
      run('ls')
      expect(h.roots).toEqual(['/tmp/nand', undefined])
    })

    it('should report a filesystem that cannot be mounted', () => {
      const context: CLIContext = { ...h.context, openFileSystem: () => err('SuperblockInitFailed') }

      expect(runCLI(['ls'], context).exitCode).toBe(1)
      expect(h.errors).toEqual(['nandfs ls: SuperblockInitFailed: superblock initialization failed, mount'])
    })
  })
})
