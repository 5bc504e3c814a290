import { describe, it, expect } from 'vitest'
import { configFromEnv, createConfig, defaultConfig, usableClusters } from './config.js'
import { constants } from './constants.js'
import { isFsError } from './errors.js'

describe('createConfig', () => {
  it('should default to the stock geometry', () => {
    const config = createConfig()
    expect(config).toEqual(defaultConfig)
    expect(config.clusterSize).toBe(0x4000)
    expect(config.totalClusters).toBe(0x7ec0)
    expect(config.totalInodes).toBe(0x17ff)
    expect(config.maxHandles).toBe(constants.MAX_HANDLES)
    expect(config.superUid).toBe(0)
  })

  it('should freeze the result', () => {
    expect(Object.isFrozen(createConfig({ totalInodes: 16 }))).toBe(true)
  })

  it('should override selected fields', () => {
    const config = createConfig({ totalClusters: 8, reservedClusters: 2, badClusters: 1, totalInodes: 16 })
    expect(config.totalClusters).toBe(8)
    expect(usableClusters(config)).toBe(5)
    expect(config.maxPathDepth).toBe(8)
  })

  it('should reject non-integers and out-of-range values', () => {
    expect(() => createConfig({ clusterSize: 0 })).toThrow('clusterSize must be between 1 and')
    expect(() => createConfig({ totalInodes: 1.5 })).toThrow('totalInodes must be an integer')
    expect(() => createConfig({ totalClusters: 4, reservedClusters: 5 })).toThrow('reservedClusters must be between 0 and 4')
    expect(() => createConfig({ totalClusters: 4, reservedClusters: 2, badClusters: 3 })).toThrow(
      'badClusters must be between 0 and 2'
    )
    expect(() => createConfig({ maxPathLength: 1 })).toThrow('maxPathLength must be between 2 and')
  })

  it('should throw FsError with code Invalid', () => {
    try {
      createConfig({ maxHandles: -1 })
      expect.unreachable()
    } catch (error) {
      expect(isFsError(error, 'Invalid')).toBe(true)
    }
  })
})

describe('configFromEnv', () => {
  it('should read and trim NANDFS_ROOT', () => {
    expect(configFromEnv({ NANDFS_ROOT: ' /srv/nand ' })).toEqual({ root: '/srv/nand' })
  })

  it('should ignore an empty root', () => {
    expect(configFromEnv({ NANDFS_ROOT: '  ' })).toEqual({})
    expect(configFromEnv({})).toEqual({})
  })
})
