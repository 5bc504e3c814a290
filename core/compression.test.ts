import { describe, it, expect } from 'vitest'
import { gunzip, gunzipOr, gzip, isGzip } from './compression.js'

const text = new TextEncoder().encode('save data '.repeat(50))

describe('gzip', () => {
  it('should produce gzip output that decompresses to the input', () => {
    const packed = gzip(text)

    expect(isGzip(packed)).toBe(true)
    expect(packed.length).toBeLessThan(text.length)
    expect(gunzip(packed)).toEqual({ ok: true, data: text })
  })

  it('should be deterministic', () => {
    expect(gzip(text)).toEqual(gzip(text))
  })
})

describe('gunzip', () => {
  it('should reject data without the magic number', () => {
    const result = gunzip(new Uint8Array([1, 2, 3]))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.reason).toBe('INVALID_DATA')
  })

  it('should report a damaged body', () => {
    const packed = gzip(text)
    const damaged = packed.slice()
    damaged[damaged.length - 6] = (damaged[damaged.length - 6] ?? 0) ^ 0xff

    const result = gunzip(damaged)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.reason).toBe('DECOMPRESSION_FAILED')
  })

  it('should map failures to a result code', () => {
    expect(gunzipOr(new Uint8Array([0x1f]), 'EccError')).toEqual({ ok: false, code: 'EccError' })
    expect(gunzipOr(gzip(text), 'EccError')).toEqual({ ok: true, value: text })
  })
})
