import { describe, it, expect } from 'vitest'
import { defaultConfig } from './config.js'
import { basename, components, dirname, isValidName, isWithin, join, normalize, parsePath } from './path.js'

const limits = defaultConfig

describe('normalize', () => {
  it('should collapse separator runs and drop a trailing separator', () => {
    expect(normalize('//title///00010000/')).toBe('/title/00010000')
    expect(normalize('///')).toBe('/')
    expect(normalize('/')).toBe('/')
  })

  it('should split into components', () => {
    expect(components('/shared2//sys/')).toEqual(['shared2', 'sys'])
    expect(components('/')).toEqual([])
  })
})

describe('isValidName', () => {
  it('should reject empty, dot and oversized names', () => {
    expect(isValidName('sys', 12)).toBe(true)
    expect(isValidName('', 12)).toBe(false)
    expect(isValidName('.', 12)).toBe(false)
    expect(isValidName('..', 12)).toBe(false)
    expect(isValidName('abcdefghijklm', 12)).toBe(false)
    expect(isValidName('abcdefghijkl', 12)).toBe(true)
    expect(isValidName('a\0b', 12)).toBe(false)
  })
})

describe('parsePath', () => {
  it('should return components of a valid path', () => {
    expect(parsePath('/title/00010000', limits)).toEqual({ ok: true, value: ['title', '00010000'] })
    expect(parsePath('//title//save/', limits)).toEqual({ ok: true, value: ['title', 'save'] })
    expect(parsePath('/', limits)).toEqual({ ok: true, value: [] })
  })

  it('should reject relative and non-string paths', () => {
    expect(parsePath('title', limits)).toEqual({ ok: false, code: 'Invalid' })
    expect(parsePath('', limits)).toEqual({ ok: false, code: 'Invalid' })
    expect(parsePath(42, limits)).toEqual({ ok: false, code: 'Invalid' })
  })

  it('should report too many components before bad names', () => {
    expect(parsePath('/a/b/c/d/e/f/g/h', limits)).toEqual({ ok: true, value: ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] })
    expect(parsePath('/a/b/c/d/e/f/g/h/i', limits)).toEqual({ ok: false, code: 'TooManyPathComponents' })
    expect(parsePath('/a/b/c/d/e/f/g/h/..', limits)).toEqual({ ok: false, code: 'TooManyPathComponents' })
  })

  it('should reject dot segments and long names', () => {
    expect(parsePath('/a/../b', limits)).toEqual({ ok: false, code: 'Invalid' })
    expect(parsePath('/a/./b', limits)).toEqual({ ok: false, code: 'Invalid' })
    expect(parsePath('/abcdefghijklm', limits)).toEqual({ ok: false, code: 'Invalid' })
  })

  it('should reject paths longer than the bound once normalized', () => {
    const name = 'abcdefghijkl'
    const long = `/${name}/${name}/${name}/${name}/${name}/${name}`
    expect(long.length).toBe(78)
    expect(parsePath(long, limits)).toEqual({ ok: false, code: 'Invalid' })
  })

  it('should honour custom limits', () => {
    expect(parsePath('/a/b/c', { maxPathDepth: 2, maxNameLength: 12, maxPathLength: 64 })).toEqual({
      ok: false,
      code: 'TooManyPathComponents',
    })
  })
})

describe('composition', () => {
  it('should join, split and compare paths', () => {
    expect(join('/', 'title')).toBe('/title')
    expect(join('/title/', 'save')).toBe('/title/save')
    expect(dirname('/title/save')).toBe('/title')
    expect(dirname('/title')).toBe('/')
    expect(basename('/title/save')).toBe('save')
    expect(basename('/')).toBe('')
  })

  it('should test containment by component', () => {
    expect(isWithin('/a', '/a')).toBe(true)
    expect(isWithin('/a', '/a/b')).toBe(true)
    expect(isWithin('/a', '/ab')).toBe(false)
    expect(isWithin('/', '/anything')).toBe(true)
  })
})
