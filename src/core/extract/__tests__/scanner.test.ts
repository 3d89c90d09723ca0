import { describe, expect, it } from 'vitest'
import { ExtractionError } from '../../errors.js'
import { TokenScanner } from '../scanner.js'

describe('TokenScanner', () => {
  it('returns the text between the last two markers', () => {
    const scanner = new TokenScanner('<p class="x"><span id="7">seven</span></p>')

    expect(scanner.extract(['class="x"', 'id="', '"'])).toBe('7')
    expect(scanner.extract(['<span', '>', '<'])).toBe('seven')
  })

  it('does not move the cursor on extract', () => {
    const scanner = new TokenScanner('<b>1</b><b>2</b>')

    expect(scanner.extract(['<b>', '</b>'])).toBe('1')
    expect(scanner.extract(['<b>', '</b>'])).toBe('1')
    expect(scanner.position).toBe(0)
  })

  it('extracts from the cursor after seek', () => {
    const scanner = new TokenScanner('<b>1</b><b>2</b>')

    expect(scanner.seek('</b>')).toBe(true)
    expect(scanner.position).toBe(8)
    expect(scanner.extract(['<b>', '</b>'])).toBe('2')
  })

  it('reports a missing seek marker', () => {
    const scanner = new TokenScanner('<b>1</b>')

    expect(scanner.seek('<i>')).toBe(false)
  })

  it('returns the fallback when a marker is missing', () => {
    const scanner = new TokenScanner('<b>1</b>')

    expect(scanner.extract(['<i>', '</i>'], 'none')).toBe('none')
    expect(scanner.extract(['<b>', '</i>'], '')).toBe('')
  })

  it('throws ExtractionError naming the missing marker without a fallback', () => {
    const scanner = new TokenScanner('<b>1</b>')

    expect(() => scanner.extract(['<b>', '</i>'])).toThrow(ExtractionError)
    expect(() => scanner.extract(['<b>', '</i>'])).toThrow('Marker not found: "</i>"')
  })

  it('needs at least two markers', () => {
    const scanner = new TokenScanner('<b>1</b>')

    expect(() => scanner.extract(['<b>'])).toThrow(ExtractionError)
  })

  it('searches each marker after the previous match', () => {
    const scanner = new TokenScanner('"a" start "b"')

    expect(scanner.extract(['start', '"', '"'])).toBe('b')
  })

  it('bounds a window at the next end marker', () => {
    const scanner = new TokenScanner('<li><b>one</b></li><li><i>two</i></li>')
    scanner.seek('<li>')
    const first = scanner.window('<li>')

    expect(first.extract(['<b>', '</b>'])).toBe('one')
    expect(first.extract(['<i>', '</i>'], '')).toBe('')
    expect(scanner.extract(['<i>', '</i>'])).toBe('two')
  })

  it('runs a window to the end of the text when the end marker is absent', () => {
    const scanner = new TokenScanner('<li><i>two</i></li>')
    scanner.seek('<li>')

    expect(scanner.window('<li>').extract(['<i>', '</i>'])).toBe('two')
  })
})
