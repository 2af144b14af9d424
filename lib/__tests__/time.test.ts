import { compactTimestamp, formatDuration, formatTimestamp, parseTimestamp } from '../time'

describe('time helpers', () => {
  it('formats local timestamps', () => {
    const date = new Date(2020, 4, 1, 9, 4, 3)
    expect(formatTimestamp(date)).toBe('2020-05-01 09:04')
    expect(formatTimestamp(date, true)).toBe('2020-05-01 09:04:03')
    expect(compactTimestamp(date)).toBe('2020-05-01-09-04-03')
  })

  it('returns N/A for missing or invalid timestamps', () => {
    expect(formatTimestamp(undefined)).toBe('N/A')
    expect(formatTimestamp(new Date('not a date'))).toBe('N/A')
  })

  it('parses seconds, milliseconds and ISO strings', () => {
    const expected = new Date('2024-01-02T03:04:05.000Z').getTime()
    expect(parseTimestamp(expected / 1000).getTime()).toBe(expected)
    expect(parseTimestamp(expected).getTime()).toBe(expected)
    expect(parseTimestamp('2024-01-02T03:04:05.000Z').getTime()).toBe(expected)
  })

  it('formats durations by their two largest units', () => {
    expect(formatDuration(1500)).toBe('1s 500ms')
    expect(formatDuration(61_000)).toBe('1m 1s')
    expect(formatDuration(3_600_000 * 26)).toBe('1d 2h')
  })
})
