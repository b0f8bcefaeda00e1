// tests/unit/result-transformers.test.ts
import { describe, it, expect } from 'vitest'
import { transformRankRows } from '../../src/result-transformers'
import { parseCount } from '../../src/builder/shared/int-like'

describe('transformRankRows', () => {
  it('should map result columns to ranked parents', () => {
    expect(
      transformRankRows(
        [{ parent_id: 3, parent_name: 'Ada', total_children: 12 }],
        'sqlite',
      ),
    ).toEqual([{ parentId: 3, parentName: 'Ada', totalChildren: 12 }])
  })

  it('should parse postgres bigint counts returned as strings', () => {
    expect(
      transformRankRows(
        [{ parent_id: 'a1', parent_name: 'Ada', total_children: '42' }],
        'postgres',
      ),
    ).toEqual([{ parentId: 'a1', parentName: 'Ada', totalChildren: 42 }])
  })

  it('should accept bigint counts', () => {
    const [row] = transformRankRows(
      [{ parent_id: 1, parent_name: 'Ada', total_children: 7n }],
      'postgres',
    )

    expect(row.totalChildren).toBe(7)
  })

  it('should reject a row without a parent id', () => {
    expect(() =>
      transformRankRows(
        [{ parent_id: null, parent_name: 'Ada', total_children: 1 }],
        'document',
      ),
    ).toThrow(/Result row 0 has no usable parent_id: null\nBackend: document/)
  })

  it('should reject a row whose name is not a string', () => {
    expect(() =>
      transformRankRows(
        [
          { parent_id: 1, parent_name: 'Ada', total_children: 1 },
          { parent_id: 2, parent_name: 5, total_children: 1 },
        ],
        'sqlite',
      ),
    ).toThrow(/Result row 1 has no usable parent_name/)
  })

  it('should reject a negative count', () => {
    expect(() =>
      transformRankRows(
        [{ parent_id: 1, parent_name: 'Ada', total_children: -1 }],
        'sqlite',
      ),
    ).toThrow(/Result row 0 has an invalid total_children/)
  })

  it('should reject rows that are not objects', () => {
    expect(() => transformRankRows([[1, 'Ada', 2]], 'sqlite')).toThrow(
      /Result row 0 is not an object/,
    )
  })
})

describe('parseCount', () => {
  it('should read digit strings', () => {
    expect(parseCount('0')).toBe(0)
    expect(parseCount('1024')).toBe(1024)
  })

  it('should refuse signed or decimal strings', () => {
    expect(parseCount('-3')).toBeUndefined()
    expect(parseCount('2.5')).toBeUndefined()
  })

  it('should refuse values beyond the safe integer range', () => {
    expect(parseCount(2n ** 60n)).toBeUndefined()
    expect(parseCount('90071992547409930')).toBeUndefined()
  })

  it('should refuse fractional numbers', () => {
    expect(parseCount(1.5)).toBeUndefined()
  })
})
