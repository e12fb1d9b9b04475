import { describe, expect, it } from 'vitest'
import { normalizePage } from '../src/utils/pagination'

describe('normalizePage', () => {
  it('defaults to the first page of 20', () => {
    expect(normalizePage({})).toEqual({ page: 1, pageSize: 20, skip: 0 })
  })

  it('clamps page size to 1..100', () => {
    expect(normalizePage({ page: 3, pageSize: 500 })).toEqual({ page: 3, pageSize: 100, skip: 200 })
    expect(normalizePage({ page: 0, pageSize: -5 })).toEqual({ page: 1, pageSize: 1, skip: 0 })
  })
})
