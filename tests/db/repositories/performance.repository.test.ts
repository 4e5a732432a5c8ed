import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createTestDb } from '../../helpers/test-db'
import { PerformanceRepository } from '../../../src/db/repositories/performance.repository'
import type { PerformanceRecord } from '../../../src/ai/performance-monitor'

function makeRecord(overrides: Partial<PerformanceRecord> = {}): PerformanceRecord {
  return { subject: 'coder', category: 'coding', latencyMs: 100, success: true, timestamp: 1_000, ...overrides }
}

describe('PerformanceRepository', () => {
  let db: ReturnType<typeof createTestDb>
  let repo: PerformanceRepository

  beforeEach(() => {
    db = createTestDb()
    repo = new PerformanceRepository(db)
  })

  afterEach(() => {
    db.close()
  })

  describe('create', () => {
    it('stores a record and reads it back', () => {
      const row = repo.create(makeRecord({ latencyMs: 123.5, success: false }))

      expect(repo.get(row.id)).toEqual({
        id: row.id,
        subject: 'coder',
        category: 'coding',
        latencyMs: 123.5,
        success: false,
        recordedAt: 1_000
      })
    })

    it('accepts writes through the sink interface', () => {
      repo.write(makeRecord())
      expect(repo.list()).toHaveLength(1)
    })

    it('returns undefined for an unknown id', () => {
      expect(repo.get('missing')).toBeUndefined()
    })
  })

  describe('list', () => {
    it('returns newest first with paging', () => {
      repo.create(makeRecord({ timestamp: 1 }))
      repo.create(makeRecord({ timestamp: 3 }))
      repo.create(makeRecord({ timestamp: 2 }))

      expect(repo.list().map((r) => r.recordedAt)).toEqual([3, 2, 1])
      expect(repo.list(1, 1).map((r) => r.recordedAt)).toEqual([2])
    })

    it('filters by subject and time', () => {
      repo.create(makeRecord({ subject: 'a', timestamp: 1 }))
      repo.create(makeRecord({ subject: 'a', timestamp: 5 }))
      repo.create(makeRecord({ subject: 'b', timestamp: 5 }))

      expect(repo.listBySubject('a').map((r) => r.recordedAt)).toEqual([5, 1])
      expect(repo.listBySubject('a', 2).map((r) => r.recordedAt)).toEqual([5])
    })
  })

  describe('summarize', () => {
    it('aggregates per subject, busiest first', () => {
      repo.create(makeRecord({ subject: 'a', latencyMs: 100, success: true }))
      repo.create(makeRecord({ subject: 'b', latencyMs: 100, success: true }))
      repo.create(makeRecord({ subject: 'b', latencyMs: 300, success: false }))

      expect(repo.summarize()).toEqual([
        { subject: 'b', count: 2, averageLatencyMs: 200, successRate: 0.5 },
        { subject: 'a', count: 1, averageLatencyMs: 100, successRate: 1 }
      ])
    })

    it('honours the since bound', () => {
      repo.create(makeRecord({ subject: 'a', timestamp: 1 }))
      repo.create(makeRecord({ subject: 'b', timestamp: 10 }))

      expect(repo.summarize(5).map((s) => s.subject)).toEqual(['b'])
    })
  })

  describe('deleteOlderThan', () => {
    it('removes records before the cutoff', () => {
      repo.create(makeRecord({ timestamp: 1 }))
      repo.create(makeRecord({ timestamp: 2 }))
      repo.create(makeRecord({ timestamp: 3 }))

      expect(repo.deleteOlderThan(3)).toBe(2)
      expect(repo.list().map((r) => r.recordedAt)).toEqual([3])
    })
  })
})
