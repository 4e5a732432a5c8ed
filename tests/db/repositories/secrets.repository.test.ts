import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createTestDb } from '../../helpers/test-db'
import { SecretsRepository } from '../../../src/db/repositories/secrets.repository'

describe('SecretsRepository', () => {
  let db: ReturnType<typeof createTestDb>
  let repo: SecretsRepository

  beforeEach(() => {
    db = createTestDb()
    repo = new SecretsRepository(db)
  })

  afterEach(() => {
    db.close()
  })

  describe('create', () => {
    it('creates a secret with the default provider', () => {
      const secret = repo.create({ name: 'ALPHA_KEY', encryptedValue: 'ciphertext' })

      expect(secret.id).toBeTruthy()
      expect(secret.name).toBe('ALPHA_KEY')
      expect(secret.provider).toBe('aes-256-gcm')
      expect(secret.createdAt).toBe(secret.updatedAt)
      expect(repo.getByName('ALPHA_KEY')).toEqual(secret)
    })

    it('keeps an explicit provider', () => {
      repo.create({ name: 'ALPHA_KEY', encryptedValue: 'ciphertext', provider: 'plain' })
      expect(repo.getByName('ALPHA_KEY')?.provider).toBe('plain')
    })

    it('enforces unique names', () => {
      repo.create({ name: 'ALPHA_KEY', encryptedValue: 'one' })
      expect(() => repo.create({ name: 'ALPHA_KEY', encryptedValue: 'two' })).toThrow()
    })
  })

  describe('getByName', () => {
    it('returns undefined for an unknown name', () => {
      expect(repo.getByName('MISSING')).toBeUndefined()
    })
  })

  describe('list', () => {
    it('lists names without values, sorted by name', () => {
      repo.create({ name: 'B_KEY', encryptedValue: 'b' })
      repo.create({ name: 'A_KEY', encryptedValue: 'a' })

      const list = repo.list()
      expect(list.map((s) => s.name)).toEqual(['A_KEY', 'B_KEY'])
      expect(list[0]).not.toHaveProperty('encryptedValue')
    })
  })

  describe('update', () => {
    it('replaces the encrypted value', () => {
      const created = repo.create({ name: 'ALPHA_KEY', encryptedValue: 'old' })
      const updated = repo.update('ALPHA_KEY', { encryptedValue: 'new' })

      expect(updated?.id).toBe(created.id)
      expect(repo.getByName('ALPHA_KEY')?.encryptedValue).toBe('new')
    })

    it('returns undefined for an unknown name', () => {
      expect(repo.update('MISSING', { encryptedValue: 'x' })).toBeUndefined()
    })
  })

  describe('delete', () => {
    it('deletes by name', () => {
      repo.create({ name: 'ALPHA_KEY', encryptedValue: 'x' })
      expect(repo.delete('ALPHA_KEY')).toBe(true)
      expect(repo.getByName('ALPHA_KEY')).toBeUndefined()
    })

    it('returns false when nothing was deleted', () => {
      expect(repo.delete('MISSING')).toBe(false)
    })
  })
})
