// ---------------------------------------------------------------------------
// Secrets Bridge — model credentials from the environment or an encrypted store
// ---------------------------------------------------------------------------

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto'
import { createLogger, type Logger } from '../logger'
import type { SecretsRepository } from '../db/repositories/secrets.repository'
import { errorMessage } from './errors'
import type { CredentialProvider } from './model-interface'

const ALGORITHM = 'aes-256-gcm'
const SALT_BYTES = 16
const IV_BYTES = 12
const TAG_BYTES = 16
const KEY_BYTES = 32

export interface SecretsBridgeOptions {
  /** Encrypted store; without it only the environment is consulted. */
  store?: SecretsRepository
  /** Passphrase the store key is derived from. Required to read or write the store. */
  masterKey?: string
  env?: NodeJS.ProcessEnv
}

export class SecretsBridge implements CredentialProvider {
  private store: SecretsRepository | undefined
  private masterKey: string | undefined
  private env: NodeJS.ProcessEnv
  private keys = new Map<string, Buffer>()
  private log: Logger

  constructor(options: SecretsBridgeOptions = {}) {
    this.store = options.store
    this.masterKey = options.masterKey
    this.env = options.env ?? process.env
    this.log = createLogger('secrets-bridge')
  }

  /** Live environment first, then the encrypted store. Null when neither has it. */
  async resolve(name: string): Promise<string | null> {
    const fromEnv = this.env[name]
    if (fromEnv !== undefined && fromEnv.length > 0) return fromEnv
    return this.getSecret(name)
  }

  isEncryptionAvailable(): boolean {
    return this.store !== undefined && this.masterKey !== undefined && this.masterKey.length > 0
  }

  // ---------------------------------------------------------------------------
  // Encrypted store
  // ---------------------------------------------------------------------------

  setSecret(name: string, value: string): void {
    const store = this.requireStore()
    const encrypted = this.encrypt(value)

    if (store.getByName(name)) {
      store.update(name, { encryptedValue: encrypted })
    } else {
      store.create({ name, encryptedValue: encrypted, provider: ALGORITHM })
    }
  }

  /**
   * Retrieve and decrypt a stored secret.
   * Returns null if not stored, the store is not configured, or decryption fails.
   */
  getSecret(name: string): string | null {
    if (!this.store || !this.isEncryptionAvailable()) return null

    const secret = this.store.getByName(name)
    if (!secret) return null

    try {
      return this.decrypt(secret.encryptedValue)
    } catch (err) {
      this.log.warn({ name, err: errorMessage(err) }, 'failed to decrypt stored secret')
      return null
    }
  }

  hasSecret(name: string): boolean {
    return this.store?.getByName(name) !== undefined
  }

  removeSecret(name: string): boolean {
    return this.store?.delete(name) ?? false
  }

  /** Names (never values) of every stored secret. */
  listSecrets(): string[] {
    return this.store?.list().map((s) => s.name) ?? []
  }

  // ---------------------------------------------------------------------------
  // Crypto
  // ---------------------------------------------------------------------------

  /** base64(salt | iv | tag | ciphertext) */
  private encrypt(plaintext: string): string {
    const salt = randomBytes(SALT_BYTES)
    const iv = randomBytes(IV_BYTES)
    const cipher = createCipheriv(ALGORITHM, this.deriveKey(salt), iv)
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
    return Buffer.concat([salt, iv, cipher.getAuthTag(), ciphertext]).toString('base64')
  }

  private decrypt(payload: string): string {
    const raw = Buffer.from(payload, 'base64')
    if (raw.length < SALT_BYTES + IV_BYTES + TAG_BYTES) {
      throw new Error('Encrypted payload is too short')
    }
    const salt = raw.subarray(0, SALT_BYTES)
    const iv = raw.subarray(SALT_BYTES, SALT_BYTES + IV_BYTES)
    const tag = raw.subarray(SALT_BYTES + IV_BYTES, SALT_BYTES + IV_BYTES + TAG_BYTES)
    const ciphertext = raw.subarray(SALT_BYTES + IV_BYTES + TAG_BYTES)

    const decipher = createDecipheriv(ALGORITHM, this.deriveKey(salt), iv)
    decipher.setAuthTag(tag)
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8')
  }

  private deriveKey(salt: Buffer): Buffer {
    const cacheKey = salt.toString('hex')
    const cached = this.keys.get(cacheKey)
    if (cached) return cached
    const key = scryptSync(this.masterKey ?? '', salt, KEY_BYTES)
    this.keys.set(cacheKey, key)
    return key
  }

  private requireStore(): SecretsRepository {
    if (!this.store || !this.isEncryptionAvailable()) {
      throw new Error('Secret store is not configured (missing database or master key)')
    }
    return this.store
  }
}
