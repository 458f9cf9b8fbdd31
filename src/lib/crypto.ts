/**
 * Encryption for GitHub Actions secrets
 *
 * GitHub only accepts secret values sealed (libsodium sealed box) with the
 * target repository's Curve25519 public key. Each repository has its own key,
 * so the value is sealed once per (repository, secret) pair.
 */

import sodium from './sodium.js'
import type { Logger, Repository } from '../types.js'
import type { FleetApi, RepositoryPublicKey, SealedSecret } from '../github/client.js'
import { EncryptionError, isRateLimitError } from './errors.js'

/**
 * Seal a value with a base64 public key
 *
 * @returns base64 ciphertext (standard alphabet, padded), as the secrets API expects
 */
export async function sealSecret(value: string, publicKeyBase64: string): Promise<string> {
  await sodium.ready

  let key: Uint8Array
  try {
    key = sodium.from_base64(publicKeyBase64, sodium.base64_variants.ORIGINAL)
  } catch (error) {
    throw new Error('public key is not valid base64', { cause: error })
  }

  if (key.length !== sodium.crypto_box_PUBLICKEYBYTES) {
    throw new Error(`public key must be ${sodium.crypto_box_PUBLICKEYBYTES} bytes, got ${key.length}`)
  }

  const sealed = sodium.crypto_box_seal(sodium.from_string(value), key)
  return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL)
}

/**
 * Encryption Adapter
 *
 * Public keys are fetched at most once per repository for the lifetime of the
 * adapter (one run). Concurrent requests for the same repository share the
 * in-flight fetch; a failed fetch is forgotten so a later pair can try again.
 */
export class EncryptionAdapter {
  private readonly keys = new Map<string, Promise<RepositoryPublicKey>>()
  private readonly api: Pick<FleetApi, 'getPublicKey'>
  private readonly logger?: Logger

  constructor(api: Pick<FleetApi, 'getPublicKey'>, logger?: Logger) {
    this.api = api
    this.logger = logger
  }

  /**
   * Seal a plaintext value for one repository.
   * Throws EncryptionError, or RateLimitError when the key fetch was throttled.
   */
  async encrypt(repository: Repository, plaintext: string): Promise<SealedSecret> {
    const publicKey = await this.publicKey(repository)

    try {
      const encryptedValue = await sealSecret(plaintext, publicKey.key)
      return { encryptedValue, keyId: publicKey.keyId }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new EncryptionError(
        `Invalid public key material for ${repository.fullName}: ${reason}`,
        repository.fullName,
        error
      )
    }
  }

  /** Number of repositories with a cached (or in-flight) key */
  get cachedKeys(): number {
    return this.keys.size
  }

  private async publicKey(repository: Repository): Promise<RepositoryPublicKey> {
    const cacheKey = repository.fullName
    let pending = this.keys.get(cacheKey)

    if (!pending) {
      this.logger?.debug(`Fetching public key for ${cacheKey}`)
      pending = (async () => {
        try {
          return await this.api.getPublicKey(repository)
        } catch (error) {
          this.keys.delete(cacheKey)
          throw error
        }
      })()
      this.keys.set(cacheKey, pending)
    }

    try {
      return await pending
    } catch (error) {
      if (isRateLimitError(error)) {
        throw error
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new EncryptionError(
        `Could not fetch public key for ${cacheKey}: ${reason}`,
        cacheKey,
        error
      )
    }
  }
}
