import crypto, { timingSafeEqual } from 'node:crypto'
import { nanoid } from 'nanoid'

const KEY_LENGTH = 64

export interface PasswordHash {
  hash: string
  salt: string
}

const deriveKey = (password: string, salt: string): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, KEY_LENGTH, (err, derivedKey) => {
      if (err) {
        reject(err)
        return
      }
      resolve(derivedKey)
    })
  })

/**
 * Hash a password with scrypt and a nanoid-generated salt.
 */
export const hashPassword = async (password: string): Promise<PasswordHash> => {
  const salt = nanoid()
  const derivedKey = await deriveKey(password, salt)
  return { hash: derivedKey.toString('hex'), salt }
}

/**
 * Constant-time comparison of a candidate password against a stored digest.
 */
export const verifyPassword = async (
  password: string,
  hash: string,
  salt: string,
): Promise<boolean> => {
  const derivedKey = await deriveKey(password, salt)
  const hashBuffer = Buffer.from(hash, 'hex')

  if (hashBuffer.length !== derivedKey.length) {
    return false
  }

  return timingSafeEqual(hashBuffer, derivedKey)
}
