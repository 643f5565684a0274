/**
 * Stackseed - Credential helpers
 *
 * Decoding of the combined values initializers receive through the
 * environment: `principal/secret` pairs and comma-separated unit lists.
 */

import { CredentialUnavailableError, InvalidCredentialError, MissingVariableError } from './errors.js'
import { DEFAULT_SENTINEL } from './derive.js'

export interface CredentialPair {
  principal: string
  secret: string
}

/**
 * Split at the first delimiter; the secret may itself contain the delimiter
 *
 * @throws InvalidCredentialError when the delimiter is absent
 */
export function parseCredentialPair(value: string, delimiter: string = '/', variable: string = 'credential'): CredentialPair {
  const index = value.indexOf(delimiter)
  if (index === -1) {
    throw new InvalidCredentialError(variable, delimiter)
  }
  return {
    principal: value.slice(0, index),
    secret: value.slice(index + delimiter.length)
  }
}

/**
 * "a, b,,c " -> ["a", "b", "c"]
 */
export function parseUnitList(value: string | undefined): string[] {
  if (!value) {
    return []
  }
  return value.split(',').map(unit => unit.trim()).filter(Boolean)
}

/**
 * Read a credential from an environment map at the point of use
 *
 * @throws MissingVariableError when unset or empty
 * @throws CredentialUnavailableError when it still holds the sentinel
 */
export function requireCredential(
  env: Readonly<Record<string, string | undefined>>,
  key: string,
  sentinel: string = DEFAULT_SENTINEL
): string {
  const value = env[key]
  if (value === undefined || value === '') {
    throw new MissingVariableError([key], 'credential')
  }
  if (value === sentinel) {
    throw new CredentialUnavailableError(key)
  }
  return value
}
