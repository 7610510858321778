import { getAddress, isAddress } from 'ethers'
import { ValidationError } from './errors'

const HEX_RE = /^(0x)?[0-9a-fA-F]{40}$/

/** Hex-shaped and, when mixed-case, carrying a valid EIP-55 checksum. */
export function isValidAddress(value: string): boolean {
  const v = value.trim()
  return HEX_RE.test(v) && isAddress(v.startsWith('0x') ? v : `0x${v}`)
}

/**
 * Canonical (checksummed) form. Case is discarded before checksumming, so every
 * case variant of one account maps to the same string.
 */
export function canonicalizeAddress(value: string): string {
  const v = value.trim()
  if (!HEX_RE.test(v)) throw new ValidationError(`Invalid address: ${value}`)
  return getAddress((v.startsWith('0x') ? v : `0x${v}`).toLowerCase())
}

export const shortAddress = (a: string): string => a.length < 10 ? a : `${a.slice(0, 6)}...${a.slice(-4)}`

export const toTopicAddress = (a: string): string => `0x${a.toLowerCase().replace(/^0x/, '').padStart(64, '0')}`
