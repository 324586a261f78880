/**
 * Masking helpers for credentials that end up in diagnostics
 */

/**
 * Mask a secret value, showing only a short prefix
 */
export function maskSecret(
  value: string,
  options: { prefixLength?: number; maskChar?: string } = {}
): string {
  const { prefixLength = 4, maskChar = '*' } = options

  if (value.length <= prefixLength * 2) {
    return maskChar.repeat(value.length)
  }

  const maskLength = Math.min(value.length - prefixLength, 8)
  return `${value.slice(0, prefixLength)}${maskChar.repeat(maskLength)}[MASKED]`
}

