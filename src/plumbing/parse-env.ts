/**
 * Safely parse a string to a number. Returns fallback for empty, invalid, or non-finite values.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value) {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    return fallback
  }

  return parsed
}

/**
 * Accepts true/false, 1/0, yes/no (any case). Anything else yields the fallback.
 */
export const parseBoolean = (
  value: string | undefined,
  fallback: boolean,
): boolean => {
  const normalized = value?.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false
  }
  return fallback
}
