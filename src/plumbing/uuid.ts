const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

/**
 * Lower-case hyphenated form only, which is what randomUUID() produces.
 */
export const isUuid = (value: string): boolean => UUID_PATTERN.test(value)
