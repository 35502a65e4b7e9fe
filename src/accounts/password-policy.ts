import commonPasswords from './data/common-passwords.json' with { type: 'json' }

export const MIN_PASSWORD_LENGTH = 8

export type PasswordProblem =
  | 'too_short'
  | 'entirely_numeric'
  | 'too_common'
  | 'too_similar'

const COMMON_PASSWORDS = new Set(
  commonPasswords.map((word) => word.toLowerCase()),
)

// Ratio of the longest shared run of characters to the password length
const MAX_SIMILARITY = 0.7

const longestCommonSubstring = (a: string, b: string): number => {
  let longest = 0
  const previous = new Array<number>(b.length + 1).fill(0)

  for (let i = 1; i <= a.length; i++) {
    let diagonal = 0
    for (let j = 1; j <= b.length; j++) {
      const above = previous[j]
      previous[j] = a[i - 1] === b[j - 1] ? diagonal + 1 : 0
      longest = Math.max(longest, previous[j])
      diagonal = above
    }
  }

  return longest
}

const isTooSimilar = (password: string, attribute: string): boolean => {
  const candidate = password.toLowerCase()
  const value = attribute.toLowerCase()
  if (value.length < 3) {
    return false
  }
  if (candidate.includes(value) || value.includes(candidate)) {
    return true
  }
  return longestCommonSubstring(candidate, value) / candidate.length >= MAX_SIMILARITY
}

/**
 * Returns every rule the password breaks; an empty list means it is acceptable.
 * `attributes` are the username and email of the account being created.
 */
export const checkPasswordStrength = (
  password: string,
  attributes: { username: string; email: string },
): PasswordProblem[] => {
  const problems: PasswordProblem[] = []

  if (password.length < MIN_PASSWORD_LENGTH) {
    problems.push('too_short')
  }
  if (/^\d+$/.test(password)) {
    problems.push('entirely_numeric')
  }
  if (COMMON_PASSWORDS.has(password.toLowerCase())) {
    problems.push('too_common')
  }

  const emailLocalPart = attributes.email.split('@')[0] ?? ''
  if (
    isTooSimilar(password, attributes.username) ||
    isTooSimilar(password, emailLocalPart)
  ) {
    problems.push('too_similar')
  }

  return problems
}
