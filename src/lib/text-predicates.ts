/**
 * Token predicates used by the filter stages.
 */

export function startsWith(keyword: string): (token: string) => boolean {
  return (token) => token.startsWith(keyword);
}

/**
 * Length is counted in code points, like {@link isPalindrome} compares them.
 */
export function maxLength(max: number): (token: string) => boolean {
  return (token) => Array.from(token).length <= max;
}

/**
 * Case-sensitive: the token read forward equals the token read backward.
 * The empty string is trivially a palindrome.
 */
export function isPalindrome(token: string): boolean {
  const chars = Array.from(token);
  for (let i = 0, j = chars.length - 1; i < j; i++, j--) {
    if (chars[i] !== chars[j]) {
      return false;
    }
  }
  return true;
}
