/**
 * Reveal timing per token, in milliseconds.
 *
 * | Token                               | Delay |
 * |-------------------------------------|-------|
 * | whitespace only                     | 10    |
 * | only `.` `!` `?`                    | 80    |
 * | only `,` `;` `:`                    | 40    |
 * | contains a backtick                 | 60    |
 * | contains one of `{}()[]<>"`         | 50    |
 * | trimmed length > 8                  | 35    |
 * | trimmed length > 5                  | 25    |
 * | anything else                       | 20    |
 */
export const TOKEN_DELAYS = {
  whitespace: 10,
  terminal: 80,
  clause: 40,
  code: 60,
  bracket: 50,
  long: 35,
  medium: 25,
  short: 20,
} as const;

/**
 * Computes the delay before revealing `token`. The previously revealed token
 * is passed for custom strategies; the default ignores it.
 */
export type DelayStrategy = (token: string, previous: string | undefined) => number;

export function getTokenDelay(token: string): number {
  if (/^\s*$/.test(token)) return TOKEN_DELAYS.whitespace;
  if (/^[.!?]+$/.test(token)) return TOKEN_DELAYS.terminal;
  if (/^[,;:]+$/.test(token)) return TOKEN_DELAYS.clause;
  if (token.includes("`")) return TOKEN_DELAYS.code;
  if (/[{}()[\]<>"]/.test(token)) return TOKEN_DELAYS.bracket;

  const length = token.trim().length;
  if (length > 8) return TOKEN_DELAYS.long;
  if (length > 5) return TOKEN_DELAYS.medium;
  return TOKEN_DELAYS.short;
}

export const defaultDelayStrategy: DelayStrategy = (token) => getTokenDelay(token);
