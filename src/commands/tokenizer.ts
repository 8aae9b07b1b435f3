/**
 * Tokenizer
 * Splits an input line into a command name and its argument tokens
 */

export interface CommandInvocation {
  command: string;
  args: string[];
}

// ASCII whitespace only; other Unicode spaces are ordinary token characters
const WHITESPACE_RUN = /[ \t\n\v\f\r]+/;
const EDGE_WHITESPACE = /^[ \t\n\v\f\r]+|[ \t\n\v\f\r]+$/g;

/**
 * Tokenizes a raw line. A token is a maximal run of non-whitespace characters;
 * there is no quoting or escaping. Blank input yields an empty command and no args.
 *
 * @example
 * tokenize('  foo   bar  baz ') // { command: 'foo', args: ['bar', 'baz'] }
 */
export function tokenize(line: string): CommandInvocation {
  const trimmed = line.replace(EDGE_WHITESPACE, '');
  if (trimmed === '') {
    return { command: '', args: [] };
  }

  const [command, ...args] = trimmed.split(WHITESPACE_RUN);
  return { command, args };
}
