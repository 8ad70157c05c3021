/**
 * @fileoverview Command line tokenizer and alias expansion.
 *
 * - `tokenize()`: split a line on whitespace
 * - `expandAliases()`: substitute the leading alias, repeatedly, with cycle
 *   detection
 *
 * There is no quoting, piping, redirection or globbing: a line is a command
 * name followed by positional arguments.
 *
 * @module engine/parser
 */

import { AliasCycleError } from './errors';

/** Substitution limit used when none is configured */
export const DEFAULT_ALIAS_DEPTH = 64;

/**
 * Split a command line into tokens. Runs of whitespace separate tokens;
 * leading and trailing whitespace is ignored.
 *
 * @example
 * tokenize('  cut -f 2   data.txt ')  // ['cut', '-f', '2', 'data.txt']
 * tokenize('')                          // []
 */
export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Expand the alias in command position.
 *
 * When the first token names an alias, it is replaced by the alias value
 * (re-tokenized) and the check is repeated on the new first token.
 *
 * An alias whose value starts with its own name (`alias ls ls -a`) is a
 * wrapper: when that name is also a registered command, expansion stops there
 * and the command runs.
 *
 * @param tokens - Tokens from `tokenize()`
 * @param aliases - Alias table
 * @param maxDepth - Maximum number of substitutions, counting `outer`
 * @param isCommand - Whether a name is a registered command
 * @param outer - Aliases expanded by enclosing lines (`time t` inside `t`)
 * @returns The expanded words and the full chain of expanded alias names
 * @throws AliasCycleError if a name repeats or the depth limit is exceeded
 */
export function expandAliasChain(
  tokens: string[],
  aliases: ReadonlyMap<string, string>,
  maxDepth = DEFAULT_ALIAS_DEPTH,
  isCommand: (name: string) => boolean = () => false,
  outer: readonly string[] = []
): { words: string[]; chain: string[] } {
  let current = tokens;
  const chain = [...outer];
  const seen = new Set(outer);

  while (current.length > 0) {
    const [head, ...rest] = current;
    const value = aliases.get(head);
    if (value === undefined) break;

    if (seen.has(head) || chain.length >= maxDepth) {
      throw new AliasCycleError([...chain, head]);
    }
    seen.add(head);
    chain.push(head);

    const expansion = tokenize(value);
    current = [...expansion, ...rest];

    if (expansion[0] === head) {
      if (isCommand(head)) break;
      throw new AliasCycleError([...chain, head]);
    }
  }

  return { words: current, chain };
}

/**
 * Expand the alias in command position and return only the words.
 *
 * @example
 * const aliases = new Map([['l', 'ls'], ['ll', 'l /docs']]);
 * expandAliases(['ll'], aliases)  // ['ls', '/docs']
 */
export function expandAliases(
  tokens: string[],
  aliases: ReadonlyMap<string, string>,
  maxDepth = DEFAULT_ALIAS_DEPTH,
  isCommand: (name: string) => boolean = () => false
): string[] {
  return expandAliasChain(tokens, aliases, maxDepth, isCommand).words;
}
