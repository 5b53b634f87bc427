export interface Command {
  /** First token, lowercased. */
  readonly verb: string;
  readonly args: readonly string[];
}

// A token is either a double-quoted run (quotes dropped) or a run of non-space characters
const TOKEN_PATTERN = /"([^"]*)"|(\S+)/g;

export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  for (const match of line.matchAll(TOKEN_PATTERN)) {
    const token = (match[1] ?? match[2] ?? '').trim();
    if (token) {
      tokens.push(token);
    }
  }
  return tokens;
}

/** Returns null for a line with no tokens. */
export function parseCommand(line: string): Command | null {
  const [verb, ...args] = tokenize(line);
  if (verb === undefined) {
    return null;
  }
  return Object.freeze({ verb: verb.toLowerCase(), args: Object.freeze(args) });
}
