import { ParsedCommand } from './types';

interface Token {
  text: string;
  start: number;
  end: number;
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let current = '';
  let start = -1;
  let quote: "'" | '"' | null = null;
  let escape = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (start === -1 && !/\s/.test(char)) {
      start = i;
    }

    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\') {
      escape = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
    } else if (/\s/.test(char)) {
      if (start !== -1) {
        tokens.push({ text: current, start, end: i });
        current = '';
        start = -1;
      }
    } else {
      current += char;
    }
  }

  if (start !== -1) {
    tokens.push({ text: current, start, end: input.length });
  }

  return tokens;
}

/** Strips any directory prefix, so `/usr/bin/ls` reads as `ls`. */
export function normalizeBin(bin: string): string {
  if (!bin) return '';
  return bin.split('/').pop() ?? bin;
}

export function parseCommand(input: string): ParsedCommand {
  const tokens = tokenize(input);

  // Leading env assignments: key must be a valid identifier
  let cmdIndex = 0;
  while (cmdIndex < tokens.length && /^[a-zA-Z_][a-zA-Z0-9_]*=/.test(tokens[cmdIndex].text)) {
    cmdIndex++;
  }

  if (cmdIndex >= tokens.length) {
    // e.g. "" or "A=1"
    return { bin: '', args: [], raw: input, head: '' };
  }

  const binToken = tokens[cmdIndex];
  const bin = binToken.text;

  return {
    bin,
    args: tokens.slice(cmdIndex + 1).map((t) => t.text),
    raw: input,
    head: normalizeBin(bin) + input.slice(binToken.end).trimEnd(),
  };
}
