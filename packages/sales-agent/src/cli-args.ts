// Argument parsing for the sales CLI

import type { SearchScope } from '../types/embeddings.js';

export const COMMANDS = [
  'setup',
  'query',
  'chat',
  'customer',
  'territory',
  'recommend',
  'pitch',
  'insights',
  'top-customers',
  'top-products',
  'territories',
  'stats',
  'health',
  'clear',
  'help',
] as const;

export type Command = (typeof COMMANDS)[number];

const SCOPES: readonly SearchScope[] = ['all', 'customer', 'product', 'territory'];

export interface ParsedArgs {
  command: Command;
  /** Positional words joined with single spaces */
  text: string;
  scope: SearchScope;
  focus: string;
  limit: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function isScope(value: string): value is SearchScope {
  return SCOPES.some((s) => s === value);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === '--help' || first === '-h') {
    return { command: 'help', text: '', scope: 'all', focus: '', limit: 10 };
  }
  if (!isCommand(first)) throw new UsageError(`Unknown command: ${first}`);

  let scope: SearchScope = 'all';
  let focus = '';
  let limit = 10;
  const words: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const value = rest[i + 1];
    if (arg === '--scope') {
      if (value === undefined || !isScope(value)) {
        throw new UsageError(`--scope must be one of: ${SCOPES.join(', ')}`);
      }
      scope = value;
      i++;
    } else if (arg === '--focus') {
      if (value === undefined) throw new UsageError('--focus needs a value');
      focus = value;
      i++;
    } else if (arg === '--limit') {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) throw new UsageError('--limit must be a positive integer');
      limit = n;
      i++;
    } else {
      words.push(arg);
    }
  }

  return { command: first, text: words.join(' ').trim(), scope, focus, limit };
}
