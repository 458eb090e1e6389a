/**
 * Argument handling for scripts/analyze.ts
 */

import type { DataSourceType } from '@/core/env';
import { validateSymbol } from './inputValidation';

export const USAGE =
  'Usage: tsx scripts/analyze.ts [--json] [--provider=finnhub|fixture] SYMBOL...';

export const EXIT_OK = 0;
export const EXIT_DATA_UNAVAILABLE = 1;
export const EXIT_USAGE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface AnalyzeCliArgs {
  json: boolean;
  provider?: DataSourceType;
  symbols: string[];
}

export function parseAnalyzeArgs(argv: readonly string[]): AnalyzeCliArgs {
  const args: AnalyzeCliArgs = { json: false, symbols: [] };
  for (const arg of argv) {
    if (arg === '--json') {
      args.json = true;
    } else if (arg.startsWith('--provider=')) {
      const value = arg.slice('--provider='.length);
      if (value !== 'finnhub' && value !== 'fixture') {
        throw new UsageError(`Unknown provider "${value}"`);
      }
      args.provider = value;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown flag ${arg}`);
    } else {
      const check = validateSymbol(arg);
      if (!check.valid) {
        throw new UsageError(`${arg}: ${check.error}`);
      }
      args.symbols.push(arg);
    }
  }

  if (args.symbols.length === 0) {
    throw new UsageError('No symbols given');
  }
  return args;
}

export function exitCodeFor(errors: readonly string[]): number {
  return errors.length > 0 ? EXIT_DATA_UNAVAILABLE : EXIT_OK;
}
