/**
 * Long-term fundamentals analysis for one or more symbols
 *
 * Usage: npx tsx scripts/analyze.ts [--json] [--provider=finnhub|fixture] RELIANCE TCS INFY.BO
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { getEnvConfig } from '../src/core/env';
import {
  EXIT_USAGE,
  USAGE,
  UsageError,
  exitCodeFor,
  parseAnalyzeArgs,
  type AnalyzeCliArgs,
} from '../src/lib/cliArgs';
import { normalizeSymbol } from '../src/lib/inputValidation';
import { formatReport, toReportPayload } from '../src/lib/reportFormatter';
import { createDataSource } from '../src/providers/registry';
import { analyzeSymbols } from '../src/scoring/analyzer';
import { createChildLogger } from '../src/utils/logger';
import { RequestThrottler } from '../src/utils/throttler';

const logger = createChildLogger('analyze_cli');

async function main(): Promise<number> {
  let args: AnalyzeCliArgs;
  try {
    args = parseAnalyzeArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  const config = getEnvConfig();
  const symbols = args.symbols.map((s) => normalizeSymbol(s, config.defaultExchangeSuffix));
  const source = createDataSource(args.provider, config);

  const { reports, errors } = await analyzeSymbols(symbols, source, {
    throttler: new RequestThrottler(config.throttleMs),
    maxConcurrency: config.maxConcurrency,
  });

  if (args.json) {
    console.log(JSON.stringify({ reports: reports.map(toReportPayload), errors }, null, 2));
  } else {
    for (const report of reports) {
      console.log(formatReport(report));
      console.log('');
    }
    for (const error of errors) {
      console.error(`Data unavailable - ${error}`);
    }
  }

  return exitCodeFor(errors);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Analysis failed');
    process.exitCode = 1;
  });
