/**
 * Tender Watch — Monitor Script
 *
 * One monitoring run: collect the active tenders, notify the new ones
 * over WhatsApp and email, then remember them.
 *
 * Usage:
 *   npm run monitor                                  # Scope and destinations from .env
 *   npm run monitor -- --city Chakwal                # Only tenders for one city
 *   npm run monitor -- --whatsapp +15550100 --email alerts@example.com
 *   npm run monitor -- --snapshot data/listing.json  # Replay a saved listing
 *
 * Cron Setup (runs daily at 6 AM):
 *   0 6 * * * cd /path/to/tender-watch && npm run monitor
 *
 * Runs must not overlap: the seen-store has a single writer per run.
 *
 * Exit codes: 0 run completed (even if some notifications failed),
 * 1 pipeline failure, 130 cancelled.
 */

import 'dotenv/config';
import { logger, attachRunLog, detachRunLog, printLines } from '../src/lib/logger';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { createCollector } from '../src/collector';
import { createSeenStore } from '../src/store';
import { Notifier, createChannelBindings } from '../src/delivery';
import { EXIT_FAILED, renderSummary, runMonitor } from '../src/pipeline';
import { parseArgs, printBanner, watchInterrupts } from './cli-common';

const USAGE = `Usage: npm run monitor -- [--city <name>] [--whatsapp <number>] [--email <address>]
                          [--store <path>] [--snapshot <file>]`;

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(process.env, options.overrides);
  const logPath = attachRunLog(config.logDir, 'tender_monitor');
  const interrupts = watchInterrupts();

  try {
    const bindings = createChannelBindings(config);

    printBanner('TENDER MONITOR', [
      ['Scope', config.scope ?? 'all'],
      ['Source', options.snapshot ?? config.listing.url ?? 'not configured'],
      ['Store', config.store.backend === 'file' ? config.store.path : `supabase:${config.store.table}`],
      ['Channels', bindings.map(binding => `${binding.channel.name} → ${binding.destination ?? '?'}`).join(', ')],
      ['Run log', logPath],
    ]);

    const result = await runMonitor(
      {
        collector: createCollector(config, options.snapshot),
        store: createSeenStore(config.store),
        notifier: new Notifier(config.dispatch),
        bindings,
      },
      {
        scope: config.scope,
        collectTimeoutMs: config.collectTimeoutMs,
        storeTimeoutMs: config.storeTimeoutMs,
        signal: interrupts.signal,
      }
    );

    const lines = renderSummary(result.summary);
    printLines(['', ...lines, '']);

    return result.exitCode;
  } finally {
    interrupts.dispose();
    detachRunLog();
  }
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(error => {
    const errorMsg = errorMessage(error);
    logger.error('Monitor run failed to start', { error: errorMsg });
    console.error('\nMonitor run failed:', errorMsg);
    process.exit(EXIT_FAILED);
  });
