/**
 * Tender Watch — Send All Script
 *
 * Dry delivery: sends an alert for every active tender in scope, whether
 * or not it was announced before, and leaves the seen-store untouched.
 * Useful to check channel setup against real data.
 *
 * Usage:
 *   npm run send-all -- --city Chakwal
 *   npm run send-all -- --snapshot data/listing.json --email alerts@example.com
 */

import 'dotenv/config';
import { logger, attachRunLog, detachRunLog, printLines } from '../src/lib/logger';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { createCollector } from '../src/collector';
import { Notifier, createChannelBindings } from '../src/delivery';
import { EXIT_FAILED, renderSummary, runDryDelivery } from '../src/pipeline';
import { parseArgs, printBanner, watchInterrupts } from './cli-common';

const USAGE = `Usage: npm run send-all -- [--city <name>] [--whatsapp <number>] [--email <address>]
                           [--snapshot <file>]`;

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(process.env, options.overrides);
  const logPath = attachRunLog(config.logDir, 'send_all');
  const interrupts = watchInterrupts();

  try {
    const bindings = createChannelBindings(config);

    printBanner('SEND ALL TENDERS (DRY DELIVERY)', [
      ['Scope', config.scope ?? 'all'],
      ['Source', options.snapshot ?? config.listing.url ?? 'not configured'],
      ['Channels', bindings.map(binding => `${binding.channel.name} → ${binding.destination ?? '?'}`).join(', ')],
      ['Run log', logPath],
    ]);

    const result = await runDryDelivery(
      {
        collector: createCollector(config, options.snapshot),
        notifier: new Notifier(config.dispatch),
        bindings,
      },
      {
        scope: config.scope,
        collectTimeoutMs: config.collectTimeoutMs,
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
    logger.error('Dry delivery failed to start', { error: errorMsg });
    console.error('\nDry delivery failed:', errorMsg);
    process.exit(EXIT_FAILED);
  });
