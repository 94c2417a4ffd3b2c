/**
 * Tender Watch — Shared CLI Helpers
 *
 * Argument parsing, banners and interrupt handling for the run scripts.
 */

import { logger, printLines } from '../src/lib/logger';
import type { ConfigOverrides } from '../src/lib/config';
import { EXIT_CANCELLED } from '../src/pipeline';

// ============================================================
// ARGUMENTS
// ============================================================

export interface CliOptions {
  overrides: ConfigOverrides;
  snapshot?: string;
  help: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { overrides: {}, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if ((arg === '--city' || arg === '--scope') && value) {
      options.overrides.scope = value;
      i++;
    } else if (arg === '--whatsapp' && value) {
      options.overrides.pushTo = value;
      i++;
    } else if (arg === '--email' && value) {
      options.overrides.emailTo = value;
      i++;
    } else if (arg === '--store' && value) {
      options.overrides.storePath = value;
      i++;
    } else if (arg === '--snapshot' && value) {
      options.snapshot = value;
      i++;
    } else {
      logger.warn('Ignoring unknown argument', { arg });
    }
  }

  return options;
}

// ============================================================
// OUTPUT
// ============================================================

export function bannerLines(title: string, details: Array<[string, string]>): string[] {
  return [
    '='.repeat(60),
    title,
    '='.repeat(60),
    ...details.map(([label, value]) => `${label}: ${value}`),
    '='.repeat(60),
  ];
}

export function printBanner(title: string, details: Array<[string, string]>): void {
  printLines(['', ...bannerLines(title, details), '']);
}

// ============================================================
// INTERRUPTS
// ============================================================

export interface InterruptHandle {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * First SIGINT/SIGTERM cancels the run at its next suspension point;
 * a second one exits immediately.
 */
export function watchInterrupts(): InterruptHandle {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CANCELLED);
    }
    logger.warn('Interrupt received, cancelling run', { signal: name });
    controller.abort(new Error(`Received ${name}`));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}
