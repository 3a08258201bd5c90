#!/usr/bin/env node
// index.ts
import { parseArgs } from 'node:util';
import chalk from 'chalk';
import { env } from './config/env.js';
import { loadSettings, type GameSettings } from './config/settings.js';
import { runTable } from './cli/app.js';
import { TableRenderer } from './cli/renderer.js';
import { createReadlinePrompter, TerminalInput } from './cli/terminal.js';
import { Session } from './game/state/Session.js';
import { RoundLogWriter } from './game/transport/RoundLogWriter.js';
import { SessionMetrics } from './monitoring/metrics.js';
import { SettingsError } from './utils/errors/index.js';
import logger from './utils/logger.js';

const { values: args } = parseArgs({
  options: {
    settings: { type: 'string' },
    autoplay: { type: 'boolean', default: false },
    rounds: { type: 'string' },
  },
});

function applyArgs(settings: GameSettings): GameSettings {
  if (args.rounds === undefined) return settings;
  const rounds = Number(args.rounds);
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new SettingsError(`--rounds must be a positive integer, got '${args.rounds}'`, '--rounds');
  }
  return { ...settings, maxRounds: rounds };
}

async function main(): Promise<number> {
  const settings = applyArgs(await loadSettings(args.settings ?? env.BLACKJACK_SETTINGS));
  const autoplay = args.autoplay ?? false;

  if (autoplay && settings.bots.length === 0) {
    throw new SettingsError('--autoplay needs at least one bot in the settings', '--autoplay');
  }

  const prompter = createReadlinePrompter();
  const write = (line: string) => prompter.write(line);

  // Graceful shutdown
  const gracefulShutdown = (signal: string) => {
    logger.info(`[SHUTDOWN] Received ${signal}`);
    prompter.close();
    write('\nGoodbye!');
    process.exit(0);
  };
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  try {
    const terminal = new TerminalInput(prompter);
    const humans = autoplay ? [] : await terminal.askNames(settings.bots.map((b) => b.name));
    const session = Session.create(settings, humans, terminal);

    session.subscribe(new TableRenderer({ dealDelayMs: settings.dealDelayMs, showOutput: settings.showOutput, write }));
    const metrics = new SessionMetrics();
    session.subscribe(metrics);
    if (settings.logRounds) {
      const log = await RoundLogWriter.create(settings.logDir);
      session.subscribe(log);
      write(chalk.dim(`Logging rounds to ${log.file}`));
    }

    await runTable(session, prompter, { autoplay });

    if (settings.showMetrics) {
      write(chalk.bold('\n=== Metrics ==='));
      write(await metrics.summary());
    }
    return 0;
  } finally {
    prompter.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof SettingsError) {
      process.stderr.write(`${chalk.red('[CONFIG]')} ${err.message}\n`);
      for (const issue of err.issues) {
        process.stderr.write(`  ${issue.path || '(root)'}: ${issue.message}\n`);
      }
    } else {
      logger.error('[FATAL]', { error: err instanceof Error ? err.message : String(err) });
      process.stderr.write(`${chalk.red('[FATAL]')} ${err instanceof Error ? err.message : String(err)}\n`);
    }
    process.exitCode = 1;
  });
