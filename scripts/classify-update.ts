/**
 * Runs a saved Telegram update through a demo router and logs which route took it.
 * Run with: npx tsx scripts/classify-update.ts scripts/fixtures/start-command.json
 */
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import type TelegramBot from 'node-telegram-bot-api';
import { loadConfig } from '../src/config/index.js';
import { logger } from '../src/utils/logger.js';
import { UpdateRouter } from '../src/core/router/UpdateRouter.js';
import { and, not, regex, withPrefix, withSuffix, extractUpdateText } from '../src/core/filters/index.js';

async function main(): Promise<void> {
  const path = process.argv[2];
  if (!path) {
    logger.error('Usage: classify-update <update.json>');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const update: TelegramBot.Update = JSON.parse(await readFile(path, 'utf8'));

  const router = UpdateRouter.fromConfig(config)
    .command('start', () => logger.info('start command'))
    .command('help', () => logger.info('help command'))
    .on(regex(/^vote:(up|down)$/), (u) => logger.info({ vote: extractUpdateText(u) }, 'vote callback'))
    .on(and(withSuffix('?'), not(withPrefix(config.commandPrefix))), () => logger.info('question'))
    .fallback((_u, payload) => logger.info({ kind: payload.kind }, 'unrouted update'));

  const result = await router.dispatch(update);
  logger.info({ result }, 'Dispatch finished');
}

main().catch((error) => {
  logger.error({ error }, 'classify-update failed');
  process.exitCode = 1;
});
