/**
 * @module: Main
 * @risk: critical
 * @scope: core
 *
 * @description
 * Entry point: reads configuration, builds the bot and connects it to Discord.
 */

import { Bot } from './bot/index.js';
import { config } from './utils/env.js';
import { logger } from './utils/logger.js';

const bot = new Bot({
  token: config.token,
  clientId: config.clientId,
  debugGuildId: config.debugGuildId,
  ...config.commands
});

logger.info(`Starting bot in ${config.env} mode...`);
bot.start().catch((error: unknown) => {
  logger.error('Failed to initialize bot:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});
