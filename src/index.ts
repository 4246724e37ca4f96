import { loadConfig, validateConfig } from './config.js';
import { logger } from './utils/logger.js';
import { BotError, errorMessage } from './errors.js';
import { loadWallet, logWallet } from './core/wallet.js';
import { ChainRegistry } from './core/chain-registry.js';
import { SnipeBot } from './core/snipe-bot.js';
import { Store } from './data/database.js';
import { RedisCache, ioredisClient, jsonCodec, type RedisLike } from './data/cache.js';
import { createNotificationService } from './telegram/notifications.js';
import { isRiskAnalysis } from './analysis/risk-analyzer.js';
import { isAIDecision } from './ai/ai-coordinator.js';
import type { AIDecision, TokenRiskAnalysis } from './types.js';

process.on('uncaughtException', (err) => {
  logger.error(`[process] Uncaught exception: ${err.message}`, { stack: err.stack });
  setTimeout(() => process.exit(1), 1000);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`[process] Unhandled rejection: ${errorMessage(reason)}`, {
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

async function main(): Promise<void> {
  logger.info('Mempool snipe bot starting');

  const config = loadConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const e of errors) logger.error(`[config] ${e}`);
    throw new BotError('ConfigInvalid', `${errors.length} configuration error(s)`);
  }

  const wallet = loadWallet(config.wallet.privateKey);
  logWallet(wallet);
  const adapter = new ChainRegistry(config.chains).createAdapter(config.activeChainId, wallet);

  const store = new Store({ path: config.bot.dbPath });

  // One client per cache: each closes its own connection
  const redis = (): RedisLike | null => (config.redis.enabled ? ioredisClient(config.redis.url) : null);
  const riskCache = new RedisCache<TokenRiskAnalysis>(redis(), jsonCodec(isRiskAnalysis), `risk:${adapter.chain.id}`);
  const aiCache = new RedisCache<AIDecision>(redis(), jsonCodec(isAIDecision), `ai:${adapter.chain.id}`);
  await Promise.all([riskCache.init(), aiCache.init()]);

  const notifications = createNotificationService(config, adapter.chain.symbol);
  const bot = new SnipeBot({ config, adapter, riskCache, aiCache, store, notifications });
  await bot.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      logger.warn(`[process] ${signal} again, exiting immediately`);
      process.exit(1);
    }
    stopping = true;
    logger.info(`[process] ${signal} received, shutting down`);
    try {
      await bot.stop();
      await Promise.all([riskCache.close(), aiCache.close()]);
      store.close();
    } catch (err) {
      logger.error(`[process] Shutdown failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
    process.exit();
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error(`[process] Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
