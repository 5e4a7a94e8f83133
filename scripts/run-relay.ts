/**
 * DealRelay — Relay Runner
 *
 * Long-running process: listens to the configured source channels and
 * republishes interesting deals to the destination channel.
 *
 * Usage:
 *   npm start
 *   npm run dry-run
 *   npx tsx scripts/run-relay.ts --dry-run --ephemeral
 *
 * Exit codes: 0 on clean shutdown (SIGINT/SIGTERM), 1 on configuration,
 * session or state failures.
 */

import 'dotenv/config';
import { loadSettings } from '../src/config/settings';
import type { Settings } from '../src/config/settings';
import { openStateStores } from '../src/state';
import type { StateStores } from '../src/state';
import { TelegramUserClient } from '../src/platform/telegram';
import { GramJsGateway } from '../src/platform/mtproto';
import { Publisher } from '../src/delivery/publisher';
import { createAnthropicRewriter } from '../src/delivery/rewriter';
import { runPipeline } from '../src/pipeline';
import { ConfigError, describeError } from '../src/lib/errors';
import { logger } from '../src/lib/logger';

interface RunOptions {
  dryRun: boolean;
  /** Keep state in memory only; nothing is written to disk */
  ephemeral: boolean;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  const options: RunOptions = {
    dryRun: false,
    ephemeral: false,
  };

  for (const arg of args) {
    if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--ephemeral') {
      options.ephemeral = true;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`, ['supported: --dry-run, --ephemeral']);
    }
  }

  return options;
}

function logStartup(settings: Settings): void {
  logger.info('DealRelay starting', {
    sources: settings.sources,
    sourcesFrom: settings.sourcesFrom,
    destination: settings.destination,
    rulesFrom: settings.rulesFrom,
    minScore: settings.rules.minScore,
    include: Object.keys(settings.rules.include).length,
    exclude: settings.rules.exclude.length,
    dryRun: settings.dryRun,
    dedupByContent: settings.dedupByContent,
    stateBackend: settings.state.backend,
    rewrite: settings.rewrite.enabled,
  });
}

async function main(): Promise<number> {
  let settings: Settings;
  let stores: StateStores;

  try {
    const options = parseArgs();
    settings = loadSettings(process.env, { dryRun: options.dryRun });
    if (options.ephemeral) settings.state = { backend: 'memory' };
    logStartup(settings);
    stores = await openStateStores(settings.state);
  } catch (error) {
    logger.error('Startup failed', { error: describeError(error) });
    return 1;
  }

  const platform = new TelegramUserClient(
    new GramJsGateway({
      apiId: settings.telegram.apiId,
      apiHash: settings.telegram.apiHash,
      session: settings.telegram.session,
      connectionRetries: settings.telegram.connectionRetries,
    })
  );
  try {
    await platform.connect();
  } catch (error) {
    logger.error('Telegram connection failed', { error: describeError(error) });
    await platform.close();
    await stores.close();
    return 1;
  }

  const shutdown = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (shutdown.signal.aborted) return;
    logger.info('Shutdown requested', { signal });
    shutdown.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const publisher = new Publisher({
    platform,
    destination: settings.destination,
    retry: settings.publishRetry,
    signal: shutdown.signal,
    rewriter: settings.rewrite.enabled
      ? createAnthropicRewriter({ apiKey: settings.rewrite.apiKey, model: settings.rewrite.model })
      : undefined,
  });

  let exitCode = 0;
  try {
    await runPipeline({
      sources: settings.sources,
      platform,
      stores,
      publisher,
      rules: settings.rules,
      dryRun: settings.dryRun,
      dedupByContent: settings.dedupByContent,
      reconnect: settings.reconnect,
      pendingRetryDelayMs: settings.pendingRetryDelayMs,
      signal: shutdown.signal,
    });
  } catch (error) {
    logger.error('Relay stopped on fatal error', { error: describeError(error) });
    exitCode = 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await platform.close();
    await stores.close();
  }

  logger.info('DealRelay stopped', { exitCode });
  return exitCode;
}

main().then(
  code => process.exit(code),
  error => {
    logger.error('Relay crashed', { error: describeError(error) });
    process.exit(1);
  }
);
