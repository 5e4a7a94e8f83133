/**
 * DealRelay — Pipeline Runner
 *
 * One listener task per source, all feeding one FIFO work queue that the
 * orchestrator drains one message at a time. Runs until the signal aborts
 * or a state store fails.
 *
 * A message left pending makes its source resync from the cursor after
 * `pendingRetryDelayMs`, which replays and retries it in the same run.
 *
 * On abort the listeners stop, the message being decided finishes, and
 * anything still queued is left for the next run to replay from the cursor.
 */

import type { CanonicalMessage, RuleSet } from '../types';
import type { PlatformClient } from '../platform/types';
import type { StateStores } from '../state';
import type { MessagePublisher } from '../delivery/publisher';
import { SourceListener, type ReconnectPolicy } from '../sources/listener';
import { AsyncQueue } from '../lib/async-queue';
import { describeError, isFatal } from '../lib/errors';
import { logger, timeOperation } from '../lib/logger';
import { Orchestrator, type RunSummary } from './orchestrator';

export { Orchestrator, DUPLICATE_CONTENT_REASON } from './orchestrator';
export type { Decision, OrchestratorOptions, RunSummary } from './orchestrator';
export { contentFingerprint, normalizeForFingerprint } from './fingerprint';

const log = logger.child({ component: 'pipeline' });

const DEFAULT_PENDING_RETRY_DELAY_MS = 60_000;

export interface PipelineOptions {
  sources: string[];
  platform: PlatformClient;
  stores: StateStores;
  publisher: MessagePublisher;
  rules: RuleSet;
  dryRun: boolean;
  dedupByContent?: boolean;
  reconnect?: Partial<ReconnectPolicy>;
  /** Wait before replaying a source with a pending message */
  pendingRetryDelayMs?: number;
  signal: AbortSignal;
}

async function pump(listener: SourceListener, queue: AsyncQueue<CanonicalMessage>): Promise<void> {
  for await (const message of listener) {
    if (!queue.push(message)) break;
  }
}

/**
 * Run until shutdown. Resolves with the run counters; rejects with a
 * StateStoreError when state can no longer be trusted.
 */
export async function runPipeline(options: PipelineOptions): Promise<RunSummary> {
  const queue = new AsyncQueue<CanonicalMessage>();
  const orchestrator = new Orchestrator({
    cursors: options.stores.cursors,
    ledger: options.stores.ledger,
    publisher: options.publisher,
    rules: options.rules,
    dryRun: options.dryRun,
    dedupByContent: options.dedupByContent,
  });

  // Listeners stop on external shutdown and on a fatal consumer error
  const stop = new AbortController();
  const onAbort = () => stop.abort();
  if (options.signal.aborted) stop.abort();
  options.signal.addEventListener('abort', onAbort, { once: true });

  const listeners = new Map<string, SourceListener>();
  for (const chatId of options.sources) {
    listeners.set(
      chatId,
      new SourceListener({
        chatId,
        platform: options.platform,
        cursors: options.stores.cursors,
        reconnect: options.reconnect,
        signal: stop.signal,
      })
    );
  }

  // One scheduled resync per source at a time
  const pendingRetryDelayMs = options.pendingRetryDelayMs ?? DEFAULT_PENDING_RETRY_DELAY_MS;
  const resyncTimers = new Map<string, NodeJS.Timeout>();
  const scheduleResync = (chatId: string): void => {
    const listener = listeners.get(chatId);
    if (!listener || resyncTimers.has(chatId)) return;
    log.info('Scheduling replay of pending message', { source: chatId, delayMs: pendingRetryDelayMs });
    resyncTimers.set(
      chatId,
      setTimeout(() => {
        resyncTimers.delete(chatId);
        listener.resync();
      }, pendingRetryDelayMs)
    );
  };

  const pumps = [...listeners.values()].map(listener =>
    pump(listener, queue).catch(error => {
      // Listeners only throw what they cannot recover from
      log.error('Listener failed', { source: listener.chatId, error: describeError(error) });
      queue.fail(error);
    })
  );
  const drained = Promise.all(pumps).then(() => queue.close());

  log.info('Pipeline started', {
    sources: options.sources,
    dryRun: options.dryRun,
    dedupByContent: options.dedupByContent ?? false,
  });

  try {
    await timeOperation(
      'pipeline run',
      async () => {
        for await (const message of queue) {
          if (options.signal.aborted) break;
          try {
            const decision = await orchestrator.handle(message);
            if (decision.kind === 'pending') scheduleResync(message.sourceChatId);
          } catch (error) {
            if (isFatal(error)) throw error;
            orchestrator.hold(message.sourceChatId, message.messageId);
            scheduleResync(message.sourceChatId);
            log.error('Unexpected error, message left pending', {
              source: message.sourceChatId,
              messageId: message.messageId,
              error: describeError(error),
            });
          }
        }
      },
      log
    );
  } finally {
    for (const timer of resyncTimers.values()) clearTimeout(timer);
    resyncTimers.clear();
    options.signal.removeEventListener('abort', onAbort);
    stop.abort();
    queue.close();
    await drained;

    const summary = orchestrator.summary();
    log.info('Pipeline stopped', { ...summary, leftInQueue: queue.size });
    for (const item of orchestrator.pending()) {
      log.warn('Still pending', { source: item.sourceChatId, messageId: item.messageId });
    }
  }

  return orchestrator.summary();
}
