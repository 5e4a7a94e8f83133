/**
 * DealRelay — Pipeline Orchestrator
 *
 * Single consumer of the work queue and the only writer of pipeline state.
 * For each message:
 * 1. already in the ledger → skip
 * 2. evaluate against the rule set
 * 3. rejected → ledger entry, cursor advance
 * 4. accepted → publish → ledger entry, cursor advance
 *
 * A failed publish leaves no ledger entry and holds the source cursor below
 * the failed message until it is decided, so it is replayed from the
 * cursor after a reconnect or restart. Messages after it are still decided
 * and recorded; only the pending one is replayed.
 */

import type { CanonicalMessage, DedupEntry, RuleSet, ScoreResult } from '../types';
import { identityOf } from '../types';
import type { CursorStore, DedupLedger } from '../state';
import type { MessagePublisher } from '../delivery/publisher';
import { evaluate } from '../scoring';
import { PublishError, describeError, isFatal } from '../lib/errors';
import { logger } from '../lib/logger';
import { contentFingerprint } from './fingerprint';

const log = logger.child({ component: 'orchestrator' });

export const DUPLICATE_CONTENT_REASON = 'duplicate_content';

export type Decision =
  | { kind: 'skipped'; existing: DedupEntry }
  | { kind: 'rejected'; score: ScoreResult; reason: string }
  | { kind: 'published'; score: ScoreResult; targetMessageId: string; dryRun: boolean }
  | { kind: 'pending'; score: ScoreResult; error: unknown };

export interface RunSummary {
  received: number;
  skipped: number;
  rejected: number;
  published: number;
  pending: number;
}

export interface OrchestratorOptions {
  cursors: CursorStore;
  ledger: DedupLedger;
  publisher: MessagePublisher;
  rules: RuleSet;
  dryRun: boolean;
  dedupByContent?: boolean;
  now?: () => Date;
}

function rejectionReason(score: ScoreResult, rules: RuleSet): string {
  if (score.excludeHit !== undefined) return `exclude_keyword:${score.excludeHit}`;
  return `below_min_score:${score.score}<${rules.minScore}`;
}

export class Orchestrator {
  private readonly cursors: CursorStore;
  private readonly ledger: DedupLedger;
  private readonly publisher: MessagePublisher;
  private readonly rules: RuleSet;
  private readonly dryRun: boolean;
  private readonly dedupByContent: boolean;
  private readonly now: () => Date;

  /** Undecided message ids per source, after a failed publish */
  private readonly pendingIds = new Map<string, Set<number>>();
  /** Highest decided message id per source seen in this run */
  private readonly highestDecided = new Map<string, number>();

  private readonly counters: Omit<RunSummary, 'pending'> = {
    received: 0,
    skipped: 0,
    rejected: 0,
    published: 0,
  };

  constructor(options: OrchestratorOptions) {
    this.cursors = options.cursors;
    this.ledger = options.ledger;
    this.publisher = options.publisher;
    this.rules = options.rules;
    this.dryRun = options.dryRun;
    this.dedupByContent = options.dedupByContent ?? false;
    this.now = options.now ?? (() => new Date());
  }

  summary(): RunSummary {
    return { ...this.counters, pending: this.pending().length };
  }

  /**
   * Messages that failed to publish and are still undecided.
   */
  pending(): Array<{ sourceChatId: string; messageId: number }> {
    const result: Array<{ sourceChatId: string; messageId: number }> = [];
    for (const [sourceChatId, ids] of this.pendingIds) {
      for (const messageId of [...ids].sort((a, b) => a - b)) {
        result.push({ sourceChatId, messageId });
      }
    }
    return result;
  }

  /**
   * Decide one message. Rejects only with state store errors.
   */
  async handle(message: CanonicalMessage): Promise<Decision> {
    this.counters.received++;
    const identity = identityOf(message);
    const context = { source: message.sourceChatId, messageId: message.messageId };

    const existing = await this.ledger.get(identity);
    if (existing) {
      this.counters.skipped++;
      this.resolvePending(identity.sourceChatId, identity.messageId);
      await this.advanceCursor(identity.sourceChatId, identity.messageId);
      log.debug('Already decided, skipping', { ...context, outcome: existing.outcome });
      return { kind: 'skipped', existing };
    }

    const score = evaluate(message, this.rules);
    const fingerprint = contentFingerprint(message.text);

    let reason: string | null = score.accepted ? null : rejectionReason(score, this.rules);
    let duplicateOf: DedupEntry | null = null;
    if (reason === null && this.dedupByContent && fingerprint) {
      duplicateOf = await this.ledger.findPublishedByFingerprint(fingerprint);
      if (duplicateOf) reason = DUPLICATE_CONTENT_REASON;
    }

    if (reason !== null) {
      await this.record({
        ...identity,
        outcome: 'rejected',
        decidedAt: this.now().toISOString(),
        reason,
        fingerprint,
      });
      this.resolvePending(identity.sourceChatId, identity.messageId);
      await this.advanceCursor(identity.sourceChatId, identity.messageId);
      this.counters.rejected++;
      log.info('Rejected', {
        ...context,
        score: score.score,
        reasons: score.reasons,
        reason,
        ...(duplicateOf && {
          duplicateOf: `${duplicateOf.sourceChatId}:${duplicateOf.messageId}`,
        }),
      });
      return { kind: 'rejected', score, reason };
    }

    let targetMessageId: string;
    try {
      const outcome = await this.publisher.publish(message, { dryRun: this.dryRun, score });
      targetMessageId = outcome.targetMessageId;
    } catch (error) {
      if (isFatal(error)) throw error;
      this.hold(identity.sourceChatId, identity.messageId);
      log.error('Publish failed, message left pending', {
        ...context,
        score: score.score,
        reasons: score.reasons,
        transient: error instanceof PublishError ? error.transient : undefined,
        error: describeError(error),
      });
      return { kind: 'pending', score, error };
    }

    await this.record({
      ...identity,
      outcome: 'published',
      publishedTargetMessageId: targetMessageId,
      decidedAt: this.now().toISOString(),
      reason: this.dryRun ? 'dry_run' : undefined,
      fingerprint,
    });
    this.resolvePending(identity.sourceChatId, identity.messageId);
    await this.advanceCursor(identity.sourceChatId, identity.messageId);
    this.counters.published++;
    log.info(this.dryRun ? '[DRY_RUN] Published' : 'Published', {
      ...context,
      score: score.score,
      reasons: score.reasons,
      targetMessageId,
    });
    return { kind: 'published', score, targetMessageId, dryRun: this.dryRun };
  }

  /**
   * Keep a message undecided so the cursor stays below it.
   * Used for failures outside the publisher as well.
   */
  hold(sourceChatId: string, messageId: number): void {
    const ids = this.pendingIds.get(sourceChatId) ?? new Set<number>();
    ids.add(messageId);
    this.pendingIds.set(sourceChatId, ids);
  }

  private resolvePending(sourceChatId: string, messageId: number): void {
    const ids = this.pendingIds.get(sourceChatId);
    if (!ids?.delete(messageId)) return;
    if (ids.size === 0) this.pendingIds.delete(sourceChatId);
  }

  private async record(entry: DedupEntry): Promise<void> {
    const written = await this.ledger.record(entry);
    if (!written) {
      log.warn('Ledger already had an entry', {
        source: entry.sourceChatId,
        messageId: entry.messageId,
      });
    }
  }

  private async advanceCursor(sourceChatId: string, messageId: number): Promise<void> {
    const highest = Math.max(this.highestDecided.get(sourceChatId) ?? messageId, messageId);
    this.highestDecided.set(sourceChatId, highest);

    let target = highest;
    const pendingIds = this.pendingIds.get(sourceChatId);
    if (pendingIds && pendingIds.size > 0) {
      target = Math.min(target, Math.min(...pendingIds) - 1);
    }

    // advance() is monotonic, so a capped target below the stored cursor is a no-op
    await this.cursors.advance(sourceChatId, target);
  }
}
