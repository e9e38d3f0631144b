/**
 * Periodic anchoring of closed periods.
 */

import { MerkleAnchor, createLogger, errorMeta } from 'carbon-ledger-core';

const logger = createLogger('anchor-scheduler');

export interface PendingAnchorSource {
  anchorPendingPeriods(partition?: string): Promise<MerkleAnchor[]>;
}

export interface AnchorSchedulerConfig {
  intervalMs: number;
  onError?: (error: unknown) => void;
  onAnchored?: (anchors: MerkleAnchor[]) => void;
}

export class AnchorScheduler {
  private source: PendingAnchorSource;
  private config: AnchorSchedulerConfig;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<MerkleAnchor[]> | null = null;

  constructor(source: PendingAnchorSource, config: AnchorSchedulerConfig) {
    if (!Number.isFinite(config.intervalMs) || config.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be positive, got ${config.intervalMs}`);
    }
    this.source = source;
    this.config = config;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.tick().catch(error => {
        logger.error('scheduled anchoring failed', errorMeta(error));
        this.config.onError?.(error);
      });
    }, this.config.intervalMs);
    logger.info('anchor scheduler started', { interval_ms: this.config.intervalMs });
  }

  /**
   * Stop the timer and wait for a run in progress.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('anchor scheduler stopped');
    }
    if (this.running) {
      await this.running.then(
        () => undefined,
        // already reported by the interval handler
        () => undefined
      );
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One anchoring pass. Overlapping calls share the pass in progress.
   */
  async tick(): Promise<MerkleAnchor[]> {
    if (this.running) return this.running;

    this.running = this.source.anchorPendingPeriods();
    try {
      const anchors = await this.running;
      if (anchors.length > 0) {
        this.config.onAnchored?.(anchors);
      }
      return anchors;
    } finally {
      this.running = null;
    }
  }
}
