/**
 * Batch processing example: drains an in-memory backlog a batch per cycle.
 *
 * Parameters:
 * - batch_size: items per cycle (default 10)
 * - processing_delay: seconds spent per item (default 0.1)
 * - total_items: size of the simulated backlog (default 100)
 */

import { BaseWorker, type WorkerContext, type WorkerParams } from 'periodic-worker';

function numberParam(params: Readonly<WorkerParams>, name: string, fallback: number): number {
  const value = params[name];
  return typeof value === 'number' ? value : fallback;
}

export class BatchWorker extends BaseWorker {
  private pending: number[] = [];
  private processed: number[] = [];

  getWorkerId(): string {
    return 'batch_worker';
  }

  setup({ logger, params }: WorkerContext): void {
    const total = numberParam(params, 'total_items', 100);
    this.pending = Array.from({ length: total }, (_, index) => index + 1);

    logger.info('BatchWorker setup complete');
    logger.info(`Batch size: ${numberParam(params, 'batch_size', 10)}`);
    logger.info(`Processing delay: ${numberParam(params, 'processing_delay', 0.1)}s per item`);
    logger.info(`Total items to process: ${this.pending.length}`);
  }

  async doWork({ logger, params }: WorkerContext): Promise<void> {
    if (this.pending.length === 0) {
      logger.info('No more items to process');
      this.requestShutdown();
      return;
    }

    const batch = this.pending.splice(0, numberParam(params, 'batch_size', 10));
    logger.info(`Processing batch of ${batch.length} items`);

    await this.calcOne('process_batch', () => this.processBatch(batch, params, logger));
    await this.calcOne('update_stats', () => {
      const total = this.processed.length + this.pending.length;
      const completion = total > 0 ? (this.processed.length / total) * 100 : 100;
      logger.info(`Progress: ${this.processed.length}/${total} (${completion.toFixed(1)}%)`);
    });

    logger.info(`Batch completed. Remaining items: ${this.pending.length}`);
  }

  cleanup({ logger }: WorkerContext): void {
    logger.info(`BatchWorker cleanup - processed ${this.processed.length} items total`);
  }

  private async processBatch(
    batch: number[],
    params: Readonly<WorkerParams>,
    logger: WorkerContext['logger']
  ): Promise<void> {
    const delayMs = numberParam(params, 'processing_delay', 0.1) * 1000;
    for (const item of batch) {
      logger.debug(`Processing item ${item}`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      // Simulated 5% failure rate
      if (Math.random() < 0.05) {
        logger.warn(`Failed to process item ${item}`);
        continue;
      }
      this.processed.push(item);
    }
  }
}

export default BatchWorker;
