/**
 * A minimal worker: every cycle it "processes" a handful of articles and
 * reports progress.
 *
 * Compiled inside a project that depends on periodic-worker:
 *   npx periodic-worker run --worker-type ./basic-worker.js#BasicWorker \
 *     --wait-seconds 10 --max-cycles 3 --worker-params '{"batch_size": 5}'
 */

import { BaseWorker, type WorkerContext } from 'periodic-worker';

export class BasicWorker extends BaseWorker {
  private processed = 0;

  getWorkerId(): string {
    return 'basic_worker';
  }

  setup({ logger, params }: WorkerContext): void {
    logger.info('BasicWorker ready', { params });
  }

  async doWork({ logger, params }: WorkerContext): Promise<void> {
    const batchSize = typeof params.batch_size === 'number' ? params.batch_size : 3;

    await this.trackOperation('process_articles', async () => {
      for (let index = 0; index < batchSize; index++) {
        await new Promise((resolve) => setTimeout(resolve, 50));
        this.processed += 1;
      }
    });

    logger.info(`Processed ${batchSize} articles (${this.processed} total)`);
    logger.info(this.getStatusString());
  }

  cleanup({ logger }: WorkerContext): void {
    logger.info(`BasicWorker processed ${this.processed} articles`);
  }
}

export default BasicWorker;
