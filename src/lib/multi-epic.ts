/**
 * Syncs several independent epics with a bounded worker pool.
 *
 * Each epic runs its own session strictly in plan order; parallelism only
 * exists between epics. All workers go through the orchestrator's retry
 * executor, so they share one rate budget.
 */

import { DocumentStore } from './document-store';
import { errorMessage } from './errors';
import { Logger, silentLogger } from './logger';
import { SyncOptions, SyncOrchestrator } from './sync-orchestrator';
import { EpicDocument, SyncReport } from './types';

export interface EpicJob {
  document: EpicDocument;
  documentStore?: DocumentStore;
}

export type EpicRunResult =
  | { epicKey: string; status: 'fulfilled'; report: SyncReport }
  | { epicKey: string; status: 'rejected'; error: Error };

export class MultiEpicSync {
  private logger: Logger;

  constructor(
    private orchestrator: SyncOrchestrator,
    private concurrency: number = 2,
    logger?: Logger
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.logger = logger ?? silentLogger;
  }

  /**
   * Run every job; results come back in job order whatever order they finish in.
   * A failing epic never stops the others.
   */
  async runAll(jobs: EpicJob[], options: Omit<SyncOptions, 'document' | 'documentStore'> = {}): Promise<EpicRunResult[]> {
    const results = new Array<EpicRunResult>(jobs.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < jobs.length && !options.signal?.aborted) {
        const index = next++;
        const { document, documentStore } = jobs[index];
        this.logger.debug(`Starting ${document.epicKey}`);
        try {
          const report = await this.orchestrator.sync(document, { ...options, document, documentStore });
          results[index] = { epicKey: document.epicKey, status: 'fulfilled', report };
        } catch (error) {
          this.logger.error(`${document.epicKey}: ${errorMessage(error)}`);
          results[index] = {
            epicKey: document.epicKey,
            status: 'rejected',
            error: error instanceof Error ? error : new Error(String(error)),
          };
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, jobs.length) }, () => worker());
    await Promise.all(workers);

    // Jobs never started because of cancellation
    for (let index = 0; index < jobs.length; index++) {
      if (!results[index]) {
        results[index] = {
          epicKey: jobs[index].document.epicKey,
          status: 'rejected',
          error: new Error('Cancelled before start'),
        };
      }
    }

    return results;
  }
}
