import cron from 'node-cron';
import { DEFAULT_RECONCILE_CRON } from '../../config/env.js';
import { logger } from '../logger/index.js';
import type { PodReconciler } from '../../modules/pods/pod-reconciler.service.js';

export class ReconcileScheduler {
  private task: ReturnType<typeof cron.schedule> | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly reconciler: Pick<PodReconciler, 'runCycle' | 'stop'>) {}

  /**
   * Start reconciling on the given schedule (six fields, seconds first).
   * The first cycle runs immediately; a tick that lands while a cycle is still
   * in flight is skipped.
   */
  start(cronExpression = DEFAULT_RECONCILE_CRON): void {
    if (this.task) {
      logger.warn('Reconcile scheduler is already running');
      return;
    }

    logger.info({ cronExpression }, 'Starting reconcile scheduler');

    this.controller = new AbortController();
    this.task = cron.schedule(cronExpression, () => {
      this.tick();
    });
    this.tick();

    logger.info('Reconcile scheduler started');
  }

  /**
   * Stop the scheduler. Resolves once a cycle that was in flight has settled;
   * its results are discarded.
   */
  async stop(): Promise<void> {
    if (!this.task) {
      return;
    }

    this.controller?.abort();
    this.task.stop();
    this.task = null;
    this.controller = null;
    this.reconciler.stop();

    await this.whenIdle();
    logger.info('Reconcile scheduler stopped');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private tick(): void {
    if (!this.controller) {
      return;
    }
    if (this.inFlight) {
      logger.debug('Previous reconcile cycle still running; skipping tick');
      return;
    }

    this.inFlight = this.reconciler
      .runCycle(this.controller.signal)
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error in reconcile scheduler');
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
