import { setTimeout as sleep } from 'timers/promises';
import { ApplicationError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import type { GenerationSummary } from '../manifest/manifestGenerationService.js';

export interface ManifestGenerator {
  generate(): Promise<GenerationSummary>;
}

export type Sleeper = (ms: number) => Promise<unknown>;

/**
 * Manifest Scheduler
 *
 * Runs a generation pass, then, when an interval is set, waits and runs
 * another one, indefinitely. Each pass is a fresh scan.
 *
 * Without an interval a failed pass propagates to the caller. With one,
 * the failure is logged and the next pass runs on schedule, unless the
 * error is marked as not retryable; that ends the loop and propagates.
 */
export class ManifestScheduler {
  private stopped = false;
  private passes = 0;

  constructor(
    private readonly generator: ManifestGenerator,
    private readonly intervalSeconds: number,
    private readonly logger: Logger,
    private readonly wait: Sleeper = sleep
  ) {}

  async run(): Promise<void> {
    if (!this.intervalSeconds) {
      this.passes++;
      await this.generator.generate();
      this.logger.info('Done!');
      return;
    }

    while (!this.stopped) {
      this.passes++;

      try {
        await this.generator.generate();
      } catch (error) {
        if (error instanceof ApplicationError && !error.retryable) {
          this.logger.error('Scene list generation cannot succeed on a later pass, stopping', {
            pass: this.passes,
            code: error.code,
          });
          throw error;
        }
        this.logger.error(
          'Scene list generation failed, retrying on next interval',
          createErrorLogContext(error, { pass: this.passes })
        );
      }

      if (this.stopped) {
        break;
      }

      this.logger.info(`Sleeping for ${this.intervalSeconds} seconds ...`);
      await this.wait(this.intervalSeconds * 1000);
    }

    this.logger.info('ManifestScheduler stopped', { passes: this.passes });
  }

  /**
   * End the loop once the current pass or sleep finishes. Called before
   * run(), the loop makes no pass at all. A single run is not affected.
   */
  stop(): void {
    this.stopped = true;
  }

  getStatus(): { passes: number; intervalSeconds: number; stopped: boolean } {
    return {
      passes: this.passes,
      intervalSeconds: this.intervalSeconds,
      stopped: this.stopped,
    };
  }
}
