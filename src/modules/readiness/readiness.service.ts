import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { initConfig } from '../../config/init.config';
import { pollUntil, PollTimeoutError } from '../../lib/async/poll-until';
import { DatabaseUnavailableError } from '../../lib/errors/DatabaseUnavailableError';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { MongodbService } from '../mongodb/mongodb.service';

/** Only "no server reachable yet" is worth waiting out. */
export function isRetriableReadinessError(err: unknown): boolean {
  return err instanceof MongoActionError && err.isServerSelectionFailure();
}

/**
 * Blocks until MongoDB answers a ping.
 * Server selection failures are retried every DB_RETRY_INTERVAL_MS; anything
 * else (bad credentials, ...) fails fast. DB_MAX_WAIT_MS=0 waits forever.
 */
@Injectable()
export class ReadinessService {
  private readonly logger = new Logger(ReadinessService.name);

  public constructor(
    @Inject(initConfig.KEY)
    private readonly cfg: ConfigType<typeof initConfig>,
    private readonly mongo: MongodbService,
  ) {}

  /** Resolves with the number of attempts it took. */
  public async waitForDatabase(): Promise<number> {
    const { host, port, retryIntervalMs, maxWaitMs } = this.cfg;
    this.logger.log('Waiting for MongoDB to become available...');

    try {
      const { attempts } = await pollUntil({
        attempt: () => this.mongo.ping(),
        intervalMs: retryIntervalMs,
        timeoutMs: maxWaitMs,
        isRetriable: isRetriableReadinessError,
        onRetry: (err, attemptNo, delayMs) => {
          const reason =
            err instanceof MongoActionError ? err.summary() : String(err);
          this.logger.debug(`Attempt ${attemptNo} failed: ${reason}`);
          this.logger.log(
            `Database is not available yet, retrying in ${formatSeconds(delayMs)} seconds...`,
          );
        },
      });
      this.logger.log('MongoDB is up and running!');
      return attempts;
    } catch (err) {
      if (err instanceof PollTimeoutError) {
        throw new DatabaseUnavailableError(
          `${host}:${port}`,
          err.attempts,
          err.timeoutMs,
          err.lastError,
        );
      }
      throw err;
    }
  }
}

function formatSeconds(ms: number): string {
  const s = ms / 1000;
  return Number.isInteger(s) ? String(s) : s.toFixed(1);
}
