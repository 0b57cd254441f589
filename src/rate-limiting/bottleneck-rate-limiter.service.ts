import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type IBottleneckConfig,
  type ILimiterMetrics,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';
import { buildLimiterConfigs } from './rate-limiter-config.factory';
import { RateLimitedWarningEmitter } from '../common/utils/logging/rate-limited-warning-emitter';
import { AppConfigService } from '../config/app-config.service';

const QUEUE_WARN_COOLDOWN_MS = 60_000;

type LimiterEntry = {
  readonly limiter: Bottleneck;
  readonly config: IBottleneckConfig;
  failed: number;
};

@Injectable()
export class BottleneckRateLimiterService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly entries: Map<LimiterKey, LimiterEntry> = new Map<LimiterKey, LimiterEntry>();
  private readonly queueWarnings: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
    QUEUE_WARN_COOLDOWN_MS,
  );

  public constructor(appConfigService: AppConfigService) {
    for (const [key, config] of buildLimiterConfigs(appConfigService)) {
      this.entries.set(key, this.createEntry(key, config));
    }
  }

  public async schedule<T>(
    key: LimiterKey,
    operation: () => Promise<T>,
    priority: RequestPriority = RequestPriority.NORMAL,
  ): Promise<T> {
    const entry: LimiterEntry | undefined = this.entries.get(key);

    if (entry === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    this.warnOnDeepQueue(key, entry);

    return entry.limiter.schedule({ priority }, operation);
  }

  public getMetrics(key: LimiterKey): ILimiterMetrics {
    const entry: LimiterEntry | undefined = this.entries.get(key);

    if (entry === undefined) {
      return { queueSize: 0, running: 0, failed: 0 };
    }

    const counts: Bottleneck.Counts = entry.limiter.counts();

    return {
      queueSize: counts.QUEUED + counts.RECEIVED,
      running: counts.RUNNING + counts.EXECUTING,
      failed: entry.failed,
    };
  }

  public getAllKeys(): readonly LimiterKey[] {
    return [...this.entries.keys()];
  }

  public async onModuleDestroy(): Promise<void> {
    await Promise.allSettled(
      [...this.entries].map(
        async ([key, entry]: [LimiterKey, LimiterEntry]): Promise<void> => {
          try {
            await entry.limiter.stop({ dropWaitingJobs: true });
            this.logger.log(`rate_limiter_stopped key=${key}`);
          } catch (error: unknown) {
            const message: string = error instanceof Error ? error.message : String(error);
            this.logger.error(`rate_limiter_stop_failed key=${key} reason=${message}`);
          }
        },
      ),
    );
  }

  private createEntry(key: LimiterKey, config: IBottleneckConfig): LimiterEntry {
    const limiter: Bottleneck = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
    });
    const entry: LimiterEntry = { limiter, config, failed: 0 };

    limiter.on('failed', (): void => {
      entry.failed += 1;
    });

    limiter.on('error', (error: unknown): void => {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`rate_limiter_error key=${key} reason=${message}`);
    });

    limiter.on('dropped', (): void => {
      this.logger.warn(`rate_limiter_job_dropped key=${key}`);
    });

    return entry;
  }

  private warnOnDeepQueue(key: LimiterKey, entry: LimiterEntry): void {
    const counts: Bottleneck.Counts = entry.limiter.counts();
    const queued: number = counts.QUEUED + counts.RECEIVED;

    if (queued < entry.config.queueWarnThreshold) {
      return;
    }

    if (this.queueWarnings.check(key).emit) {
      this.logger.warn(
        `rate_limiter_queue_deep key=${key} queued=${String(queued)} threshold=${String(entry.config.queueWarnThreshold)}`,
      );
    }
  }
}
