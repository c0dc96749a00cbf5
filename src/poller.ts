import Winston from 'winston';
import {SensorEntity} from './sensorEntity';

export type PollResult = {
  refreshed: number;
  missing: number;
  failed: number;
  skipped: number;
};

/**
 * Refreshes every entity on a fixed interval. An entity whose previous
 * refresh has not settled is skipped for that tick, and a failed refresh
 * only affects its own entity.
 */
export class SensorPoller {
  private logger: Winston.Logger;
  private entities: SensorEntity[];
  private frequency: number;
  private onCycle: (entities: SensorEntity[]) => void;

  private inFlight = new Set<SensorEntity>();
  private pollInterval: NodeJS.Timeout | undefined = undefined;

  constructor(
    logger: Winston.Logger,
    entities: SensorEntity[],
    frequency: number,
    onCycle: (entities: SensorEntity[]) => void
  ) {
    this.logger = logger;
    this.entities = entities;
    this.frequency = frequency;
    this.onCycle = onCycle;
  }

  public start(): void {
    this.stop();
    this.pollInterval = setInterval(() => {
      this.pollOnce().catch(error => {
        this.logger.error('Poll cycle failed:', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.frequency * 1000);
  }

  public stop(): void {
    if (this.pollInterval !== undefined) {
      clearInterval(this.pollInterval);
      this.pollInterval = undefined;
    }
  }

  public isRunning(): boolean {
    return this.pollInterval !== undefined;
  }

  public async pollOnce(): Promise<PollResult> {
    const result: PollResult = {
      refreshed: 0,
      missing: 0,
      failed: 0,
      skipped: 0,
    };

    const targets: SensorEntity[] = [];
    for (const entity of this.entities) {
      if (this.inFlight.has(entity)) {
        this.logger.debug(`Skipping ${entity.uniqueId}, refresh in flight`);
        result.skipped++;
        continue;
      }
      this.inFlight.add(entity);
      targets.push(entity);
    }

    const settled = await Promise.allSettled(
      targets.map(entity =>
        entity.refresh().finally(() => this.inFlight.delete(entity))
      )
    );

    settled.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        result.failed++;
        const reason = outcome.reason;
        this.logger.error(`Failed to refresh ${targets[index].uniqueId}:`, {
          error: reason instanceof Error ? reason.message : String(reason),
        });
      } else if (outcome.value) {
        result.refreshed++;
      } else {
        result.missing++;
      }
    });

    this.onCycle(this.entities);
    return result;
  }
}
