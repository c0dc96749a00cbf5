/**
 * In-process stand-ins for the controller session, the MQTT client and the
 * logger.
 */

import {EventEmitter} from 'events';
import Winston from 'winston';

export type Snapshots = {
  dom?: unknown;
  system?: unknown;
  sensors?: Record<string, unknown>;
};

/**
 * Creates a session client that answers from a mutable snapshot table.
 * Categories without an entry resolve to an empty list.
 */
export function createFakeSession(snapshots: Snapshots = {}) {
  return {
    snapshots,
    getDom: jest.fn(async (): Promise<unknown> => snapshots.dom ?? []),
    getSensor: jest.fn(
      async (category: string): Promise<unknown> =>
        snapshots.sensors?.[category] ?? []
    ),
    getSystem: jest.fn(async (): Promise<unknown> => snapshots.system ?? []),
  };
}

/**
 * A silent winston logger whose level methods are spied on.
 */
export function createTestLogger() {
  const logger = Winston.createLogger({
    level: 'silly',
    silent: true,
    transports: [new Winston.transports.Console()],
  });

  return {
    logger,
    error: jest.spyOn(logger, 'error'),
    warn: jest.spyOn(logger, 'warn'),
    info: jest.spyOn(logger, 'info'),
    debug: jest.spyOn(logger, 'debug'),
  };
}

export class FakeMqttClient extends EventEmitter {
  public publishError: Error | undefined = undefined;

  public publish = jest.fn(
    (
      _topic: string,
      _payload: string,
      _options: unknown,
      callback?: (err?: Error) => void
    ) => {
      callback?.(this.publishError);
      return this;
    }
  );

  public endAsync = jest.fn(async () => undefined);

  public topics(): string[] {
    return this.publish.mock.calls.map(call => call[0]);
  }
}
