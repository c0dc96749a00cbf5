import Winston from 'winston';
import {buildCatalog} from './catalog';
import {Options} from './config';
import {MqttPublisher} from './homeassistant';
import {createLogger} from './logger';
import {SensorPoller} from './poller';
import {SensorEntity} from './sensorEntity';
import {SessionClient} from './session';

export type Bridge = {
  entities: SensorEntity[];
  poller: SensorPoller;
  stop(): Promise<void>;
};

/**
 * Registers entities Home Assistant has not seen yet and publishes every
 * entity whose state changed. Anything that could not be sent is retried on
 * the next call.
 */
export function publishEntities(
  logger: Winston.Logger,
  publisher: MqttPublisher,
  entities: SensorEntity[],
  registered: Set<string>
): void {
  let updatedSensorsConfig = 0;
  let updatedSensors = 0;

  for (const entity of entities) {
    if (!registered.has(entity.uniqueId)) {
      if (!publisher.publishConfig(entity)) {
        continue;
      }
      logger.info(`Configured sensor: ${entity.uniqueId}`);
      registered.add(entity.uniqueId);
      updatedSensorsConfig++;
    }

    if (entity.dirty && publisher.publishState(entity)) {
      entity.dirty = false;
      updatedSensors++;
    }
  }

  if (updatedSensorsConfig > 0) {
    logger.info(`Configured ${updatedSensorsConfig} sensors`);
  }
  if (updatedSensors > 0) {
    logger.info(`Updated ${updatedSensors} sensors`);
  }
}

export async function startBridge(
  session: SessionClient,
  options: Options,
  logger: Winston.Logger = createLogger(options.log_level)
): Promise<Bridge> {
  const publisher = new MqttPublisher(
    logger,
    options.mqtt_url,
    options.discovery_prefix
  );
  const entities = await buildCatalog(session, logger);
  const registered = new Set<string>();

  const poller = new SensorPoller(logger, entities, options.poll_interval, () =>
    publishEntities(logger, publisher, entities, registered)
  );

  // Every entity is refreshed once before it is added.
  await poller.pollOnce();
  poller.start();

  return {
    entities,
    poller,
    stop: async () => {
      poller.stop();
      await publisher.end();
    },
  };
}
