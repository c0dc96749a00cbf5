import Winston from 'winston';
import {SensorEntity} from './sensorEntity';
import {SessionClient, fetchCategory} from './session';
import {CatalogOrder} from './types/Constants';
import {SensorRecordSchema} from './types/SensorRecord';

/**
 * Creates one entity per record of every category. A category that cannot
 * be fetched is logged and contributes nothing.
 */
export async function buildCatalog(
  session: SessionClient,
  logger: Winston.Logger
): Promise<SensorEntity[]> {
  const entities: SensorEntity[] = [];

  for (const category of CatalogOrder) {
    let snapshot: unknown[];
    try {
      snapshot = await fetchCategory(session, category);
    } catch (error) {
      logger.error('Skipping sensor category:', {
        category,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    logger.debug(`Received ${category} data`, {data: snapshot});

    for (const item of snapshot) {
      const parsed = SensorRecordSchema.safeParse(item);
      if (!parsed.success) {
        logger.warn(`Skipping ${category} record without an ID`, {
          data: item,
        });
        continue;
      }
      entities.push(new SensorEntity(session, parsed.data, category, logger));
    }
  }

  logger.info(`Found ${entities.length} sensors`);
  return entities;
}
