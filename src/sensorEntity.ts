import Winston from 'winston';
import {readText} from './fields';
import {reduceRecord} from './reducers';
import {SessionClient, fetchCategory} from './session';
import {NameFields} from './types/Constants';
import {
  SensorAttributes,
  SensorRecord,
  SensorRecordSchema,
  SensorState,
} from './types/SensorRecord';

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function displayName(record: SensorRecord, category: string): string {
  for (const field of NameFields) {
    const name = readText(record, field);
    if (name !== undefined) {
      return name;
    }
  }
  return `Sensor ${capitalize(category)} ${record.ID}`;
}

/**
 * One controller sensor as seen by Home Assistant. The state is numeric
 * while a reading parses and falls back to the raw status token otherwise,
 * so its type can change between refreshes.
 */
export class SensorEntity {
  public readonly id: string | number;
  public readonly category: string;
  public readonly uniqueId: string;
  public readonly name: string;

  // Set whenever state and attributes are recomputed; cleared by the publisher.
  public dirty = true;

  private session: SessionClient;
  private logger: Winston.Logger;
  private currentState: SensorState;
  private currentAttributes: SensorAttributes;

  constructor(
    session: SessionClient,
    record: SensorRecord,
    category: string,
    logger: Winston.Logger
  ) {
    this.session = session;
    this.logger = logger;
    this.id = record.ID;
    this.category = category;
    this.uniqueId = `${category}_${record.ID}`;
    this.name = displayName(record, category);

    const {state, attributes} = reduceRecord(category, record, logger);
    this.currentState = state;
    this.currentAttributes = attributes;
  }

  public get state(): SensorState {
    return this.currentState;
  }

  public get attributes(): SensorAttributes {
    return this.currentAttributes;
  }

  /**
   * Fetches the category snapshot again and reapplies the reducer to the
   * record with this entity's ID. Resolves false, leaving everything as it
   * was, when the snapshot no longer has that record.
   */
  public async refresh(): Promise<boolean> {
    const snapshot = await fetchCategory(this.session, this.category);

    for (const item of snapshot) {
      const parsed = SensorRecordSchema.safeParse(item);
      if (!parsed.success || parsed.data.ID !== this.id) {
        continue;
      }

      const {state, attributes} = reduceRecord(
        this.category,
        parsed.data,
        this.logger
      );
      this.currentState = state;
      this.currentAttributes = attributes;
      this.dirty = true;
      return true;
    }

    return false;
  }
}
