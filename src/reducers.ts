import Winston from 'winston';
import {
  Fields,
  isFields,
  readFloat,
  readList,
  readMeterValue,
  readObject,
  readToken,
} from './fields';
import {KnownCategory, isKnownCategory} from './types/Constants';
import {Reduction, SensorRecord} from './types/SensorRecord';

type Reducer = (record: SensorRecord, logger: Winston.Logger) => Reduction;

const reduceSystem: Reducer = (record, logger) => {
  const temp = readObject(record, 'TEMP') ?? {};
  const tempIn = readFloat(logger, temp, 'IN', {
    stripPlus: true,
    label: 'TEMP.IN',
  });
  const tempOut = readFloat(logger, temp, 'OUT', {
    stripPlus: true,
    label: 'TEMP.OUT',
  });

  return {
    state: readToken(record, 'ARM'),
    attributes: {temp_in: tempIn, temp_out: tempOut},
  };
};

const reducePowerLine: Reducer = (record, logger) => {
  const consumption = readMeterValue(logger, record, 'PCONS');
  const production = readMeterValue(logger, record, 'PPROD');
  const status = readToken(record, 'STATUS');

  return {
    state: consumption ?? status,
    attributes: {
      Consumo: consumption,
      Produzione: production,
      Status: status,
    },
  };
};

const reduceDomus: Reducer = (record, logger) => {
  const temperature = readFloat(logger, record, 'T', {stripPlus: true});
  const humidity = readFloat(logger, record, 'H');

  return {
    state: temperature ?? readToken(record, 'STA'),
    attributes: {...record, temperature, humidity},
  };
};

// ENC readings of the most recent STAT entry, added up.
function totalConsumption(record: Fields, logger: Winston.Logger): number {
  const stats = readList(record, 'STAT');
  const latest = stats[stats.length - 1];
  if (!isFields(latest)) {
    return 0;
  }

  let total = 0;
  for (const entry of readList(latest, 'VAL')) {
    if (isFields(entry)) {
      total += readFloat(logger, entry, 'ENC') ?? 0;
    }
  }
  // Readings large enough to overflow are not a consumption.
  return Number.isFinite(total) ? total : 0;
}

const reducePartition: Reducer = (record, logger) => {
  const total = totalConsumption(record, logger);

  return {
    state: total > 0 ? total : readToken(record, 'STA'),
    attributes: {...record, total_consumption: total},
  };
};

const reducePassthrough: Reducer = record => ({
  state: readToken(record, 'STA'),
  attributes: {...record},
});

const Reducers: Record<KnownCategory, Reducer> = {
  system: reduceSystem,
  powerlines: reducePowerLine,
  domus: reduceDomus,
  partitions: reducePartition,
  zones: reducePassthrough,
};

export function reduceRecord(
  category: string,
  record: SensorRecord,
  logger: Winston.Logger
): Reduction {
  const reducer = isKnownCategory(category)
    ? Reducers[category]
    : reducePassthrough;
  // Attributes keep nested STAT/VAL data, which must not stay shared with
  // the session client's snapshot.
  return reducer(structuredClone(record), logger);
}
