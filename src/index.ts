export {buildCatalog} from './catalog';
export {loadOptions, OptionsSchema} from './config';
export type {Options} from './config';
export {CategoryFetchError, FieldParseError} from './errors';
export {MqttPublisher} from './homeassistant';
export {createLogger} from './logger';
export {SensorPoller} from './poller';
export type {PollResult} from './poller';
export {reduceRecord} from './reducers';
export {SensorEntity} from './sensorEntity';
export {fetchCategory} from './session';
export type {SessionClient} from './session';
export {publishEntities, startBridge} from './bridge';
export type {Bridge} from './bridge';
export {SensorRecordSchema} from './types/SensorRecord';
export type {
  Reduction,
  SensorAttributes,
  SensorRecord,
  SensorState,
} from './types/SensorRecord';
