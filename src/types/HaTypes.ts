export interface DevicePayload {
  name: string;
  identifiers: string[];
  manufacturer: string;
  model: string;
}

export interface ConfigPayload {
  name: string;
  unique_id: string;
  state_topic: string;
  json_attributes_topic: string;
  value_template: string;
  device: DevicePayload;
}

export const ControllerDevice: DevicePayload = {
  name: 'Ksenia Lares',
  identifiers: ['ksenia_lares'],
  manufacturer: 'Ksenia',
  model: 'Lares 4.0',
};
