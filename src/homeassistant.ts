import mqtt, {MqttClient} from 'mqtt';
import slugify from 'slugify';
import Winston from 'winston';
import {SensorEntity} from './sensorEntity';
import {ConfigPayload, ControllerDevice} from './types/HaTypes';

export class MqttPublisher {
  private logger: Winston.Logger;
  private client: MqttClient;
  private prefix: string;

  private connected = false;

  constructor(logger: Winston.Logger, url: string, prefix = 'homeassistant') {
    this.logger = logger;
    this.prefix = prefix;
    this.client = mqtt.connect(url);
    this.client.on('connect', () => {
      this.logger.info('Connected to MQTT broker');
      this.connected = true;
    });

    this.client.on('offline', () => {
      this.logger.warn('MQTT broker went offline');
      this.connected = false;
    });

    this.client.on('error', err => {
      this.logger.error(`MQTT error: ${err}`);
    });
  }

  public isConnected(): boolean {
    return this.connected;
  }

  public topic(entity: SensorEntity, leaf: string): string {
    const node = slugify(entity.uniqueId, {
      lower: true,
      strict: true,
      replacement: '_',
    });
    return `${this.prefix}/sensor/${node}/${leaf}`;
  }

  public publishConfig(entity: SensorEntity): boolean {
    if (!this.connected) {
      return false;
    }

    const configPayload: ConfigPayload = {
      name: entity.name.trim(),
      unique_id: entity.uniqueId.toLowerCase(),
      state_topic: this.topic(entity, 'state'),
      json_attributes_topic: this.topic(entity, 'attributes'),
      value_template: '{{ value_json.value }}',
      device: ControllerDevice,
    };

    this.send(this.topic(entity, 'config'), JSON.stringify(configPayload), {
      retain: true,
      qos: 1,
    });
    return true;
  }

  public publishState(entity: SensorEntity): boolean {
    if (!this.connected) {
      return false;
    }

    this.send(
      this.topic(entity, 'state'),
      JSON.stringify({value: entity.state}),
      {retain: false}
    );
    this.send(
      this.topic(entity, 'attributes'),
      JSON.stringify(entity.attributes),
      {retain: false}
    );
    return true;
  }

  public async end(): Promise<void> {
    this.connected = false;
    await this.client.endAsync();
  }

  private send(
    topic: string,
    payload: string,
    options: {retain: boolean; qos?: 0 | 1 | 2}
  ): void {
    this.client.publish(topic, payload, options, err => {
      if (err) {
        this.logger.error(`Failed to publish ${topic}: ${err.message}`);
      }
    });
  }
}
