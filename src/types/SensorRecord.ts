import {z} from 'zod';

export const SensorRecordSchema = z
  .object({
    ID: z.union([z.string(), z.number()]),
  })
  .passthrough();

export type SensorRecord = z.infer<typeof SensorRecordSchema>;

export type SensorState = number | string;

export type SensorAttributes = Record<string, unknown>;

export type Reduction = {
  state: SensorState;
  attributes: SensorAttributes;
};
