import fs from 'fs';
import * as dotenv from 'dotenv';
import {z} from 'zod';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

export const OptionsSchema = z.object({
  mqtt_url: z
    .string({required_error: 'No mqtt provided'})
    .min(1, 'No mqtt provided'),
  poll_interval: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(10)
  ),
  log_level: z.preprocess(
    emptyAsUndefined,
    z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info')
  ),
  discovery_prefix: z.preprocess(
    emptyAsUndefined,
    z.string().default('homeassistant')
  ),
});

export type Options = z.infer<typeof OptionsSchema>;

/**
 * Reads the add-on options file when it exists, otherwise the environment
 * (after loading a .env file, if any).
 */
export function loadOptions(
  path = '/data/options.json',
  env: NodeJS.ProcessEnv = process.env
): Options {
  let rawOptions: unknown;
  if (fs.existsSync(path)) {
    rawOptions = JSON.parse(fs.readFileSync(path, 'utf8'));
  } else {
    dotenv.config();
    rawOptions = {
      mqtt_url: env.MQTT_URL,
      poll_interval: env.POLL_INTERVAL,
      log_level: env.LOG_LEVEL,
      discovery_prefix: env.DISCOVERY_PREFIX,
    };
  }

  const result = OptionsSchema.safeParse(rawOptions);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid options: ${issues}`);
  }
  return result.data;
}
