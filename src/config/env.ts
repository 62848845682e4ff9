import 'dotenv/config'
import { z } from 'zod'

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(v => v === 'true' || v === '1')

const envSchema = z.object({
  MQTT_BROKER: z.string().default('mqtt://localhost'),
  MQTT_CLIENT_ID: z.string().default('ebus-mqtt-bridge'),
  MQTT_QOS: z
    .enum(['0', '1', '2'])
    .default('0')
    .transform((v): 0 | 1 | 2 => (v === '2' ? 2 : v === '1' ? 1 : 0)),
  MQTT_RETAIN: booleanString,
  MQTT_AVAILABILITY_TOPIC: z.string().default('ebus2mqtt/status'),
  EBUS_HOST: z.string().default('localhost'),
  EBUS_PORT: z.string().default('9999').transform(Number),
  EBUS_ADDRESS: z
    .string()
    .regex(/^[0-9a-fA-F]{2}$/)
    .default('31')
    .transform(v => parseInt(v, 16)),
  EBUS_TIMEOUT_MS: z.string().default('5000').transform(Number),
  PRESENCE_TIMEOUT_MS: z.string().default('2000').transform(Number),
  PROFILES_DIR: z.string().default('profiles'),
  API_PORT: z.string().default('3001').transform(Number),
  LOG_LEVEL: z.enum(['trace', 'debug', 'success', 'info', 'warn', 'error', 'fatal']).default('info'),
  // Sensitive - no defaults, set in .env when the broker needs them
  MQTT_USERNAME: z.string().optional(),
  MQTT_PASSWORD: z.string().optional(),
})

const env = envSchema.parse(process.env)

export const config = {
  mqtt: {
    broker: env.MQTT_BROKER,
    clientId: env.MQTT_CLIENT_ID,
    username: env.MQTT_USERNAME,
    password: env.MQTT_PASSWORD,
    qos: env.MQTT_QOS,
    retain: env.MQTT_RETAIN,
    availabilityTopic: env.MQTT_AVAILABILITY_TOPIC,
  },
  ebus: {
    host: env.EBUS_HOST,
    port: env.EBUS_PORT,
    address: env.EBUS_ADDRESS,
    timeoutMs: env.EBUS_TIMEOUT_MS,
    presenceTimeoutMs: env.PRESENCE_TIMEOUT_MS,
  },
  profiles: {
    directory: env.PROFILES_DIR,
  },
  api: {
    port: env.API_PORT,
  },
  log: {
    level: env.LOG_LEVEL,
  },
}
