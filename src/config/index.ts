import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const projectRoot = join(__dirname, '../..');

// Load environment variables
dotenv.config({ path: join(projectRoot, '.env') });

// Configuration schema
const configSchema = z.object({
  server: z.object({
    port: z.number().min(1).max(65535),
    nodeEnv: z.enum(['development', 'production', 'test']),
  }),
  mqtt: z.object({
    brokerHost: z.string(),
    brokerPort: z.number(),
    username: z.string().optional(),
    password: z.string().optional(),
    connectTimeout: z.number(),
    reconnectPeriod: z.number(),
    clientIdPrefix: z.string().min(1),
  }),
  api: z.object({
    apiKey: z.string().optional(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
  }),
  devices: z.object({
    file: z.string(),
  }),
  media: z.object({
    publicUrl: z.string().url(),
    dir: z.string(),
    defaultTitle: z.string().min(1),
  }),
});

// Empty strings in .env mean "not set"
const optional = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

// Parse and validate configuration
const config = configSchema.parse({
  server: {
    port: parseInt(process.env.PORT || '3002', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
  },
  mqtt: {
    brokerHost: process.env.MQTT_BROKER_HOST || 'localhost',
    brokerPort: parseInt(process.env.MQTT_BROKER_PORT || '1883', 10),
    username: optional(process.env.MQTT_USERNAME),
    password: optional(process.env.MQTT_PASSWORD),
    connectTimeout: 10000,
    reconnectPeriod: 5000,
    clientIdPrefix: process.env.MQTT_CLIENT_ID_PREFIX || 'agent-media-bridge',
  },
  api: {
    apiKey: optional(process.env.API_KEY),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  devices: {
    file: resolve(projectRoot, process.env.DEVICES_FILE || 'devices.json'),
  },
  media: {
    publicUrl: process.env.PUBLIC_URL || 'http://localhost:3002',
    dir: resolve(projectRoot, process.env.MEDIA_DIR || 'media'),
    defaultTitle: process.env.MEDIA_DEFAULT_TITLE || 'Home Assistant',
  },
});

export type Config = z.infer<typeof configSchema>;
export default config;
