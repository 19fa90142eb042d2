import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig } from '../types/config.types';
import { DEFAULT_VOICE_POOL } from '../services/traffic/VoiceAssigner';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const resolveServerEnv = (value: string | undefined): AppConfig['server']['env'] => (
  value === 'production' || value === 'test' ? value : 'development'
);

const serverEnv = resolveServerEnv(process.env.NODE_ENV);
const isProduction = serverEnv === 'production';

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const parseFloatNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

export const parseListEnv = (value: string | undefined): string[] => (value || '')
  .split(',')
  .map((item) => item.trim())
  .filter(Boolean);

const port = parseNumber(process.env.PORT, 3005);

const defaultAllowedOrigins = [
  `http://localhost:${port}`,
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  `http://127.0.0.1:${port}`,
];
const envAllowedOrigins = parseListEnv(process.env.CORS_ALLOWED_ORIGINS);
const envVoicePool = parseListEnv(process.env.TRAFFIC_VOICE_POOL);

const trafficEnabled = resolveBooleanFlag(
  process.env.ENABLE_TRAFFIC,
  process.env.DISABLE_TRAFFIC,
  true,
);
const pushbackDetection = resolveBooleanFlag(
  process.env.ENABLE_PUSHBACK_DETECTION,
  process.env.DISABLE_PUSHBACK_DETECTION,
  true,
);
const redisTelemetryEnabled = resolveBooleanFlag(
  process.env.ENABLE_REDIS_TELEMETRY,
  process.env.DISABLE_REDIS_TELEMETRY,
  false,
);
const mockTrafficEnabled = resolveBooleanFlag(
  process.env.ENABLE_MOCK_TRAFFIC,
  process.env.DISABLE_MOCK_TRAFFIC,
  !isProduction,
);

/**
 * Centralized configuration management
 * All environment variables and config should live here
 */
const config: AppConfig = {
  server: {
    port,
    env: serverEnv,
    host: process.env.HOST || '0.0.0.0',
  },
  cors: {
    allowedOrigins: envAllowedOrigins.length > 0 ? envAllowedOrigins : defaultAllowedOrigins,
  },
  traffic: {
    enabled: trafficEnabled,
    tickIntervalMs: Math.max(50, parseNumber(process.env.TRAFFIC_TICK_INTERVAL_MS, 500)), // 2 Hz
    snapshotIntervalMs: Math.max(100, parseNumber(process.env.TRAFFIC_SNAPSHOT_INTERVAL_MS, 1000)),
    evictionIntervalMs: Math.max(100, parseNumber(process.env.TRAFFIC_EVICTION_INTERVAL_MS, 5000)),
    hysteresisMs: Math.max(0, parseNumber(process.env.TRAFFIC_HYSTERESIS_MS, 2000)),
    teleportThresholdNm: Math.max(0.1, parseFloatNumber(process.env.TRAFFIC_TELEPORT_THRESHOLD_NM, 5.0)),
    staleTimeoutMs: Math.max(1000, parseNumber(process.env.TRAFFIC_STALE_TIMEOUT_MS, 30000)),
    voicePool: envVoicePool.length > 0 ? envVoicePool : DEFAULT_VOICE_POOL,
    pushbackDetection,
  },
  telemetry: {
    maxQueueSize: Math.max(100, parseNumber(process.env.TELEMETRY_MAX_QUEUE_SIZE, 10000)),
    redis: {
      enabled: redisTelemetryEnabled,
      url: process.env.REDIS_URL || 'redis://127.0.0.1:6379',
      channel: process.env.TELEMETRY_CHANNEL || 'traffic:telemetry',
    },
    mock: {
      enabled: mockTrafficEnabled,
      aircraftCount: Math.max(0, parseNumber(process.env.MOCK_TRAFFIC_COUNT, 6)),
      originLat: parseFloatNumber(process.env.MOCK_TRAFFIC_ORIGIN_LAT, 40.6413),
      originLon: parseFloatNumber(process.env.MOCK_TRAFFIC_ORIGIN_LON, -73.7781),
    },
  },
};

export default config;
