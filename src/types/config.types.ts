/**
 * Configuration type definitions
 */

export interface ServerConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  host: string;
}

export interface CorsConfig {
  allowedOrigins: string[];
}

export interface TrafficConfig {
  enabled: boolean;
  tickIntervalMs: number;
  snapshotIntervalMs: number;
  evictionIntervalMs: number;
  hysteresisMs: number;
  teleportThresholdNm: number;
  staleTimeoutMs: number;
  voicePool: readonly string[];
  pushbackDetection: boolean;
}

export interface RedisTelemetryConfig {
  enabled: boolean;
  url: string;
  channel: string;
}

export interface MockTrafficConfig {
  enabled: boolean;
  aircraftCount: number;
  originLat: number;
  originLon: number;
}

export interface TelemetryConfig {
  maxQueueSize: number;
  redis: RedisTelemetryConfig;
  mock: MockTrafficConfig;
}

export interface AppConfig {
  server: ServerConfig;
  cors: CorsConfig;
  traffic: TrafficConfig;
  telemetry: TelemetryConfig;
}
