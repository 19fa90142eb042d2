import { z, type ZodError } from 'zod';
import { CONTEXT_TAGS, type TelemetryObservation } from '../types/traffic.types';
import { TelemetryValidationError } from '../services/telemetry/TelemetryValidationError';

const finite = z.number().finite();

// Shape only; value ranges are not checked
export const telemetrySampleSchema = z.object({
  lat: finite,
  lon: finite,
  altitudeFt: finite,
  headingDeg: finite,
  airspeedKt: finite,
  verticalSpeedFpm: finite,
  onGround: z.boolean(),
});

export const telemetryObservationSchema = z.object({
  id: z.string().trim().min(1).max(16),
  sample: telemetrySampleSchema,
});

export const telemetryBatchSchema = z.object({
  observations: z.array(telemetryObservationSchema).min(1).max(1000),
});

export const telemetryMessageSchema = z.union([
  telemetryObservationSchema.transform((observation) => [observation]),
  telemetryBatchSchema.transform((batch) => batch.observations),
]);

export const contextParamsSchema = z.object({
  tag: z.string().min(1).max(32),
});

export const isKnownContextTag = (tag: string): boolean => CONTEXT_TAGS.some((known) => known === tag);

export type TelemetryBatchInput = z.infer<typeof telemetryBatchSchema>;

export const formatZodIssues = (error: ZodError): string[] => error.issues.map(
  (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`,
);

/**
 * Accepts a single observation or an `{ observations: [...] }` batch.
 */
export function parseTelemetryMessage(payload: unknown): TelemetryObservation[] {
  const parsed = telemetryMessageSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TelemetryValidationError('Invalid telemetry payload', formatZodIssues(parsed.error));
  }
  return parsed.data;
}
