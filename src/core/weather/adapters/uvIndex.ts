import { z } from 'zod';
import { parseCwaNumber } from '../parse.js';
import type { AdapterResult, UvIndexRecord } from '../types.js';
import { notFound } from './shared.js';

const DATASET = 'O-A0005-001';

const payloadSchema = z.object({
  success: z.string().optional(),
  records: z.object({
    weatherElement: z.object({
      Date: z.string().optional(),
      location: z.array(z.object({ StationID: z.string().optional(), UVIndex: z.unknown() })),
    }),
  }),
});

/** Daily maximum UV index reported by one station. */
export function adaptUvIndex(payload: unknown, stationId: string): AdapterResult<UvIndexRecord> {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.success === 'false') {
    return notFound(DATASET, 'malformed_payload');
  }

  const { weatherElement } = parsed.data.records;
  const station = weatherElement.location.find((entry) => entry.StationID === stationId);
  if (!station) {
    return notFound(DATASET, 'place_not_found', { stationId });
  }

  return {
    status: 'found',
    record: {
      stationId,
      date: weatherElement.Date ?? null,
      uvIndex: parseCwaNumber(station.UVIndex, 'UVIndex'),
    },
  };
}
