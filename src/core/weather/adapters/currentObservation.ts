import { z } from 'zod';
import { parseCwaNumber, parseCwaText } from '../parse.js';
import type { AdapterResult, RawObservationRecord } from '../types.js';
import { notFound } from './shared.js';

const DATASET = 'O-A0003-001';

const stationSchema = z.object({
  StationName: z.string().optional(),
  ObsTime: z.object({ DateTime: z.string().optional() }).partial().optional(),
  WeatherElement: z
    .object({ Now: z.object({ Precipitation: z.unknown() }).partial().optional() })
    .catchall(z.unknown())
    .default({}),
});

const payloadSchema = z.object({
  success: z.string().optional(),
  records: z.object({
    Station: z.array(stationSchema),
  }),
});

/** Station snapshot from the automatic weather station observations. */
export function adaptCurrentObservation(
  payload: unknown,
  stationName: string
): AdapterResult<RawObservationRecord> {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.success === 'false') {
    return notFound(DATASET, 'malformed_payload');
  }

  const station = parsed.data.records.Station.find((entry) => entry.StationName === stationName);
  if (!station) {
    return notFound(DATASET, 'place_not_found', { stationName });
  }

  const elements = station.WeatherElement;
  return {
    status: 'found',
    record: {
      stationName,
      observedAt: station.ObsTime?.DateTime ?? null,
      weather: parseCwaText(elements.Weather),
      airTemperature: parseCwaNumber(elements.AirTemperature, 'AirTemperature'),
      relativeHumidity: parseCwaNumber(elements.RelativeHumidity, 'RelativeHumidity'),
      precipitation: parseCwaNumber(elements.Now?.Precipitation, 'Precipitation'),
      windSpeed: parseCwaNumber(elements.WindSpeed, 'WindSpeed'),
      windDirection: parseCwaNumber(elements.WindDirection, 'WindDirection'),
      airPressure: parseCwaNumber(elements.AirPressure, 'AirPressure'),
      uvIndex: parseCwaNumber(elements.UVIndex, 'UVIndex'),
    },
  };
}
