import { z } from 'zod';
import { normalizeCityName } from '../../../utils/text.js';
import { parseCwaText } from '../parse.js';
import type { AdapterResult, HazardAlert } from '../types.js';
import { notFound } from './shared.js';

const DATASET = 'W-C0033-002';

const hazardSchema = z.object({
  info: z
    .object({
      phenomena: z.string().optional(),
      significance: z.string().optional(),
      affectedAreas: z
        .object({ location: z.array(z.object({ locationName: z.string().optional() })).default([]) })
        .optional(),
    })
    .default({}),
});

const recordSchema = z.object({
  datasetInfo: z
    .object({
      issueTime: z.string().optional(),
      validTime: z.object({ startTime: z.string().optional(), endTime: z.string().optional() }).optional(),
    })
    .optional(),
  contents: z.object({ content: z.object({ contentText: z.string().optional() }).optional() }).optional(),
  hazardConditions: z
    .object({ hazards: z.object({ hazard: z.array(hazardSchema).default([]) }).optional() })
    .optional(),
});

const payloadSchema = z.object({
  success: z.string().optional(),
  records: z.object({ record: z.array(recordSchema).default([]) }).default({}),
});

type HazardRecord = z.infer<typeof recordSchema>;

function toAlert(record: HazardRecord): HazardAlert | null {
  const info = record.hazardConditions?.hazards?.hazard[0]?.info;
  const phenomena = parseCwaText(info?.phenomena);
  const significance = parseCwaText(info?.significance);
  const names = (info?.affectedAreas?.location ?? [])
    .map((location) => parseCwaText(location.locationName))
    .filter((name): name is string => name !== null)
    .map(normalizeCityName);
  const affectedAreas = [...new Set(names)].sort();

  if (phenomena === null && affectedAreas.length === 0) {
    return null;
  }

  return {
    title: phenomena === null ? '地區預警' : `${phenomena}${significance ?? ''}`,
    phenomena,
    significance,
    issueTime: record.datasetInfo?.issueTime ?? null,
    startTime: record.datasetInfo?.validTime?.startTime ?? null,
    endTime: record.datasetInfo?.validTime?.endTime ?? null,
    affectedAreas,
    description: parseCwaText(record.contents?.content?.contentText),
  };
}

/**
 * Regional warnings in effect. With a county, only alerts that list it
 * among their affected areas are kept; an empty list means none applies.
 */
export function adaptAreaHazards(payload: unknown, county: string | null = null): AdapterResult<HazardAlert[]> {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.success === 'false') {
    return notFound(DATASET, 'malformed_payload');
  }

  const alerts = parsed.data.records.record
    .map(toAlert)
    .filter((alert): alert is HazardAlert => alert !== null)
    .filter((alert) => county === null || alert.affectedAreas.includes(county));

  return { status: 'found', record: alerts };
}
