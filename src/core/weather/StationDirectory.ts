import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../../utils/errors.js';

const DEFAULT_STATIONS_FILE = new URL('../../../data/stations.json', import.meta.url);

const countyStationsSchema = z.object({
  county: z.string().min(1),
  observationStation: z.string().min(1),
  uvStationId: z.string().min(1),
});

const stationsFileSchema = z.object({
  counties: z.array(countyStationsSchema).min(1),
});

export type CountyStations = z.infer<typeof countyStationsSchema>;

/** County → representative observation and UV stations. */
export class StationDirectory {
  private readonly byCounty: ReadonlyMap<string, CountyStations>;

  constructor(entries: readonly CountyStations[]) {
    this.byCounty = new Map(entries.map((entry) => [entry.county, entry]));
  }

  lookup(county: string): CountyStations | undefined {
    return this.byCounty.get(county);
  }

  has(county: string): boolean {
    return this.byCounty.has(county);
  }

  counties(): string[] {
    return [...this.byCounty.keys()];
  }
}

export function loadStationDirectory(file: URL | string = DEFAULT_STATIONS_FILE): StationDirectory {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Unable to read station table from ${String(file)}`, { cause: error });
  }

  const parsed = stationsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid station table in ${String(file)}`, { cause: parsed.error });
  }
  return new StationDirectory(parsed.data.counties);
}
