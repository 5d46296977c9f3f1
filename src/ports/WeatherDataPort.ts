export const CWA_DATASETS = {
  currentObservation: 'O-A0003-001',
  generalForecast: 'F-C0032-001',
  hourlyForecast: 'F-D0047-089',
  weeklyForecast: 'F-D0047-091',
  uvIndex: 'O-A0005-001',
  typhoon: 'W-C0034-005',
  areaHazards: 'W-C0033-002',
} as const;

export type CwaDataset = (typeof CWA_DATASETS)[keyof typeof CWA_DATASETS];

/**
 * Raw CWA open-data payloads. Implementations throw on transport failures;
 * the payload shape is checked by the response adapters, not here.
 */
export interface WeatherDataPort {
  fetchCurrentObservation(stationName: string): Promise<unknown>;
  fetchGeneralForecast(locationName: string): Promise<unknown>;
  fetchHourlyForecast(locationName: string): Promise<unknown>;
  fetchWeeklyForecast(locationName: string): Promise<unknown>;
  fetchUvIndex(): Promise<unknown>;
  /** Tropical cyclones analysed since `since`. */
  fetchTyphoon(since: Date): Promise<unknown>;
  fetchAreaHazards(): Promise<unknown>;
}
