import type { AdapterResult, RawForecastPeriod } from '../types.js';
import type { ElementMapping } from './shared.js';
import { adaptTownForecast } from './townForecast.js';

const DATASET = 'F-D0047-089';

// Point readings set both bounds so the aggregator can treat them like intervals.
const ELEMENTS: Record<string, ElementMapping> = {
  溫度: { valueKey: 'Temperature', numeric: ['maxTemperature', 'minTemperature'] },
  體感溫度: {
    valueKey: 'ApparentTemperature',
    numeric: ['maxApparentTemperature', 'minApparentTemperature'],
  },
  相對濕度: { valueKey: 'RelativeHumidity', numeric: ['humidity'] },
  風速: { valueKey: 'WindSpeed', numeric: ['windSpeed'] },
  風向: { valueKey: 'WindDirection', text: ['windDirection'] },
  天氣現象: { valueKey: 'Weather', text: ['weather'] },
  '3小時降雨機率': { valueKey: 'ProbabilityOfPrecipitation', numeric: ['precipitationProbability'] },
  舒適度指數: { valueKey: 'ComfortIndexDescription', text: ['maxComfort', 'minComfort'] },
};

/** 3-day county forecast at hourly / 3-hourly resolution. */
export function adaptHourlyForecast(
  payload: unknown,
  locationName: string
): AdapterResult<RawForecastPeriod[]> {
  return adaptTownForecast(DATASET, ELEMENTS, payload, locationName);
}
