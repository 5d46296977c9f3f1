import type { AdapterResult, RawForecastPeriod } from '../types.js';
import type { ElementMapping } from './shared.js';
import { adaptTownForecast } from './townForecast.js';

const DATASET = 'F-D0047-091';

const ELEMENTS: Record<string, ElementMapping> = {
  天氣現象: { valueKey: 'Weather', text: ['weather'] },
  最高溫度: { valueKey: 'MaxTemperature', numeric: ['maxTemperature'] },
  最低溫度: { valueKey: 'MinTemperature', numeric: ['minTemperature'] },
  最高體感溫度: { valueKey: 'MaxApparentTemperature', numeric: ['maxApparentTemperature'] },
  最低體感溫度: { valueKey: 'MinApparentTemperature', numeric: ['minApparentTemperature'] },
  平均相對濕度: { valueKey: 'RelativeHumidity', numeric: ['humidity'] },
  '12小時降雨機率': { valueKey: 'ProbabilityOfPrecipitation', numeric: ['precipitationProbability'] },
  風速: { valueKey: 'WindSpeed', numeric: ['windSpeed'] },
  風向: { valueKey: 'WindDirection', text: ['windDirection'] },
  最大舒適度指數: { valueKey: 'MaxComfortIndexDescription', text: ['maxComfort'] },
  最小舒適度指數: { valueKey: 'MinComfortIndexDescription', text: ['minComfort'] },
  紫外線指數: { valueKey: 'UVIndex', numeric: ['uvIndex'] },
};

/** 7-day county forecast in 12-hour day/night periods. */
export function adaptWeeklyForecast(
  payload: unknown,
  locationName: string
): AdapterResult<RawForecastPeriod[]> {
  return adaptTownForecast(DATASET, ELEMENTS, payload, locationName);
}
