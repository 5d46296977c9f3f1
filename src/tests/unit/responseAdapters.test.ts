import { describe, it, expect } from 'vitest';
import {
  adaptCurrentObservation,
  adaptGeneralForecast,
  adaptHourlyForecast,
  adaptUvIndex,
  adaptWeeklyForecast,
} from '../../core/weather/adapters/index.js';
import {
  currentObservationPayload,
  generalForecastPayload,
  hourlyPointElement,
  townForecastPayload,
  uvIndexPayload,
  weeklyElement,
} from '../fixtures/cwaPayloads.js';

describe('adaptCurrentObservation', () => {
  const payload = currentObservationPayload([
    {
      name: '板橋',
      elements: { Weather: '晴', AirTemperature: 31.2 },
    },
    {
      name: '臺中',
      elements: {
        Weather: '多雲',
        AirTemperature: 30.4,
        RelativeHumidity: 68,
        Now: { Precipitation: 0.5 },
        WindSpeed: 2.1,
        WindDirection: 270,
        AirPressure: 1003.2,
        UVIndex: -99,
      },
    },
  ]);

  it('flattens the matching station', () => {
    const result = adaptCurrentObservation(payload, '臺中');
    expect(result).toEqual({
      status: 'found',
      record: {
        stationName: '臺中',
        observedAt: '2025-07-18T14:00:00+08:00',
        weather: '多雲',
        airTemperature: 30.4,
        relativeHumidity: 68,
        precipitation: 0.5,
        windSpeed: 2.1,
        windDirection: 270,
        airPressure: 1003.2,
        uvIndex: null,
      },
    });
  });

  it('reads numeric strings and maps sentinels to null', () => {
    const stringly = currentObservationPayload([
      {
        name: '花蓮',
        elements: { Weather: '-99', AirTemperature: '25.5', RelativeHumidity: '-99.0', WindSpeed: '' },
      },
    ]);
    const result = adaptCurrentObservation(stringly, '花蓮');
    expect(result.status).toBe('found');
    if (result.status !== 'found') return;
    expect(result.record.weather).toBeNull();
    expect(result.record.airTemperature).toBe(25.5);
    expect(result.record.relativeHumidity).toBeNull();
    expect(result.record.windSpeed).toBeNull();
    expect(result.record.precipitation).toBeNull();
  });

  it('does not fall back to another station when the name is missing', () => {
    expect(adaptCurrentObservation(payload, '高雄')).toEqual({
      status: 'not_found',
      reason: 'place_not_found',
    });
  });

  it('reports a payload without records as malformed', () => {
    expect(adaptCurrentObservation({ success: 'true' }, '臺中')).toEqual({
      status: 'not_found',
      reason: 'malformed_payload',
    });
    expect(adaptCurrentObservation(null, '臺中')).toEqual({
      status: 'not_found',
      reason: 'malformed_payload',
    });
  });
});

describe('adaptGeneralForecast', () => {
  const payload = generalForecastPayload([
    {
      name: '臺北市',
      slots: [
        { start: '2025-07-18 18:00:00', end: '2025-07-19 06:00:00', Wx: '多雲時陰', PoP: '20', MinT: '27', MaxT: '30', CI: '悶熱' },
        { start: '2025-07-18 12:00:00', end: '2025-07-18 18:00:00', Wx: '午後短暫雷陣雨', PoP: '60', MinT: '30', MaxT: '35', CI: '易中暑' },
      ],
    },
  ]);

  it('returns chronological periods for the location', () => {
    const result = adaptGeneralForecast(payload, '臺北市');
    expect(result.status).toBe('found');
    if (result.status !== 'found') return;
    expect(result.record.map((p) => p.startTime)).toEqual(['2025-07-18 12:00:00', '2025-07-18 18:00:00']);
    expect(result.record[0]).toMatchObject({
      endTime: '2025-07-18 18:00:00',
      weather: '午後短暫雷陣雨',
      precipitationProbability: 60,
      minTemperature: 30,
      maxTemperature: 35,
      maxComfort: '易中暑',
      minComfort: '易中暑',
      humidity: null,
      windSpeed: null,
    });
  });

  it('signals an unknown location', () => {
    expect(adaptGeneralForecast(payload, '台北市')).toEqual({ status: 'not_found', reason: 'place_not_found' });
  });

  it('treats success=false as malformed', () => {
    expect(adaptGeneralForecast({ success: 'false', records: { location: [] } }, '臺北市')).toEqual({
      status: 'not_found',
      reason: 'malformed_payload',
    });
  });
});

describe('adaptWeeklyForecast', () => {
  const day = { start: '2025-07-19T06:00:00+08:00', end: '2025-07-19T18:00:00+08:00' };
  const night = { start: '2025-07-19T18:00:00+08:00', end: '2025-07-20T06:00:00+08:00' };
  const payload = townForecastPayload([
    {
      name: '臺南市',
      elements: [
        weeklyElement('最高溫度', 'MaxTemperature', [
          { ...day, value: '33' },
          { ...night, value: '29' },
        ]),
        weeklyElement('最低溫度', 'MinTemperature', [
          { ...day, value: '28' },
          { ...night, value: '27' },
        ]),
        weeklyElement('平均相對濕度', 'RelativeHumidity', [
          { ...day, value: '75' },
          { ...night, value: '-' },
        ]),
        weeklyElement('12小時降雨機率', 'ProbabilityOfPrecipitation', [
          { ...day, value: '30' },
          { ...night, value: '10' },
        ]),
        weeklyElement('天氣現象', 'Weather', [
          { ...day, value: '晴午後短暫雷陣雨' },
          { ...night, value: '多雲' },
        ]),
        weeklyElement('風速', 'WindSpeed', [{ ...day, value: '3' }]),
        weeklyElement('紫外線指數', 'UVIndex', [{ ...day, value: '10' }]),
        weeklyElement('不在清單的元素', 'Whatever', [{ ...day, value: 'x' }]),
      ],
    },
  ]);

  it('merges elements into day and night periods', () => {
    const result = adaptWeeklyForecast(payload, '臺南市');
    expect(result.status).toBe('found');
    if (result.status !== 'found') return;
    expect(result.record).toHaveLength(2);
    const [dayPeriod, nightPeriod] = result.record;
    expect(dayPeriod).toMatchObject({
      startTime: day.start,
      endTime: day.end,
      maxTemperature: 33,
      minTemperature: 28,
      humidity: 75,
      precipitationProbability: 30,
      weather: '晴午後短暫雷陣雨',
      windSpeed: 3,
      uvIndex: 10,
    });
    expect(nightPeriod).toMatchObject({
      startTime: night.start,
      maxTemperature: 29,
      minTemperature: 27,
      humidity: null,
      windSpeed: null,
      uvIndex: null,
    });
  });

  it('reports missing Locations as malformed', () => {
    expect(adaptWeeklyForecast({ success: 'true', records: { Locations: [] } }, '臺南市')).toEqual({
      status: 'not_found',
      reason: 'malformed_payload',
    });
  });
});

describe('adaptHourlyForecast', () => {
  it('turns point readings into zero-length periods', () => {
    const payload = townForecastPayload([
      {
        name: '高雄市',
        elements: [
          hourlyPointElement('體感溫度', 'ApparentTemperature', [
            { time: '2025-07-18T09:00:00+08:00', value: '34' },
            { time: '2025-07-18T10:00:00+08:00', value: '35' },
          ]),
          hourlyPointElement('相對濕度', 'RelativeHumidity', [{ time: '2025-07-18T09:00:00+08:00', value: '72' }]),
          hourlyPointElement('風速', 'WindSpeed', [{ time: '2025-07-18T10:00:00+08:00', value: '4' }]),
          hourlyPointElement('風向', 'WindDirection', [{ time: '2025-07-18T10:00:00+08:00', value: '偏南風' }]),
        ],
      },
    ]);

    const result = adaptHourlyForecast(payload, '高雄市');
    expect(result.status).toBe('found');
    if (result.status !== 'found') return;
    expect(result.record).toHaveLength(2);
    expect(result.record[0]).toMatchObject({
      startTime: '2025-07-18T09:00:00+08:00',
      endTime: '2025-07-18T09:00:00+08:00',
      maxApparentTemperature: 34,
      minApparentTemperature: 34,
      humidity: 72,
      windSpeed: null,
    });
    expect(result.record[1]).toMatchObject({
      maxApparentTemperature: 35,
      windSpeed: 4,
      windDirection: '偏南風',
      humidity: null,
    });
  });
});

describe('adaptUvIndex', () => {
  const payload = uvIndexPayload('2025-07-18', [
    { id: '466920', uv: '9.12' },
    { id: '467490', uv: -99 },
  ]);

  it('returns the station reading', () => {
    expect(adaptUvIndex(payload, '466920')).toEqual({
      status: 'found',
      record: { stationId: '466920', date: '2025-07-18', uvIndex: 9.12 },
    });
  });

  it('keeps a sentinel reading as null', () => {
    expect(adaptUvIndex(payload, '467490')).toEqual({
      status: 'found',
      record: { stationId: '467490', date: '2025-07-18', uvIndex: null },
    });
  });

  it('signals an unknown station', () => {
    expect(adaptUvIndex(payload, '000000')).toEqual({ status: 'not_found', reason: 'place_not_found' });
  });
});
