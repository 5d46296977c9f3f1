import { describe, it, expect } from 'vitest';
import { adaptAreaHazards, adaptTyphoon } from '../../core/weather/adapters/index.js';
import { hazardPayload, typhoonPayload } from '../fixtures/cwaPayloads.js';

const INIT_TIME = '2025-07-19T14:00:00+08:00';

describe('adaptTyphoon', () => {
  const payload = typhoonPayload([
    {
      year: '2025',
      typhoonName: 'FRANCISCO',
      cwaTyphoonName: '范斯高',
      fixes: [{ fixTime: '2025-07-18T20:00:00+08:00', maxWindSpeed: '20' }],
    },
    {
      year: '2025',
      typhoonName: 'WIPHA',
      cwaTyphoonName: '薇帕',
      cwaTdNo: '06',
      fixes: [
        { fixTime: '2025-07-19T08:00:00+08:00', coordinate: '125.0,20.0', maxWindSpeed: '33' },
        {
          fixTime: INIT_TIME,
          coordinate: '123.9,21.2',
          maxWindSpeed: '38',
          maxGustSpeed: '48',
          pressure: '965',
          movingSpeed: '20',
          movingDirection: 'WNW',
          circleOf15Ms: {
            radius: '200',
            quadrantRadii: {
              radius: [
                { dir: 'NE', value: '220' },
                { dir: 'SW', value: '180' },
              ],
            },
          },
        },
      ],
      forecasts: [
        {
          tau: '48',
          initTime: INIT_TIME,
          coordinate: '118.9,23.0',
          maxWindSpeed: '33',
          maxGustSpeed: '43',
          pressure: '975',
          circleOf15Ms: { radius: '180' },
          radiusOf70PercentProbability: '250',
        },
        {
          tau: '24',
          initTime: INIT_TIME,
          coordinate: '121.0,22.3',
          maxWindSpeed: '38',
          maxGustSpeed: '48',
          pressure: '965',
          radiusOf70PercentProbability: '150',
        },
        { tau: '0', initTime: INIT_TIME, coordinate: '123.9,21.2' },
      ],
    },
  ]);

  it('picks the cyclone with the most recent fix and reads its latest position', () => {
    const result = adaptTyphoon(payload);

    expect(result.status).toBe('found');
    if (result.status !== 'found') return;
    expect(result.record).toMatchObject({
      id: '2025_WIPHA',
      name: '薇帕',
      englishName: 'WIPHA',
      depressionNumber: '06',
      isTropicalDepression: false,
    });
    expect(result.record.current).toEqual({
      fixTime: INIT_TIME,
      longitude: 123.9,
      latitude: 21.2,
      maxWindSpeed: 38,
      maxGustSpeed: 48,
      pressure: 965,
      movingSpeed: 20,
      movingDirection: '西北西',
      stormRadius: 200,
      stormRadiusByQuadrant: ['東北220公里', '西南180公里'],
    });
  });

  it('orders the forecast track by lead time and drops the analysis point', () => {
    const result = adaptTyphoon(payload);
    if (result.status !== 'found') throw new Error('expected a typhoon');

    expect(result.record.forecasts).toEqual([
      {
        tau: 24,
        forecastTime: '2025-07-20 14:00',
        longitude: 121,
        latitude: 22.3,
        maxWindSpeed: 38,
        maxGustSpeed: 48,
        pressure: 965,
        stormRadius: null,
        probabilityRadius70: 150,
      },
      {
        tau: 48,
        forecastTime: '2025-07-21 14:00',
        longitude: 118.9,
        latitude: 23,
        maxWindSpeed: 33,
        maxGustSpeed: 43,
        pressure: 975,
        stormRadius: 180,
        probabilityRadius70: 250,
      },
    ]);
  });

  it('labels an unnamed weak system as a tropical depression', () => {
    const result = adaptTyphoon(
      typhoonPayload([
        { year: '2025', cwaTdNo: '12', fixes: [{ fixTime: '2025-08-02T08:00:00+08:00', maxWindSpeed: '15' }] },
      ])
    );

    expect(result).toMatchObject({
      status: 'found',
      record: {
        id: '2025_TD12',
        name: '熱帶低氣壓 TD12',
        englishName: null,
        isTropicalDepression: true,
      },
    });
  });

  it('reports no_records when nothing is being tracked', () => {
    expect(adaptTyphoon(typhoonPayload([]))).toEqual({ status: 'not_found', reason: 'no_records' });
    expect(adaptTyphoon(typhoonPayload([{ typhoonName: 'WIPHA', fixes: [{ maxWindSpeed: '30' }] }]))).toEqual({
      status: 'not_found',
      reason: 'no_records',
    });
    expect(adaptTyphoon({ success: 'true', records: {} })).toEqual({ status: 'not_found', reason: 'no_records' });
  });

  it('rejects a payload of the wrong shape', () => {
    expect(adaptTyphoon({ success: 'true', records: { tropicalCyclones: { tropicalCyclone: 'none' } } })).toEqual({
      status: 'not_found',
      reason: 'malformed_payload',
    });
  });
});

describe('adaptAreaHazards', () => {
  const payload = hazardPayload([
    { phenomena: '陸上強風', significance: '特報', areas: ['台北市', '新北市', '臺北市'] },
    { phenomena: '豪雨', significance: '特報', areas: ['花蓮縣'] },
    { areas: [] },
  ]);

  it('returns every usable alert with normalized, de-duplicated areas', () => {
    const result = adaptAreaHazards(payload);

    expect(result.status).toBe('found');
    if (result.status !== 'found') return;
    expect(result.record).toHaveLength(2);
    expect(result.record[0]).toEqual({
      title: '陸上強風特報',
      phenomena: '陸上強風',
      significance: '特報',
      issueTime: '2025-07-28 05:30:00',
      startTime: '2025-07-28 08:00:00',
      endTime: '2025-07-29 08:00:00',
      affectedAreas: ['新北市', '臺北市'],
      description: '颱風外圍環流影響，請注意強風豪雨。',
    });
  });

  it('keeps only the alerts naming the county', () => {
    const forHualien = adaptAreaHazards(payload, '花蓮縣');
    expect(forHualien.status === 'found' && forHualien.record.map((alert) => alert.title)).toEqual(['豪雨特報']);

    expect(adaptAreaHazards(payload, '臺東縣')).toEqual({ status: 'found', record: [] });
  });

  it('rejects a payload of the wrong shape', () => {
    expect(adaptAreaHazards({ success: 'true', records: { record: [{ hazardConditions: 'none' }] } })).toEqual({
      status: 'not_found',
      reason: 'malformed_payload',
    });
  });
});
