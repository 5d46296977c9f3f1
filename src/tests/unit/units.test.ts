import { describe, it, expect } from 'vitest';
import {
  approximateApparentTemperature,
  beaufortDescription,
  compassPointLabel,
  degreesToCompass,
  quadrantRadiusLabel,
  toWindScale,
  uvCategory,
  windSpeedToBeaufort,
} from '../../core/weather/units.js';

describe('windSpeedToBeaufort', () => {
  it('maps the scale boundaries exactly', () => {
    expect(windSpeedToBeaufort(0.29)).toBe(0);
    expect(windSpeedToBeaufort(0.3)).toBe(1);
    expect(windSpeedToBeaufort(1.5)).toBe(1);
    expect(windSpeedToBeaufort(1.6)).toBe(2);
    expect(windSpeedToBeaufort(13.8)).toBe(6);
    expect(windSpeedToBeaufort(15)).toBe(7);
    expect(windSpeedToBeaufort(32.6)).toBe(11);
    expect(windSpeedToBeaufort(32.7)).toBe(12);
  });

  it('treats negative and non-finite speeds as calm', () => {
    expect(windSpeedToBeaufort(-3)).toBe(0);
    expect(windSpeedToBeaufort(Number.NaN)).toBe(0);
  });

  it('never decreases as speed increases', () => {
    let previous = 0;
    for (let speed = 0; speed <= 40; speed += 0.1) {
      const scale = windSpeedToBeaufort(speed);
      expect(scale).toBeGreaterThanOrEqual(previous);
      previous = scale;
    }
    expect(previous).toBe(12);
  });
});

describe('beaufortDescription', () => {
  it('describes each scale', () => {
    expect(beaufortDescription(0)).toBe('無風');
    expect(beaufortDescription(7)).toBe('疾風');
    expect(beaufortDescription(12)).toBe('颶風');
  });

  it('returns the no-data label out of range', () => {
    expect(beaufortDescription(13)).toBe('無資料');
    expect(beaufortDescription(-1)).toBe('無資料');
    expect(beaufortDescription(2.5)).toBe('無資料');
  });

  it('combines with the scale lookup', () => {
    expect(toWindScale(4)).toEqual({ scale: 3, description: '微風' });
  });
});

describe('degreesToCompass', () => {
  it('maps degrees onto eight points', () => {
    expect(degreesToCompass(0)).toBe('北');
    expect(degreesToCompass(22.4)).toBe('北');
    expect(degreesToCompass(22.5)).toBe('東北');
    expect(degreesToCompass(90)).toBe('東');
    expect(degreesToCompass(180)).toBe('南');
    expect(degreesToCompass(225)).toBe('西南');
    expect(degreesToCompass(250)).toBe('西');
    expect(degreesToCompass(337.5)).toBe('北');
    expect(degreesToCompass(360)).toBe('北');
  });

  it('returns the no-data label for missing input', () => {
    expect(degreesToCompass(null)).toBe('無資料');
    expect(degreesToCompass(undefined)).toBe('無資料');
    expect(degreesToCompass(Number.NaN)).toBe('無資料');
  });
});

describe('approximateApparentTemperature', () => {
  it('returns the input below 80 °F', () => {
    expect(approximateApparentTemperature(20.0, 90.0)).toBe(20.0);
  });

  it('applies the heat index when hot and humid', () => {
    expect(approximateApparentTemperature(30, 70)).toBe(35);
  });

  it('keeps the input when the heat index moves it by less than 1 °C', () => {
    expect(approximateApparentTemperature(27, 40)).toBe(27);
  });
});

describe('uvCategory', () => {
  it('categorises by threshold', () => {
    expect(uvCategory(0)).toEqual({ index: 0, label: '低' });
    expect(uvCategory(3)).toEqual({ index: 3, label: '中' });
    expect(uvCategory(6.4)).toEqual({ index: 6, label: '高' });
    expect(uvCategory(9)).toEqual({ index: 9, label: '過量' });
    expect(uvCategory(11)).toEqual({ index: 11, label: '危險' });
  });

  it('reports unknown values as -1', () => {
    expect(uvCategory(null)).toEqual({ index: -1, label: '無資料' });
    expect(uvCategory(-99)).toEqual({ index: -1, label: '無資料' });
  });
});

describe('compassPointLabel', () => {
  it('translates 16-point codes', () => {
    expect(compassPointLabel('NNE')).toBe('北北東');
    expect(compassPointLabel('WNW')).toBe('西北西');
    expect(compassPointLabel('Varies')).toBe('不規則');
  });

  it('keeps unknown codes and marks missing ones', () => {
    expect(compassPointLabel('NX')).toBe('NX');
    expect(compassPointLabel(null)).toBe('不明');
  });

  it('labels a quadrant radius', () => {
    expect(quadrantRadiusLabel('SE', 150)).toBe('東南150公里');
  });
});
