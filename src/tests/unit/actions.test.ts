import { describe, it, expect } from 'vitest';
import { encodePostbackData, parsePostbackData } from '../../core/bot/actions.js';

describe('postback data', () => {
  it('parses every supported field', () => {
    expect(parsePostbackData('action=forecast&city=臺北市&days=5')).toEqual({
      action: 'forecast',
      city: '臺北市',
      days: 5,
    });
    expect(parsePostbackData('action=outfit&city=花蓮縣&type=today')).toEqual({
      action: 'outfit',
      city: '花蓮縣',
      variant: 'today',
    });
    expect(parsePostbackData('action=toggle_push&feature=weekend_weather&enabled=false')).toEqual({
      action: 'toggle_push',
      feature: 'weekend_weather',
      enabled: false,
    });
  });

  it('parses the typhoon and solar term actions', () => {
    expect(parsePostbackData('action=typhoon&city=花蓮縣')).toEqual({ action: 'typhoon', city: '花蓮縣' });
    expect(parsePostbackData('action=solar_term')).toEqual({ action: 'solar_term' });
    expect(parsePostbackData('action=toggle_push&feature=solar_terms&enabled=true')).toEqual({
      action: 'toggle_push',
      feature: 'solar_terms',
      enabled: true,
    });
  });

  it('rejects unknown actions', () => {
    expect(parsePostbackData('action=launch')).toBeNull();
    expect(parsePostbackData('city=臺北市')).toBeNull();
  });

  it('drops values outside the allowed options', () => {
    expect(parsePostbackData('action=forecast&days=4&type=yesterday&feature=hourly&enabled=yes')).toEqual({
      action: 'forecast',
    });
  });

  it('encodes requests in the same format it parses', () => {
    const data = encodePostbackData({ action: 'outfit', city: '臺中市', variant: 'forecast' });

    expect(data).toBe('action=outfit&city=%E8%87%BA%E4%B8%AD%E5%B8%82&type=forecast');
    expect(parsePostbackData(data)).toEqual({ action: 'outfit', city: '臺中市', variant: 'forecast' });
  });
});
