import type { messagingApi } from '@line/bot-sdk';
import type {
  CurrentWeatherReport,
  DailyForecast,
  ForecastReport,
  TodayWeatherReport,
} from '../core/weather/WeatherReportService.js';
import type { DailyWeatherRecord } from '../core/weather/types.js';
import type { UvCategory, WindScale } from '../core/weather/units.js';
import {
  flexMessage,
  formatNumber,
  header,
  infoRow,
  postbackButton,
  separator,
  text,
  verticalBox,
} from './components.js';

const NO_DATA = '無資料';

export function formatTemperatureRange(min: number | null, max: number | null): string {
  if (min === null && max === null) return NO_DATA;
  if (min === null || max === null || min === max) return `${min ?? max}°C`;
  return `${min}~${max}°C`;
}

export function formatUv(uv: UvCategory | null): string {
  return uv === null || uv.index < 0 ? NO_DATA : `${uv.index} (${uv.label})`;
}

export function formatWind(wind: WindScale | null, direction: string | null): string {
  if (wind === null) return NO_DATA;
  const scale = `${wind.scale} 級 (${wind.description})`;
  return direction && direction !== NO_DATA ? `${direction} ${scale}` : scale;
}

function formatComfort(min: string | null, max: string | null): string {
  if (min && max && min !== max) return `${min}~${max}`;
  return max ?? min ?? NO_DATA;
}

export function formatObservedAt(observedAt: string | null): string {
  return observedAt ? observedAt.slice(0, 16).replace('T', ' ') : NO_DATA;
}

function formatPrecipitation(amount: number | null): string {
  if (amount === null) return NO_DATA;
  return amount === 0 ? '無' : `${amount} mm`;
}

export function buildCurrentWeatherMessage(report: CurrentWeatherReport): messagingApi.FlexMessage {
  const { observation } = report;
  const bubble: messagingApi.FlexBubble = {
    type: 'bubble',
    header: header(`${report.city} 即時天氣`, `${observation.stationName}測站`),
    body: verticalBox([
      infoRow('觀測時間', formatObservedAt(observation.observedAt)),
      infoRow('天氣', observation.weather ?? NO_DATA),
      infoRow('溫度', formatNumber(observation.airTemperature, '°C', 1)),
      infoRow('體感溫度', formatNumber(report.apparentTemperature, '°C', 1)),
      infoRow('濕度', formatNumber(observation.relativeHumidity, '%')),
      infoRow('降雨量', formatPrecipitation(observation.precipitation)),
      infoRow('風力', formatWind(report.wind, report.windDirection)),
      infoRow('氣壓', formatNumber(observation.airPressure, ' hPa', 1)),
      infoRow('紫外線', formatUv(report.uv)),
    ]),
    footer: verticalBox([
      postbackButton('穿搭建議', { action: 'outfit', city: report.city, variant: 'current' }),
    ]),
  };
  return flexMessage(`${report.city} 即時天氣`, bubble);
}

export function buildTodayWeatherMessage(report: TodayWeatherReport): messagingApi.FlexMessage {
  const { summary, outfitInputs } = report;
  const humidity = outfitInputs.humidity === null ? null : Math.round(outfitInputs.humidity);
  const bubble: messagingApi.FlexBubble = {
    type: 'bubble',
    header: header(`${report.city} 今日天氣`, summary.dateLabel),
    body: verticalBox([
      infoRow('天氣', summary.weather ?? NO_DATA),
      infoRow('溫度', formatTemperatureRange(summary.minTemperature, summary.maxTemperature)),
      infoRow('體感溫度', formatNumber(outfitInputs.apparentTemperature, '°C', 1)),
      infoRow('降雨機率', formatNumber(summary.precipitationProbability, '%')),
      infoRow('濕度', formatNumber(humidity, '%')),
      infoRow('舒適度', formatComfort(summary.minComfort, summary.maxComfort)),
      infoRow('紫外線', formatUv(report.uv)),
    ]),
    footer: verticalBox([
      postbackButton('今日穿搭建議', { action: 'outfit', city: report.city, variant: 'today' }),
    ]),
  };
  return flexMessage(`${report.city} 今日天氣`, bubble);
}

function dailyRows(record: DailyWeatherRecord): messagingApi.FlexComponent[] {
  return [
    infoRow('天氣', record.weather ?? NO_DATA),
    infoRow('溫度', formatTemperatureRange(record.minTemperature, record.maxTemperature)),
    infoRow('體感溫度', formatTemperatureRange(record.minApparentTemperature, record.maxApparentTemperature)),
    infoRow('降雨機率', formatNumber(record.precipitationProbability, '%')),
    infoRow('濕度', formatNumber(record.humidity, '%')),
    infoRow('風力', formatWind(record.wind, record.windDirection)),
    infoRow('舒適度', formatComfort(record.minComfort, record.maxComfort)),
    infoRow('紫外線', formatUv(record.uv)),
  ];
}

function dailyBubble(city: string, day: DailyForecast, includeAdvice: boolean): messagingApi.FlexBubble {
  const contents = dailyRows(day.record);
  if (includeAdvice) {
    contents.push(separator(), ...day.advice.lines.map((line) => text(`• ${line}`, { size: 'sm' })));
  }
  return {
    type: 'bubble',
    header: header(`${city} ${day.record.dayLabel}`, day.record.dateLabel),
    body: verticalBox(contents),
  };
}

export function buildForecastMessage(report: ForecastReport): messagingApi.FlexMessage {
  const carousel: messagingApi.FlexCarousel = {
    type: 'carousel',
    contents: report.days.map((day) => dailyBubble(report.city, day, false)),
  };
  return flexMessage(`${report.city} 未來 ${report.days.length} 天預報`, carousel);
}

export function buildWeekendMessage(report: ForecastReport): messagingApi.FlexMessage {
  const carousel: messagingApi.FlexCarousel = {
    type: 'carousel',
    contents: report.days.map((day) => dailyBubble(report.city, day, true)),
  };
  return flexMessage(`${report.city} 週末天氣`, carousel);
}
