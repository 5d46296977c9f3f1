import type { messagingApi } from '@line/bot-sdk';
import type {
  CurrentWeatherReport,
  ForecastReport,
  TodayWeatherReport,
} from '../core/weather/WeatherReportService.js';
import type { OutfitAdvice } from '../core/weather/types.js';
import { flexMessage, formatNumber, infoRow, separator, text, verticalBox } from './components.js';
import { OUTFIT_IMAGE_URLS } from './outfitImages.js';
import { formatObservedAt, formatTemperatureRange, formatUv } from './weatherMessages.js';

function outfitBubble(
  title: string,
  subtitle: string,
  advice: OutfitAdvice,
  details: Array<[string, string]>
): messagingApi.FlexBubble {
  return {
    type: 'bubble',
    hero: {
      type: 'image',
      url: OUTFIT_IMAGE_URLS[advice.image],
      size: 'full',
      aspectRatio: '20:13',
      aspectMode: 'cover',
    },
    body: verticalBox([
      text(title, { weight: 'bold', size: 'lg' }),
      text(subtitle, { size: 'xs', color: '#8C8C8C' }),
      ...details.map(([label, value]) => infoRow(label, value)),
      separator(),
      ...advice.lines.map((line) => text(`• ${line}`, { size: 'sm' })),
    ]),
  };
}

export function buildCurrentOutfitMessage(report: CurrentWeatherReport): messagingApi.FlexMessage {
  const { observation } = report;
  const observedAt = formatObservedAt(observation.observedAt);
  const bubble = outfitBubble(`${report.city} 即時穿搭建議`, `觀測時間 ${observedAt}`, report.advice, [
    ['天氣', observation.weather ?? '無資料'],
    ['體感溫度', formatNumber(report.apparentTemperature, '°C', 1)],
    ['濕度', formatNumber(observation.relativeHumidity, '%')],
    ['紫外線', formatUv(report.uv)],
  ]);
  return flexMessage(`${report.city} 即時穿搭建議`, bubble);
}

export function buildTodayOutfitMessage(report: TodayWeatherReport): messagingApi.FlexMessage {
  const { summary, outfitInputs } = report;
  const bubble = outfitBubble(`${report.city} 今日穿搭建議`, summary.dateLabel, report.advice, [
    ['天氣', summary.weather ?? '無資料'],
    ['溫度', formatTemperatureRange(summary.minTemperature, summary.maxTemperature)],
    ['體感溫度', formatNumber(outfitInputs.apparentTemperature, '°C', 1)],
    ['降雨機率', formatNumber(summary.precipitationProbability, '%')],
  ]);
  return flexMessage(`${report.city} 今日穿搭建議`, bubble);
}

export function buildForecastOutfitMessage(report: ForecastReport): messagingApi.FlexMessage {
  const carousel: messagingApi.FlexCarousel = {
    type: 'carousel',
    contents: report.days.map(({ record, advice }) =>
      outfitBubble(`${report.city} ${record.dayLabel}穿搭`, record.dateLabel, advice, [
        ['天氣', record.weather ?? '無資料'],
        ['溫度', formatTemperatureRange(record.minTemperature, record.maxTemperature)],
        ['降雨機率', formatNumber(record.precipitationProbability, '%')],
      ])
    ),
  };
  return flexMessage(`${report.city} 未來穿搭建議`, carousel);
}
