import type { messagingApi } from '@line/bot-sdk';
import type { HazardAlert, TyphoonForecastPoint, TyphoonRecord } from '../core/weather/types.js';
import {
  COLORS,
  flexMessage,
  formatNumber,
  header,
  infoRow,
  sectionTitle,
  separator,
  text,
  textMessage,
  uriButton,
  verticalBox,
} from './components.js';

const NO_DATA = '無資料';
const CWA_TYPHOON_NEWS_URL = 'https://www.cwa.gov.tw/V8/C/P/Typhoon/TY_NEWS.html';
const FORECAST_HOURS = [24, 48, 72] as const;
const MAX_HAZARDS = 3;

export function typhoonTitle(typhoon: TyphoonRecord): string {
  if (typhoon.isTropicalDepression) return typhoon.name;
  if (!typhoon.englishName || typhoon.englishName === typhoon.name) return `颱風 ${typhoon.name}`;
  return `颱風 ${typhoon.name} (${typhoon.englishName})`;
}

function formatFixTime(fixTime: string | null): string {
  return fixTime ? fixTime.slice(0, 16).replace('T', ' ') : NO_DATA;
}

/** `2025-07-29 08:00` → `07/29 08:00` */
function formatForecastTime(forecastTime: string | null): string {
  if (!forecastTime) return NO_DATA;
  return `${forecastTime.slice(5, 7)}/${forecastTime.slice(8, 10)} ${forecastTime.slice(11, 16)}`;
}

/** `2025-07-28 08:00:00` → `2025/07/28 08:00` */
function formatHazardTime(timestamp: string | null): string {
  return timestamp ? timestamp.slice(0, 16).replace('T', ' ').replace(/-/g, '/') : '未知';
}

export function formatPosition(latitude: number | null, longitude: number | null): string {
  if (latitude === null || longitude === null) return NO_DATA;
  return `北緯 ${latitude} 度，東經 ${longitude} 度`;
}

export function formatTyphoonWind(maxWindSpeed: number | null, maxGustSpeed: number | null): string {
  if (maxWindSpeed === null) return NO_DATA;
  return maxGustSpeed === null
    ? `${maxWindSpeed} 公尺/秒`
    : `${maxWindSpeed} 公尺/秒 (陣風 ${maxGustSpeed} 公尺/秒)`;
}

function formatMovement(direction: string | null, speed: number | null): string {
  const parts = [direction, speed === null ? null : `${speed} 公里/時`].filter((part): part is string => part !== null);
  return parts.length > 0 ? parts.join(' ') : NO_DATA;
}

function forecastRows(hours: number, point: TyphoonForecastPoint | undefined): messagingApi.FlexComponent[] {
  if (!point) {
    return [text(`${hours} 小時預報：${NO_DATA}`, { size: 'sm', color: COLORS.muted })];
  }
  return [
    text(`${hours} 小時 (${formatForecastTime(point.forecastTime)})`, { size: 'sm', weight: 'bold', margin: 'md' }),
    infoRow('位置', formatPosition(point.latitude, point.longitude)),
    infoRow('風速', formatTyphoonWind(point.maxWindSpeed, point.maxGustSpeed)),
    infoRow('氣壓', formatNumber(point.pressure, ' hPa')),
    infoRow('70%半徑', formatNumber(point.probabilityRadius70, ' 公里')),
  ];
}

function hazardRows(alert: HazardAlert): messagingApi.FlexComponent[] {
  return [
    text(`【${alert.title}】`, { size: 'sm', weight: 'bold', margin: 'md' }),
    text(`影響地區：${alert.affectedAreas.length > 0 ? alert.affectedAreas.join('、') : NO_DATA}`, { size: 'xs' }),
    text(`有效時間：${formatHazardTime(alert.startTime)} ~ ${formatHazardTime(alert.endTime)}`, {
      size: 'xs',
      color: COLORS.label,
    }),
  ];
}

export function buildTyphoonMessage(
  typhoon: TyphoonRecord,
  hazards: readonly HazardAlert[] = [],
  county: string | null = null
): messagingApi.FlexMessage {
  const { current } = typhoon;
  const title = typhoonTitle(typhoon);

  const contents: messagingApi.FlexComponent[] = [
    sectionTitle('即時現況'),
    infoRow('中心位置', formatPosition(current.latitude, current.longitude)),
    infoRow('最大風速', formatTyphoonWind(current.maxWindSpeed, current.maxGustSpeed)),
    infoRow('中心氣壓', formatNumber(current.pressure, ' hPa')),
    infoRow('移動', formatMovement(current.movingDirection, current.movingSpeed)),
    infoRow('暴風半徑', formatNumber(current.stormRadius, ' 公里')),
  ];
  if (current.stormRadiusByQuadrant.length > 0) {
    contents.push(text(current.stormRadiusByQuadrant.join('、'), { size: 'xs', color: COLORS.label }));
  }

  contents.push(separator(), sectionTitle('未來趨勢預報'));
  for (const hours of FORECAST_HOURS) {
    contents.push(...forecastRows(hours, typhoon.forecasts.find((point) => point.tau === hours)));
  }

  if (hazards.length > 0) {
    contents.push(separator(), sectionTitle(county ? `${county}地區影響預警` : '地區影響預警'));
    for (const alert of hazards.slice(0, MAX_HAZARDS)) {
      contents.push(...hazardRows(alert));
    }
  }

  const bubble: messagingApi.FlexBubble = {
    type: 'bubble',
    header: header(title, `觀測時間 ${formatFixTime(current.fixTime)}`),
    body: verticalBox(contents),
    footer: verticalBox([uriButton('中央氣象署颱風消息', CWA_TYPHOON_NEWS_URL)]),
  };
  return flexMessage(`${title} 颱風資訊`, bubble);
}

export function noTyphoonMessage(): messagingApi.TextMessage {
  return textMessage('目前沒有颱風消息。');
}

export function typhoonUnavailableMessage(): messagingApi.TextMessage {
  return textMessage('目前無法取得颱風資訊，請稍候再試。');
}
