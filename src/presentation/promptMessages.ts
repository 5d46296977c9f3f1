import type { messagingApi } from '@line/bot-sdk';
import { PUSH_FEATURES, type ActionRequest, type PushFeature } from '../core/bot/actions.js';
import type { UnavailableReason } from '../core/weather/WeatherReportService.js';
import {
  flexMessage,
  header,
  infoRow,
  postbackButton,
  quickReply,
  text,
  textMessage,
  verticalBox,
} from './components.js';

const FEATURED_CITIES = ['臺北市', '新北市', '桃園市', '臺中市', '臺南市', '高雄市', '新竹市', '花蓮縣'] as const;

export const PUSH_FEATURE_LABELS: Readonly<Record<PushFeature, string>> = {
  daily_weather: '每日天氣推播',
  weekend_weather: '週末天氣推播',
  typhoon_alert: '颱風通知推播',
  solar_terms: '節氣小知識推播',
};

export const HELP_TEXT = [
  '可以輸入以下關鍵字：',
  '• 即時天氣',
  '• 今日天氣',
  '• 未來預報',
  '• 穿搭建議',
  '• 週末天氣',
  '• 颱風現況',
  '• 節氣小知識',
  '• 設定預設城市',
  '• 推播設定',
  '也可以直接輸入縣市名稱，例如「台中市」。',
].join('\n');

export function welcomeMessage(): messagingApi.TextMessage {
  return textMessage(`歡迎使用天氣小幫手！\n${HELP_TEXT}`);
}

export function helpMessage(): messagingApi.TextMessage {
  return textMessage(HELP_TEXT);
}

/** Asks for a county and remembers the pending request in the quick-reply data. */
export function askCityMessage(pending: ActionRequest): messagingApi.TextMessage {
  return textMessage(
    '請輸入要查詢的縣市名稱（例如：臺北市、台中市）。',
    quickReply(FEATURED_CITIES.map((city) => ({ label: city, request: { ...pending, city } })))
  );
}

export function unknownCityMessage(input: string): messagingApi.TextMessage {
  return textMessage(`找不到「${input}」，請輸入完整的縣市名稱，例如：臺北市、新竹縣。`);
}

export function forecastDaysMessage(city: string): messagingApi.TextMessage {
  return textMessage(
    `要查看${city}未來幾天的預報？`,
    quickReply([
      { label: '3 天', request: { action: 'forecast', city, days: 3 } },
      { label: '5 天', request: { action: 'forecast', city, days: 5 } },
      { label: '7 天', request: { action: 'forecast', city, days: 7 } },
    ])
  );
}

export function outfitVariantMessage(city: string): messagingApi.TextMessage {
  return textMessage(
    `想看${city}哪一種穿搭建議？`,
    quickReply([
      { label: '即時穿搭', request: { action: 'outfit', city, variant: 'current' } },
      { label: '今日穿搭', request: { action: 'outfit', city, variant: 'today' } },
      { label: '未來三天穿搭', request: { action: 'outfit', city, variant: 'forecast' } },
    ])
  );
}

export function defaultCitySavedMessage(city: string): messagingApi.TextMessage {
  return textMessage(`已將預設城市設定為「${city}」。`);
}

export function unavailableMessage(reason: UnavailableReason, city: string): messagingApi.TextMessage {
  if (reason === 'unknown_city') {
    return unknownCityMessage(city);
  }
  return textMessage(`抱歉，目前無法取得${city}的天氣資料，請稍後再試。`);
}

export interface PushSettingsView {
  defaultCity: string | null;
  push: Readonly<Record<PushFeature, boolean>>;
}

export function pushSettingsMessage(settings: PushSettingsView): messagingApi.FlexMessage {
  const toggle = (feature: PushFeature, enabled: boolean): messagingApi.FlexButton =>
    postbackButton(
      `${enabled ? '關閉' : '開啟'}${PUSH_FEATURE_LABELS[feature]}`,
      { action: 'toggle_push', feature, enabled: !enabled },
      enabled ? 'secondary' : 'primary'
    );

  const bubble: messagingApi.FlexBubble = {
    type: 'bubble',
    header: header('推播設定'),
    body: verticalBox([
      infoRow('預設城市', settings.defaultCity ?? '尚未設定'),
      ...PUSH_FEATURES.map((feature) => infoRow(PUSH_FEATURE_LABELS[feature], settings.push[feature] ? '開啟' : '關閉')),
      text('每日與週末天氣推播會使用預設城市的天氣資料。', { size: 'xs', color: '#AAAAAA', margin: 'md' }),
    ]),
    footer: verticalBox(PUSH_FEATURES.map((feature) => toggle(feature, settings.push[feature]))),
  };
  return flexMessage('推播設定', bubble);
}

export function pushToggledMessage(feature: PushFeature, enabled: boolean): messagingApi.TextMessage {
  return textMessage(`${PUSH_FEATURE_LABELS[feature]}已${enabled ? '開啟' : '關閉'}。`);
}

export function pushNeedsDefaultCityMessage(): messagingApi.TextMessage {
  return textMessage('開啟推播前，請先輸入「設定預設城市」設定你的城市。');
}
