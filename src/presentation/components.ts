import type { messagingApi } from '@line/bot-sdk';
import { encodePostbackData, type ActionRequest } from '../core/bot/actions.js';

export const COLORS = {
  primary: '#1E88E5',
  label: '#8C8C8C',
  value: '#333333',
  muted: '#AAAAAA',
} as const;

export function text(
  content: string,
  options: Omit<messagingApi.FlexText, 'type' | 'text'> = {}
): messagingApi.FlexText {
  return { type: 'text', text: content, wrap: true, ...options };
}

export function separator(): messagingApi.FlexSeparator {
  return { type: 'separator', margin: 'md' };
}

/** Label / value row used across the weather cards. */
export function infoRow(label: string, value: string): messagingApi.FlexBox {
  return {
    type: 'box',
    layout: 'baseline',
    spacing: 'sm',
    contents: [
      text(label, { color: COLORS.label, size: 'sm', flex: 2 }),
      text(value, { color: COLORS.value, size: 'sm', flex: 5 }),
    ],
  };
}

export function verticalBox(
  contents: messagingApi.FlexComponent[],
  options: Omit<messagingApi.FlexBox, 'type' | 'layout' | 'contents'> = {}
): messagingApi.FlexBox {
  return { type: 'box', layout: 'vertical', spacing: 'sm', contents, ...options };
}

export function header(title: string, subtitle?: string): messagingApi.FlexBox {
  const contents: messagingApi.FlexComponent[] = [
    text(title, { weight: 'bold', size: 'xl', color: '#FFFFFF' }),
  ];
  if (subtitle) {
    contents.push(text(subtitle, { size: 'sm', color: '#FFFFFF' }));
  }
  return verticalBox(contents, { backgroundColor: COLORS.primary, paddingAll: '16px' });
}

export function postbackButton(
  label: string,
  request: ActionRequest,
  style: messagingApi.FlexButton['style'] = 'primary'
): messagingApi.FlexButton {
  return {
    type: 'button',
    style,
    height: 'sm',
    action: { type: 'postback', label, data: encodePostbackData(request), displayText: label },
  };
}

export function uriButton(label: string, uri: string): messagingApi.FlexButton {
  return { type: 'button', style: 'link', height: 'sm', action: { type: 'uri', label, uri } };
}

/** Bold section heading inside a card body. */
export function sectionTitle(content: string): messagingApi.FlexText {
  return text(content, { weight: 'bold', size: 'md', color: COLORS.primary, margin: 'md' });
}

export function flexMessage(altText: string, contents: messagingApi.FlexContainer): messagingApi.FlexMessage {
  return { type: 'flex', altText, contents };
}

export function textMessage(content: string, quickReply?: messagingApi.QuickReply): messagingApi.TextMessage {
  return quickReply ? { type: 'text', text: content, quickReply } : { type: 'text', text: content };
}

export function quickReply(items: Array<{ label: string; request: ActionRequest }>): messagingApi.QuickReply {
  return {
    items: items.map(({ label, request }) => ({
      type: 'action',
      action: { type: 'postback', label, data: encodePostbackData(request), displayText: label },
    })),
  };
}

export function formatNumber(value: number | null, unit: string, digits = 0): string {
  return value === null ? '無資料' : `${value.toFixed(digits)}${unit}`;
}
