import type { messagingApi } from '@line/bot-sdk';
import type { SolarTerm } from '../core/calendar/SolarTermCalendar.js';
import { COLORS, flexMessage, header, sectionTitle, separator, text, verticalBox } from './components.js';

export function buildSolarTermMessage(term: SolarTerm): messagingApi.FlexMessage {
  const bubble: messagingApi.FlexBubble = {
    type: 'bubble',
    header: header(`【${term.name}】節氣小知識`, `節氣開始：${term.dateLabel}`),
    body: verticalBox([
      sectionTitle('節氣介紹'),
      text(term.description, { size: 'sm' }),
      sectionTitle('傳統習俗'),
      text(term.customs, { size: 'sm' }),
      sectionTitle('養生建議'),
      text(term.health, { size: 'sm' }),
      separator(),
      text('二十四節氣記錄太陽一年中的位置，指引農事與生活。', {
        size: 'xs',
        color: COLORS.muted,
        align: 'center',
        margin: 'md',
      }),
    ]),
  };
  return flexMessage(`${term.name} 節氣小知識`, bubble);
}
