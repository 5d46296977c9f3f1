import { FORECAST_DAY_OPTIONS, type ForecastDays } from '../weather/WeatherReportService.js';

export const BOT_ACTIONS = [
  'current_weather',
  'today_weather',
  'forecast',
  'outfit',
  'weekend_weather',
  'typhoon',
  'solar_term',
  'set_default_city',
  'push_settings',
  'toggle_push',
  'help',
] as const;

export type BotAction = (typeof BOT_ACTIONS)[number];

export const OUTFIT_VARIANTS = ['current', 'today', 'forecast'] as const;
export type OutfitVariant = (typeof OUTFIT_VARIANTS)[number];

export const PUSH_FEATURES = ['daily_weather', 'weekend_weather', 'typhoon_alert', 'solar_terms'] as const;
export type PushFeature = (typeof PUSH_FEATURES)[number];

/** Pushes built from the subscriber's default city; the others go to everyone alike. */
export const CITY_PUSH_FEATURES: ReadonlySet<PushFeature> = new Set<PushFeature>(['daily_weather', 'weekend_weather']);

export interface ActionRequest {
  action: BotAction;
  city?: string;
  days?: ForecastDays;
  variant?: OutfitVariant;
  feature?: PushFeature;
  enabled?: boolean;
}

function isOneOf<T extends string>(options: readonly T[], value: string | null): value is T {
  return value !== null && options.some((option) => option === value);
}

/** `action=forecast&city=臺北市&days=3` → ActionRequest */
export function parsePostbackData(data: string): ActionRequest | null {
  const params = new URLSearchParams(data);
  const action = params.get('action');
  if (!isOneOf(BOT_ACTIONS, action)) return null;

  const request: ActionRequest = { action };
  const city = params.get('city');
  if (city) request.city = city;

  const days = Number(params.get('days'));
  const dayOption = FORECAST_DAY_OPTIONS.find((option) => option === days);
  if (dayOption !== undefined) request.days = dayOption;

  const variant = params.get('type');
  if (isOneOf(OUTFIT_VARIANTS, variant)) request.variant = variant;

  const feature = params.get('feature');
  if (isOneOf(PUSH_FEATURES, feature)) request.feature = feature;

  const enabled = params.get('enabled');
  if (enabled === 'true' || enabled === 'false') request.enabled = enabled === 'true';

  return request;
}

export function encodePostbackData(request: ActionRequest): string {
  const params = new URLSearchParams({ action: request.action });
  if (request.city) params.set('city', request.city);
  if (request.days !== undefined) params.set('days', String(request.days));
  if (request.variant) params.set('type', request.variant);
  if (request.feature) params.set('feature', request.feature);
  if (request.enabled !== undefined) params.set('enabled', String(request.enabled));
  return params.toString();
}
