import type { IncomingEvent, MessagePort, OutgoingMessage } from '../../ports/MessagePort.js';
import type { UserSettingsRepository } from '../../persistence/repositories/UserSettingsRepository.js';
import type { StationDirectory } from '../weather/StationDirectory.js';
import type { ReportResult, WeatherReportProvider } from '../weather/WeatherReportService.js';
import type { TyphoonProvider } from '../weather/TyphoonService.js';
import type { SolarTermCalendar } from '../calendar/SolarTermCalendar.js';
import {
  buildCurrentWeatherMessage,
  buildForecastMessage,
  buildTodayWeatherMessage,
  buildWeekendMessage,
} from '../../presentation/weatherMessages.js';
import {
  buildCurrentOutfitMessage,
  buildForecastOutfitMessage,
  buildTodayOutfitMessage,
} from '../../presentation/outfitMessages.js';
import {
  buildTyphoonMessage,
  noTyphoonMessage,
  typhoonUnavailableMessage,
} from '../../presentation/typhoonMessages.js';
import { buildSolarTermMessage } from '../../presentation/solarTermMessages.js';
import {
  askCityMessage,
  defaultCitySavedMessage,
  forecastDaysMessage,
  helpMessage,
  outfitVariantMessage,
  pushNeedsDefaultCityMessage,
  pushSettingsMessage,
  pushToggledMessage,
  unavailableMessage,
  unknownCityMessage,
  welcomeMessage,
} from '../../presentation/promptMessages.js';
import { textMessage } from '../../presentation/components.js';
import { normalizeCityName } from '../../utils/text.js';
import { toLocalDateTime } from '../../utils/time.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { CITY_PUSH_FEATURES, parsePostbackData, type ActionRequest, type BotAction } from './actions.js';

export const TEXT_KEYWORDS: ReadonlyMap<string, BotAction> = new Map<string, BotAction>([
  ['即時天氣', 'current_weather'],
  ['今日天氣', 'today_weather'],
  ['未來預報', 'forecast'],
  ['穿搭建議', 'outfit'],
  ['週末天氣', 'weekend_weather'],
  ['颱風', 'typhoon'],
  ['颱風現況', 'typhoon'],
  ['節氣', 'solar_term'],
  ['節氣小知識', 'solar_term'],
  ['設定預設城市', 'set_default_city'],
  ['推播設定', 'push_settings'],
  ['說明', 'help'],
  ['help', 'help'],
]);

/** Forecast outfit advice always covers the next three days. */
const OUTFIT_FORECAST_DAYS = 3;

export interface WeatherBotDependencies {
  messagePort: MessagePort;
  reports: WeatherReportProvider;
  typhoons: TyphoonProvider;
  solarTerms: SolarTermCalendar;
  stations: StationDirectory;
  userSettings: UserSettingsRepository;
  timezone: string;
  /** Clock for date-dependent replies; defaults to the system time. */
  now?: () => Date;
}

type ActionHandler = (userId: string, request: ActionRequest) => Promise<OutgoingMessage[]>;

export class WeatherBot {
  private readonly logger = createLogger({ service: 'WeatherBot' });
  private readonly deps: WeatherBotDependencies;
  private readonly handlers: Readonly<Record<BotAction, ActionHandler>>;

  constructor(deps: WeatherBotDependencies) {
    this.deps = deps;
    this.handlers = {
      current_weather: (userId, request) => this.handleCurrentWeather(userId, request),
      today_weather: (userId, request) => this.handleTodayWeather(userId, request),
      forecast: (userId, request) => this.handleForecast(userId, request),
      outfit: (userId, request) => this.handleOutfit(userId, request),
      weekend_weather: (userId, request) => this.handleWeekendWeather(userId, request),
      typhoon: (userId, request) => this.handleTyphoon(userId, request),
      solar_term: async () => this.handleSolarTerm(),
      set_default_city: (userId, request) => this.handleSetDefaultCity(userId, request),
      push_settings: async (userId) => [this.pushSettings(userId)],
      toggle_push: (userId, request) => this.handleTogglePush(userId, request),
      help: async () => [helpMessage()],
    };
    this.setupEventHandler();
  }

  private setupEventHandler(): void {
    this.deps.messagePort.onEvent(async (event) => {
      const correlationId = generateCorrelationId();
      const logger = this.logger.child({ correlationId, userId: event.userId, type: event.type });
      logger.info('Received event');

      try {
        const messages = await this.handleEvent(event);
        await this.deps.messagePort.sendReply(event.replyToken, messages);
      } catch (error) {
        logger.error({ error }, 'Error handling event');
        await this.deps.messagePort.sendReply(event.replyToken, [
          textMessage('抱歉，處理訊息時發生錯誤，請稍後再試。'),
        ]);
      }
    });
  }

  async handleEvent(event: IncomingEvent): Promise<OutgoingMessage[]> {
    switch (event.type) {
      case 'follow':
        return [welcomeMessage()];
      case 'postback': {
        const request = parsePostbackData(event.data);
        if (!request) {
          this.logger.warn({ data: event.data }, 'Unrecognised postback data');
          return [helpMessage()];
        }
        this.deps.userSettings.clearState(event.userId);
        return this.dispatch(event.userId, request);
      }
      case 'text':
        return this.handleText(event.userId, event.text);
    }
  }

  async dispatch(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    this.logger.debug({ userId, action: request.action }, 'Dispatching action');
    return this.handlers[request.action](userId, request);
  }

  private async handleText(userId: string, input: string): Promise<OutgoingMessage[]> {
    const trimmed = input.trim();
    const action = TEXT_KEYWORDS.get(trimmed);
    if (action) {
      this.deps.userSettings.clearState(userId);
      return this.dispatch(userId, { action });
    }

    const settings = this.deps.userSettings.getOrDefault(userId);
    const city = normalizeCityName(trimmed);
    if (this.deps.stations.has(city)) {
      if (settings.state.kind === 'awaiting_city') {
        this.deps.userSettings.clearState(userId);
        return this.dispatch(userId, { ...settings.state.pending, city });
      }
      return this.dispatch(userId, { action: 'today_weather', city });
    }

    if (settings.state.kind === 'awaiting_city') {
      return [unknownCityMessage(trimmed)];
    }
    return [helpMessage()];
  }

  /**
   * Picks the county for a request: the one it names, else the user's default.
   * With neither, the request is parked until the user sends a county.
   */
  private resolveCity(userId: string, request: ActionRequest): { city: string } | { reply: OutgoingMessage[] } {
    if (request.city) {
      const city = normalizeCityName(request.city);
      return this.deps.stations.has(city) ? { city } : { reply: [unknownCityMessage(request.city)] };
    }

    const defaultCity = this.deps.userSettings.getOrDefault(userId).defaultCity;
    if (defaultCity) {
      return { city: defaultCity };
    }
    return { reply: this.askForCity(userId, request) };
  }

  private askForCity(userId: string, pending: ActionRequest): OutgoingMessage[] {
    this.deps.userSettings.setState(userId, { kind: 'awaiting_city', pending });
    return [askCityMessage(pending)];
  }

  private async handleCurrentWeather(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    const resolved = this.resolveCity(userId, request);
    if ('reply' in resolved) return resolved.reply;

    const result = await this.deps.reports.getCurrentReport(resolved.city);
    return renderReport(result, resolved.city, (report) => [buildCurrentWeatherMessage(report)]);
  }

  private async handleTodayWeather(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    const resolved = this.resolveCity(userId, request);
    if ('reply' in resolved) return resolved.reply;

    const result = await this.deps.reports.getTodayReport(resolved.city);
    return renderReport(result, resolved.city, (report) => [buildTodayWeatherMessage(report)]);
  }

  private async handleForecast(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    const resolved = this.resolveCity(userId, request);
    if ('reply' in resolved) return resolved.reply;

    if (request.days === undefined) {
      return [forecastDaysMessage(resolved.city)];
    }
    const result = await this.deps.reports.getForecastReport(resolved.city, request.days);
    return renderReport(result, resolved.city, (report) => [buildForecastMessage(report)]);
  }

  private async handleOutfit(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    const resolved = this.resolveCity(userId, request);
    if ('reply' in resolved) return resolved.reply;
    const { city } = resolved;

    switch (request.variant) {
      case undefined:
        return [outfitVariantMessage(city)];
      case 'current':
        return renderReport(await this.deps.reports.getCurrentReport(city), city, (report) => [
          buildCurrentOutfitMessage(report),
        ]);
      case 'today':
        return renderReport(await this.deps.reports.getTodayReport(city), city, (report) => [
          buildTodayOutfitMessage(report),
        ]);
      case 'forecast':
        return renderReport(await this.deps.reports.getForecastReport(city, OUTFIT_FORECAST_DAYS), city, (report) => [
          buildForecastOutfitMessage(report),
        ]);
    }
  }

  private async handleWeekendWeather(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    const resolved = this.resolveCity(userId, request);
    if ('reply' in resolved) return resolved.reply;

    const result = await this.deps.reports.getWeekendReport(resolved.city);
    return renderReport(result, resolved.city, (report) => [buildWeekendMessage(report)]);
  }

  /** Hazard alerts follow the named county, else the default one, else every county. */
  private async handleTyphoon(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    let county = this.deps.userSettings.getOrDefault(userId).defaultCity;
    if (request.city) {
      const city = normalizeCityName(request.city);
      if (!this.deps.stations.has(city)) return [unknownCityMessage(request.city)];
      county = city;
    }

    const result = await this.deps.typhoons.getTyphoonReport(county, this.now());
    if (result.status !== 'ok') return [typhoonUnavailableMessage()];

    const { typhoon, hazards } = result.report;
    return typhoon ? [buildTyphoonMessage(typhoon, hazards, county)] : [noTyphoonMessage()];
  }

  private handleSolarTerm(): OutgoingMessage[] {
    const today = toLocalDateTime(this.now(), this.deps.timezone).date;
    const term = this.deps.solarTerms.currentTerm(today);
    if (!term) {
      this.logger.warn({ today }, 'No solar term found');
      return [textMessage('目前無法取得節氣資訊。')];
    }
    return [buildSolarTermMessage(term)];
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async handleSetDefaultCity(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    if (!request.city) {
      return this.askForCity(userId, { action: 'set_default_city' });
    }
    const city = normalizeCityName(request.city);
    if (!this.deps.stations.has(city)) {
      return [unknownCityMessage(request.city)];
    }

    this.deps.userSettings.setDefaultCity(userId, city);
    this.logger.info({ userId, city }, 'Default city saved');
    return [defaultCitySavedMessage(city)];
  }

  private async handleTogglePush(userId: string, request: ActionRequest): Promise<OutgoingMessage[]> {
    if (!request.feature) {
      return [this.pushSettings(userId)];
    }
    const settings = this.deps.userSettings.getOrDefault(userId);
    const enabled = request.enabled ?? !settings.push[request.feature];

    if (enabled && CITY_PUSH_FEATURES.has(request.feature) && !settings.defaultCity) {
      return [pushNeedsDefaultCityMessage()];
    }

    this.deps.userSettings.setPushEnabled(userId, request.feature, enabled);
    this.logger.info({ userId, feature: request.feature, enabled }, 'Push setting changed');
    return [pushToggledMessage(request.feature, enabled), this.pushSettings(userId)];
  }

  private pushSettings(userId: string): OutgoingMessage {
    const settings = this.deps.userSettings.getOrDefault(userId);
    return pushSettingsMessage({ defaultCity: settings.defaultCity, push: settings.push });
  }
}

function renderReport<T>(
  result: ReportResult<T>,
  city: string,
  render: (report: T) => OutgoingMessage[]
): OutgoingMessage[] {
  return result.status === 'ok' ? render(result.report) : [unavailableMessage(result.reason, city)];
}
