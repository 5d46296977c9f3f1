import type {
  DailyWeatherRecord,
  OutfitAdvice,
  OutfitImage,
  OutfitInputs,
  RawObservationRecord,
} from '../weather/types.js';
import { approximateApparentTemperature, uvCategory, windSpeedToBeaufort } from '../weather/units.js';
import {
  CALM_WIND_ADVICE,
  DRY_AIR_ADVICE,
  ESTIMATED_TEMPERATURE_ADVICE,
  FALLBACK_ADVICE,
  HUMID_TEMPERATURE_ADVICE,
  LIGHT_WIND_ADVICE,
  RAIN_ADVICE,
  TEMPERATURE_ADVICE,
  UV_ADVICE,
  moderateWindAdvice,
  strongWindAdvice,
} from './adviceText.js';

/**
 * How precipitation is judged: forecasts carry a probability, observations
 * carry the rainfall measured so far.
 */
export type PrecipitationMode = 'probability' | 'observed';

const RAIN_IMAGES: ReadonlySet<OutfitImage> = new Set(['HEAVY_RAIN', 'RAINY', 'LIGHT_RAIN']);
const COLD_IMAGES: ReadonlySet<OutfitImage> = new Set(['CHILLY', 'COLD', 'FREEZING']);

const HUMID_THRESHOLD = 75;
const DRY_THRESHOLD = 40;
const HEAVY_RAIN_PROBABILITY = 50;
const HEAVY_RAIN_AMOUNT_MM = 5;

interface AdviceDraft {
  lines: string[];
  image: OutfitImage;
}

function applyTemperatureRule(draft: AdviceDraft, inputs: OutfitInputs): void {
  const feelsLike = inputs.apparentTemperature;
  if (feelsLike !== null) {
    const humid = inputs.humidity !== null && inputs.humidity >= HUMID_THRESHOLD;
    if (feelsLike >= 32) {
      draft.lines.push(humid ? HUMID_TEMPERATURE_ADVICE.SCORCHING : TEMPERATURE_ADVICE.SCORCHING);
      draft.image = 'HOT';
    } else if (feelsLike >= 28) {
      draft.lines.push(humid ? HUMID_TEMPERATURE_ADVICE.HOT : TEMPERATURE_ADVICE.HOT);
      draft.image = 'HOT';
    } else if (feelsLike >= 24) {
      draft.lines.push(humid ? HUMID_TEMPERATURE_ADVICE.WARM : TEMPERATURE_ADVICE.WARM);
      draft.image = 'WARM';
    } else if (feelsLike >= 19) {
      draft.lines.push(TEMPERATURE_ADVICE.COOL);
      draft.image = 'COOL';
    } else if (feelsLike >= 14) {
      draft.lines.push(TEMPERATURE_ADVICE.CHILLY);
      draft.image = 'CHILLY';
    } else if (feelsLike >= 10) {
      draft.lines.push(TEMPERATURE_ADVICE.COLD);
      draft.image = 'COLD';
    } else {
      draft.lines.push(TEMPERATURE_ADVICE.FREEZING);
      draft.image = 'FREEZING';
    }
    return;
  }

  const bounds = [inputs.minTemperature, inputs.maxTemperature].filter(
    (value): value is number => value !== null
  );
  if (bounds.length === 0) return;
  const midpoint = bounds.reduce((sum, value) => sum + value, 0) / bounds.length;
  if (midpoint >= 28) {
    draft.lines.push(ESTIMATED_TEMPERATURE_ADVICE.HOT);
    draft.image = 'HOT';
  } else if (midpoint >= 22) {
    draft.lines.push(ESTIMATED_TEMPERATURE_ADVICE.MILD);
    draft.image = 'WARM';
  } else {
    draft.lines.push(ESTIMATED_TEMPERATURE_ADVICE.COOL);
    draft.image = 'CHILLY';
  }
}

function applyDryAirRule(draft: AdviceDraft, inputs: OutfitInputs): void {
  if (inputs.humidity !== null && inputs.humidity <= DRY_THRESHOLD) {
    draft.lines.push(DRY_AIR_ADVICE);
  }
}

function applyPrecipitationRule(draft: AdviceDraft, inputs: OutfitInputs, mode: PrecipitationMode): void {
  const weather = inputs.weather ?? '';
  const heavyKeyword = weather.includes('豪雨') || weather.includes('大雨');
  const rainKeyword = weather.includes('雨');

  const heavy =
    heavyKeyword ||
    (mode === 'probability'
      ? inputs.precipitationProbability !== null && inputs.precipitationProbability > HEAVY_RAIN_PROBABILITY
      : inputs.precipitationAmount !== null && inputs.precipitationAmount > HEAVY_RAIN_AMOUNT_MM);
  const measurable =
    mode === 'probability'
      ? inputs.precipitationProbability !== null && inputs.precipitationProbability > 0
      : inputs.precipitationAmount !== null && inputs.precipitationAmount > 0;

  if (heavy) {
    draft.lines.push(RAIN_ADVICE.HEAVY);
    draft.image = 'HEAVY_RAIN';
  } else if (weather.includes('午後雷陣雨')) {
    draft.lines.push(RAIN_ADVICE.AFTERNOON_THUNDERSTORM);
    draft.image = 'LIGHT_RAIN';
  } else if (measurable && (rainKeyword || mode === 'observed')) {
    draft.lines.push(RAIN_ADVICE.MODERATE);
    draft.image = 'RAINY';
  } else if (rainKeyword) {
    draft.lines.push(RAIN_ADVICE.BRIEF_SHOWER);
    draft.image = 'LIGHT_RAIN';
  }
}

function applyWindRule(draft: AdviceDraft, inputs: OutfitInputs): void {
  const scale = inputs.windScale;
  if (scale === null) return;
  if (scale >= 7) {
    draft.lines.push(strongWindAdvice(scale));
    if (!RAIN_IMAGES.has(draft.image)) {
      draft.image = 'WINDY';
    }
  } else if (scale >= 4) {
    draft.lines.push(moderateWindAdvice(scale));
  } else if (scale === 3) {
    draft.lines.push(LIGHT_WIND_ADVICE);
  } else {
    draft.lines.push(CALM_WIND_ADVICE);
  }
}

function applyUvRule(draft: AdviceDraft, inputs: OutfitInputs): void {
  const uv = inputs.uvIndex;
  if (uv === null) return;
  if (uv >= 8) {
    draft.lines.push(uv >= 11 ? UV_ADVICE.DANGEROUS : UV_ADVICE.EXCESSIVE);
    if (inputs.apparentTemperature !== null && inputs.apparentTemperature >= 25) {
      draft.lines.push(UV_ADVICE.PROTECTIVE_CLOTHING);
    }
    if (!RAIN_IMAGES.has(draft.image) && !COLD_IMAGES.has(draft.image)) {
      draft.image = 'HIGH_UVI';
    }
  } else if (uv >= 6) {
    draft.lines.push(UV_ADVICE.HIGH);
  } else if (uv >= 3) {
    draft.lines.push(UV_ADVICE.MODERATE);
  } else {
    draft.lines.push(UV_ADVICE.LOW);
  }
}

/**
 * Runs the outfit rules in their fixed order: temperature (with the humidity
 * wording), dry air, precipitation, wind, UV. Sentences only accumulate;
 * the image is overwritten by later rules according to their priority.
 */
export function applyOutfitRules(inputs: OutfitInputs, mode: PrecipitationMode = 'probability'): OutfitAdvice {
  const draft: AdviceDraft = { lines: [], image: 'DEFAULT' };

  applyTemperatureRule(draft, inputs);
  applyDryAirRule(draft, inputs);
  applyPrecipitationRule(draft, inputs, mode);
  applyWindRule(draft, inputs);
  applyUvRule(draft, inputs);

  if (draft.lines.length === 0) {
    draft.lines.push(FALLBACK_ADVICE);
    if (draft.image === 'DEFAULT') {
      draft.image = 'COMFORTABLE';
    }
  }

  return { lines: draft.lines, image: draft.image };
}

/** Derives rule inputs from one station reading. */
export function observationOutfitInputs(observation: RawObservationRecord): OutfitInputs {
  const temperature = observation.airTemperature;
  const humidity = observation.relativeHumidity;
  const apparentTemperature =
    temperature === null
      ? null
      : humidity === null
        ? temperature
        : approximateApparentTemperature(temperature, humidity);
  const uv = uvCategory(observation.uvIndex);

  return {
    apparentTemperature,
    maxTemperature: temperature,
    minTemperature: temperature,
    humidity,
    precipitationProbability: null,
    precipitationAmount: observation.precipitation,
    weather: observation.weather,
    windScale: observation.windSpeed === null ? null : windSpeedToBeaufort(observation.windSpeed),
    uvIndex: uv.index >= 0 ? uv.index : null,
  };
}

export function adviseCurrentOutfit(observation: RawObservationRecord): OutfitAdvice {
  return applyOutfitRules(observationOutfitInputs(observation), 'observed');
}

/** Today's inputs are assembled by the caller from the 36-hour and hourly forecasts. */
export function adviseTodayOutfit(inputs: OutfitInputs): OutfitAdvice {
  return applyOutfitRules(inputs, 'probability');
}

export function adviseForecastOutfit(record: DailyWeatherRecord): OutfitAdvice {
  return applyOutfitRules(record.outfitInputs, 'probability');
}
