import type { OutfitImage } from '../core/weather/types.js';

const IMAGE_BASE_URL = 'https://i.imgur.com';

export const OUTFIT_IMAGE_URLS: Readonly<Record<OutfitImage, string>> = {
  DEFAULT: `${IMAGE_BASE_URL}/current_default.png`,
  HOT: `${IMAGE_BASE_URL}/hot_weather_outfit.png`,
  WARM: `${IMAGE_BASE_URL}/warm_weather_outfit.png`,
  COOL: `${IMAGE_BASE_URL}/cool_weather_outfit.png`,
  CHILLY: `${IMAGE_BASE_URL}/chilly_weather_outfit.png`,
  COLD: `${IMAGE_BASE_URL}/cold_weather_outfit.png`,
  FREEZING: `${IMAGE_BASE_URL}/freezing_weather_outfit.png`,
  HEAVY_RAIN: `${IMAGE_BASE_URL}/heavy_rain.png`,
  RAINY: `${IMAGE_BASE_URL}/rainy_current.png`,
  LIGHT_RAIN: `${IMAGE_BASE_URL}/light_rain.png`,
  WINDY: `${IMAGE_BASE_URL}/windy_outfit.png`,
  HIGH_UVI: `${IMAGE_BASE_URL}/high_uvi.png`,
  COMFORTABLE: `${IMAGE_BASE_URL}/comfortable_weather.png`,
};
