export const TEMPERATURE_ADVICE = {
  SCORCHING: '天氣極度炎熱，請務必穿著最輕薄、透氣的衣物。',
  HOT: '天氣炎熱，建議穿著涼爽的短袖、短褲或裙子。',
  WARM: '天氣溫暖舒適，穿著短袖即可，室內外溫差大，可備薄外套。',
  COOL: '天氣涼爽，建議穿著薄長袖上衣或薄外套，夜晚可能稍涼。',
  CHILLY: '天氣微涼，建議穿著毛衣或較厚的外套，注意保暖。',
  COLD: '天氣寒冷，請穿著厚外套、毛衣，務必注意保暖。',
  FREEZING: '天氣非常寒冷，建議穿著羽絨外套、厚毛衣、圍巾、手套，做好全面保暖！',
} as const;

/** Replaces the base sentence of the warm bands when the air is humid. */
export const HUMID_TEMPERATURE_ADVICE = {
  SCORCHING: '天氣極度炎熱又潮濕，體感非常悶熱，請穿著最輕薄、吸濕排汗的衣物。',
  HOT: '天氣炎熱潮濕，建議穿著透氣排汗的短袖、短褲或裙子。',
  WARM: '天氣溫暖但濕度偏高，建議穿著透氣寬鬆的短袖，可備薄外套。',
} as const;

/** Used when only air temperature is known. */
export const ESTIMATED_TEMPERATURE_ADVICE = {
  HOT: '缺少體感溫度資料，依氣溫推估天氣偏熱，建議穿著輕薄透氣的衣物。',
  MILD: '缺少體感溫度資料，依氣溫推估天氣溫和，建議穿著短袖並備薄外套。',
  COOL: '缺少體感溫度資料，依氣溫推估天氣偏涼，建議穿著長袖或外套。',
} as const;

export const DRY_AIR_ADVICE = '天氣較乾燥，可考慮攜帶保濕用品。';

export const RAIN_ADVICE = {
  HEAVY: '降雨機率極高，外出務必攜帶雨具，建議穿著防水性佳的衣物及鞋子。',
  AFTERNOON_THUNDERSTORM: '午後有雷陣雨，外出請攜帶雨具。',
  MODERATE: '降雨機率較高，建議攜帶雨具，穿著防潑水衣物或備薄外套。',
  BRIEF_SHOWER: '可能有短暫降雨，建議攜帶雨具。',
} as const;

export function strongWindAdvice(scale: number): string {
  return `風勢強勁（${scale}級），風寒效應明顯，請穿著防風外套並注意保暖。`;
}

export function moderateWindAdvice(scale: number): string {
  return `風勢稍強（${scale}級），體感溫度可能略低，可備一件薄防風外套。`;
}

export const LIGHT_WIND_ADVICE = '微風吹拂（3級），體感略為涼爽。';
export const CALM_WIND_ADVICE = '風力微弱，穿著不需特別考慮風的影響。';

export const UV_ADVICE = {
  DANGEROUS: '紫外線達危險等級，盡量避免在戶外曝曬，外出務必撐傘、戴帽並擦防曬乳。',
  EXCESSIVE: '紫外線過量，外出務必防曬，戴帽、太陽眼鏡、擦防曬乳，避免長時間曝曬。',
  PROTECTIVE_CLOTHING: '可考慮穿著防曬衣物。',
  HIGH: '紫外線高，外出建議做好防曬措施。',
  MODERATE: '紫外線中等，適度防曬即可。',
  LOW: '紫外線量低，無需特別防曬。',
} as const;

export const FALLBACK_ADVICE = '今天天氣狀況良好，穿著舒適即可。';
