export { adaptCurrentObservation } from './currentObservation.js';
export { adaptGeneralForecast } from './generalForecast.js';
export { adaptWeeklyForecast } from './weeklyForecast.js';
export { adaptHourlyForecast } from './hourlyForecast.js';
export { adaptUvIndex } from './uvIndex.js';
export { adaptTyphoon } from './typhoon.js';
export { adaptAreaHazards } from './areaHazard.js';
