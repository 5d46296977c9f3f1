import cron, { type ScheduledTask } from 'node-cron';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { WeatherPushJob } from './WeatherPushJob.js';
import type { BroadcastPushJob } from './BroadcastPushJob.js';

const logger = createLogger({ component: 'scheduler' });

const FRIDAY = 5;

/** `HH:MM` → `M H * * <dayOfWeek>` */
export function toCronExpression(time: string, dayOfWeek: number | '*' = '*'): string {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new ConfigError(`Invalid push time format: ${time}`);
  }
  return `${minute} ${hour} * * ${dayOfWeek}`;
}

export function everyMinutesCron(minutes: number): string {
  if (!Number.isInteger(minutes) || minutes < 1 || minutes > 59) {
    throw new ConfigError(`Invalid check interval: ${minutes}`);
  }
  return `*/${minutes} * * * *`;
}

interface RunnableJob {
  run(): Promise<unknown>;
}

function scheduleJob(name: string, job: RunnableJob, cronExpression: string, timezone: string): ScheduledTask {
  logger.info({ job: name, cronExpression, timezone }, 'Scheduling push job');
  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error) => {
        logger.error({ error, job: name }, 'Push job failed');
      });
    },
    { timezone }
  );
}

export interface WeatherPushSchedule {
  dailyJob: WeatherPushJob;
  weekendJob: WeatherPushJob;
  typhoonJob: BroadcastPushJob;
  solarTermJob: BroadcastPushJob;
  dailyPushTime: string;
  weekendPushTime: string;
  solarTermPushTime: string;
  typhoonCheckIntervalMinutes: number;
  timezone: string;
}

export function scheduleWeatherPushes(schedule: WeatherPushSchedule): ScheduledTask[] {
  return [
    scheduleJob('daily_weather', schedule.dailyJob, toCronExpression(schedule.dailyPushTime), schedule.timezone),
    scheduleJob(
      'weekend_weather',
      schedule.weekendJob,
      toCronExpression(schedule.weekendPushTime, FRIDAY),
      schedule.timezone
    ),
    scheduleJob(
      'typhoon_alert',
      schedule.typhoonJob,
      everyMinutesCron(schedule.typhoonCheckIntervalMinutes),
      schedule.timezone
    ),
    scheduleJob(
      'solar_terms',
      schedule.solarTermJob,
      toCronExpression(schedule.solarTermPushTime),
      schedule.timezone
    ),
  ];
}
