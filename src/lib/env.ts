import { z } from 'zod';

import {
  WEEKDAY_VOCABULARIES,
  type WeekdayVocabulary,
} from '@/lib/timetable/weekdays';

const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:3000'];
const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const envSchema = z.object({
  ALLOWED_ORIGINS: z.string().optional(),
  TIMETABLE_LOCALE: z.enum(['de', 'en']).optional(),
  TIMETABLE_WEEKDAYS: z
    .string()
    .optional()
    .refine(
      (value) => {
        if (value === undefined) return true;
        const names = splitList(value).map((name) => name.toLowerCase());
        return names.length > 0 && new Set(names).size === names.length;
      },
      { message: 'Expected a comma-separated list of distinct weekday names' },
    ),
  TIMETABLE_PAGE: z.coerce.number().int().positive().optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().optional(),
  TIMETABLE_DEBUG: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export type AppConfig = {
  allowedOrigins: string[];
  weekdays: WeekdayVocabulary;
  pageNumber: number | undefined;
  maxUploadBytes: number;
  debug: boolean;
};

export type RawEnv = Record<string, string | undefined>;

function getRawEnv(): RawEnv {
  return {
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
    TIMETABLE_LOCALE: process.env.TIMETABLE_LOCALE,
    TIMETABLE_WEEKDAYS: process.env.TIMETABLE_WEEKDAYS,
    TIMETABLE_PAGE: process.env.TIMETABLE_PAGE,
    MAX_UPLOAD_BYTES: process.env.MAX_UPLOAD_BYTES,
    TIMETABLE_DEBUG: process.env.TIMETABLE_DEBUG,
  };
}

export function getEnv(raw: RawEnv = getRawEnv()): Env {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Missing/invalid environment variables: ${message}`);
  }
  return parsed.data;
}

export function getConfig(raw: RawEnv = getRawEnv()): AppConfig {
  const env = getEnv(raw);
  const origins = env.ALLOWED_ORIGINS ? splitList(env.ALLOWED_ORIGINS) : [];
  return {
    allowedOrigins: origins.length > 0 ? origins : DEFAULT_ALLOWED_ORIGINS,
    weekdays: env.TIMETABLE_WEEKDAYS
      ? splitList(env.TIMETABLE_WEEKDAYS)
      : WEEKDAY_VOCABULARIES[env.TIMETABLE_LOCALE ?? 'de'],
    pageNumber: env.TIMETABLE_PAGE,
    maxUploadBytes: env.MAX_UPLOAD_BYTES ?? DEFAULT_MAX_UPLOAD_BYTES,
    debug: env.TIMETABLE_DEBUG === '1',
  };
}
