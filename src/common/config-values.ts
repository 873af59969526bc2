import { ConfigService } from '@nestjs/config';

/** Numeric setting from the environment; falls back when unset or not a number. */
export function getNumberSetting(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : fallback;
}
