import type { TransformFnParams } from 'class-transformer';

/** Query-string integer; leaves junk untouched so `@IsInt` reports it. */
export const toOptionalInt = ({ value }: TransformFnParams): unknown => {
  const raw: unknown = value;
  if (raw === null || raw === undefined || raw === '') return undefined;
  const num = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(num) ? Math.floor(num) : raw;
};

/** Accepts `1/0`, `true/false`, `yes/no`, `on/off`. */
export const toOptionalBoolean = ({ value }: TransformFnParams): unknown => {
  const raw: unknown = value;
  if (raw === null || raw === undefined || raw === '') return undefined;
  if (typeof raw === 'boolean') return raw;
  if (typeof raw === 'string') {
    const lowered = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
    if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
  }
  return raw;
};

export const toLowerTrimmed = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;
