import { ValidationError } from "@/errors";

import { isValid, parseISO } from "date-fns";

// date-fns validates the calendar fields; this only pins down the accepted shape
const ISO_DATE_TIME_WITH_OFFSET =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})$/;

export interface ParsedIsoString {
  date: Date;
  /** Offset from UTC in minutes, e.g. 180 for +03:00 */
  offsetMinutes: number;
  /** Fractional seconds exactly as written, without the leading dot */
  fraction?: string;
}

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

const formatOffset = (offsetMinutes: number): string => {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
};

const parseOffset = (offset: string): number => {
  if (offset === "Z") return 0;
  const digits = offset.slice(1).replace(":", "");
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
  return offset.startsWith("-") ? -minutes : minutes;
};

/**
 * Parses an ISO-8601 date-time with an explicit offset. Accepts the
 * `+0000` form the Graph API returns as well as `+00:00` and `Z`; impossible
 * dates and times are rejected.
 */
export const parseIsoString = (value: string): ParsedIsoString => {
  const match = ISO_DATE_TIME_WITH_OFFSET.exec(value);
  const date = parseISO(value);
  if (!match || !isValid(date)) {
    throw new ValidationError(`'${value}' is not an ISO-8601 date-time`);
  }

  const [, fraction, offset = "Z"] = match;
  const offsetMinutes = parseOffset(offset);
  if (Math.abs(offsetMinutes) >= 24 * 60) {
    throw new ValidationError(`'${value}' has an out-of-range offset`);
  }

  return { date, offsetMinutes, fraction };
};

/**
 * Re-renders an ISO-8601 string in the canonical `YYYY-MM-DDTHH:mm:ss[.f]+HH:MM`
 * form, keeping the original offset.
 */
export const normalizeIsoString = (value: string): string => {
  const { date, offsetMinutes, fraction } = parseIsoString(value);
  const local = new Date(date.getTime() + offsetMinutes * 60 * 1000);
  const base =
    `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}` +
    `T${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
  const frac = fraction && /[1-9]/.test(fraction) ? `.${fraction}` : "";
  return `${base}${frac}${formatOffset(offsetMinutes)}`;
};

/**
 * Renders a date as UTC with a `+00:00` offset.
 */
export const toUtcIsoString = (date: Date): string => {
  const iso = date.toISOString().replace(/\.000Z$/, "Z");
  return iso.replace(/Z$/, "+00:00");
};

export const utcNowAsIsoString = (): string => toUtcIsoString(new Date());

/**
 * Converts a date into the Zulu-time ISO-8601 string the Graph API accepts for
 * `since` and `until`.
 */
export const dateToFacebookTime = (date: Date): string =>
  date.toISOString().replace(/\.000Z$/, "Z");

/**
 * Throws a ValidationError unless `value` is an ISO-8601 string at UTC.
 */
export const validateUtcIsoString = (value: string): string => {
  const { offsetMinutes } = parseIsoString(value);
  if (offsetMinutes !== 0) {
    throw new ValidationError(
      `'${value}' is not in UTC (offset ${formatOffset(offsetMinutes)})`
    );
  }
  return value;
};
