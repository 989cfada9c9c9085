/**
 * Eastern-time accessors.
 *
 * E*TRADE access tokens expire at midnight US/Eastern no matter where the
 * bridge runs, so every date comparison in the token lifecycle goes through
 * an {@link EasternClock}. Tests swap in a fixed clock.
 */

export const EASTERN_TZ = "America/New_York";

export interface EasternClock {
  now(): Date;
  /** Current calendar date in US/Eastern, formatted YYYY-MM-DD. */
  today(): string;
}

interface EasternParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

const partsFormatter = new Intl.DateTimeFormat("en-US", {
  timeZone: EASTERN_TZ,
  hourCycle: "h23",
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit",
});

function easternParts(date: Date): EasternParts {
  const parts: EasternParts = { year: "", month: "", day: "", hour: "", minute: "", second: "" };
  for (const part of partsFormatter.formatToParts(date)) {
    switch (part.type) {
      case "year":
      case "month":
      case "day":
      case "hour":
      case "minute":
      case "second":
        parts[part.type] = part.value;
        break;
    }
  }
  return parts;
}

export function easternDate(date: Date): string {
  const p = easternParts(date);
  return `${p.year}-${p.month}-${p.day}`;
}

/** ISO-8601 timestamp carrying the Eastern UTC offset, e.g. 2026-03-10T09:30:00.000-04:00 */
export function toEasternIso(date: Date): string {
  const p = easternParts(date);
  const ms = date.getUTCMilliseconds();
  const wallClockAsUtc = Date.UTC(
    Number(p.year),
    Number(p.month) - 1,
    Number(p.day),
    Number(p.hour),
    Number(p.minute),
    Number(p.second),
    ms,
  );
  const offsetMin = Math.round((wallClockAsUtc - date.getTime()) / 60_000);
  const sign = offsetMin < 0 ? "-" : "+";
  const abs = Math.abs(offsetMin);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  const millis = String(ms).padStart(3, "0");
  return `${p.year}-${p.month}-${p.day}T${p.hour}:${p.minute}:${p.second}.${millis}${sign}${hh}:${mm}`;
}

export const systemClock: EasternClock = {
  now: () => new Date(),
  today: () => easternDate(new Date()),
};
