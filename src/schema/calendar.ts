// =============================================================================
// Calendar — strict yyyy-mm-dd and RFC 3339 readers
// =============================================================================

const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;
const OFFSET = /^([+-])(\d{2}):(\d{2})$/;

/** A UTC instant, or undefined when a field is out of range (Feb 30, 25:00...). */
function utc(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0, ms = 0): Date | undefined {
  if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) return undefined;

  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, ms);
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day ? date : undefined;
}

/** `yyyy-mm-dd` as midnight UTC. */
export function parseDate(text: string): Date | undefined {
  const m = DATE.exec(text);
  if (!m) return undefined;
  return utc(Number(m[1]), Number(m[2]), Number(m[3]));
}

/** `yyyy-mm-ddThh:mm:ss[.fraction](Z|±hh:mm)`; fractions beyond milliseconds are dropped. */
export function parseDateTime(text: string): Date | undefined {
  const m = DATE_TIME.exec(text);
  if (!m) return undefined;

  const ms = m[7] === undefined ? 0 : Number(m[7].slice(0, 3).padEnd(3, "0"));
  const local = utc(Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6]), ms);
  if (!local) return undefined;

  const offset = OFFSET.exec(m[8]);
  if (!offset) return local;
  const hours = Number(offset[2]);
  const minutes = Number(offset[3]);
  if (hours > 23 || minutes > 59) return undefined;

  const sign = offset[1] === "-" ? -1 : 1;
  return new Date(local.getTime() - sign * (hours * 60 + minutes) * 60_000);
}
