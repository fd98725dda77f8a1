export function utcIsoSeconds(date: Date): string {
  const iso = date.toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD-HHMMSS` in UTC, used to qualify report file names. */
export function runStamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}-${time}`;
}
