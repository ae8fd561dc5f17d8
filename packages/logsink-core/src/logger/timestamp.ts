function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

let lastMillis = Number.NEGATIVE_INFINITY;
let lastMicros = Number.NEGATIVE_INFINITY;

/**
 * 当前时间（Unix 纪元微秒）。
 * 毫秒及以上取系统时钟（跟随 NTP 校时），毫秒以下三位取 hrtime；
 * 同一毫秒内不回退。
 */
export function nowMicros(): number {
  const millis = Date.now();
  const subMillis = Number((process.hrtime.bigint() / 1000n) % 1000n);
  const micros = millis * 1000 + subMillis;
  if (millis === lastMillis && micros < lastMicros) {
    return lastMicros;
  }
  lastMillis = millis;
  lastMicros = micros;
  return micros;
}

/**
 * 格式化为 'YYYY/MM/DD HH:MM:SS.ffffff'（UTC，定宽）
 */
export function formatTimestamp(epochMicros: number): string {
  const seconds = Math.floor(epochMicros / 1_000_000);
  const micros = epochMicros - seconds * 1_000_000;
  const d = new Date(seconds * 1000);
  const date = `${pad(d.getUTCFullYear(), 4)}/${pad(d.getUTCMonth() + 1, 2)}/${pad(d.getUTCDate(), 2)}`;
  const time = `${pad(d.getUTCHours(), 2)}:${pad(d.getUTCMinutes(), 2)}:${pad(d.getUTCSeconds(), 2)}`;
  return `${date} ${time}.${pad(micros, 6)}`;
}

export function timestamp(): string {
  return formatTimestamp(nowMicros());
}
