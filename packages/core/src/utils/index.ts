export function now(): number {
  return Date.now();
}

/** Seconds since the epoch, the resolution of timestamp columns. */
export function unixTime(): number {
  return Math.floor(Date.now() / 1000);
}
