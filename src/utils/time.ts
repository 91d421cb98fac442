export function utcIsoSeconds(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** `2024-03-15T08-00-00Z`, usable in file names on every platform. */
export function fileSafeStamp(date: Date = new Date()): string {
  return utcIsoSeconds(date).replace(/:/g, "-");
}
