export function toUtcIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function toFileSafe(isoSeconds: string): string {
  return isoSeconds.replace(/:/g, "-");
}
