export function formatJsonReport(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
