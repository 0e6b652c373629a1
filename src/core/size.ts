export function bytesToMB(bytes: number): number {
  return bytes / (1024 * 1024);
}

export function formatMB(bytes: number): string {
  return `${bytesToMB(bytes).toFixed(2)} MB`;
}
