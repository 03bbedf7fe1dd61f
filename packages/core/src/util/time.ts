export const DETERMINISTIC_CREATED_AT_ISO = '1970-01-01T00:00:00.000Z' as const;

export function nowIso(deterministic: boolean): string {
  return deterministic ? DETERMINISTIC_CREATED_AT_ISO : new Date().toISOString();
}

export function elapsedMs(startNs: bigint): number {
  return Number(process.hrtime.bigint() - startNs) / 1_000_000;
}

export function observedDurationMs(startNs: bigint): number {
  const elapsedNs = process.hrtime.bigint() - startNs;
  return Number(elapsedNs / 1_000_000n);
}
