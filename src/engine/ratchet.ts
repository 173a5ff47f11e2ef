export function ratchet(existing: number | undefined, candidate: number): number {
  const floor = existing !== undefined && Number.isFinite(existing) ? Math.max(0, existing) : 0;
  const next = Number.isFinite(candidate) ? Math.max(0, Math.floor(candidate)) : 0;
  return Math.max(floor, next);
}

