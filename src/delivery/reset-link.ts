export function buildResetUrl(frontendUrl: string, resetPath: string, tokenId: string): string {
  const base = frontendUrl.replace(/\/+$/, '');
  const path = resetPath.startsWith('/') ? resetPath : `/${resetPath}`;
  return `${base}${path}?token=${encodeURIComponent(tokenId)}`;
}

/** Whole minutes left before `expiresAt`, never less than one. */
export function minutesUntil(expiresAt: string, now: Date): number {
  return Math.max(1, Math.ceil((Date.parse(expiresAt) - now.getTime()) / 60_000));
}
