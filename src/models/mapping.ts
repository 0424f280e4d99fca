export const DEFAULT_ID_LENGTH = 5;
export const MAX_ID_LENGTH = 15; // 10^15 stays below Number.MAX_SAFE_INTEGER
export const DEFAULT_RETENTION_SECONDS = 60 * 60 * 24 * 3;

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
