/**
 * Plain UTF-16 code unit order. Independent of the host locale, so the
 * same labels sort the same way everywhere ("Online" < "Retail" < "online").
 */
export function compareCodepoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
