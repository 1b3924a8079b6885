/**
 * UI-level default: nothing selected means everything available.
 * The core filter never does this itself.
 */
export function resolveSelection(
  available: readonly string[],
  selected?: readonly string[] | null
): string[] {
  if (!selected || selected.length === 0) return [...available];
  return [...selected];
}

/** `"Online, Retail"` -> `["Online", "Retail"]` */
export function parseSelectionList(raw: string | undefined): string[] | undefined {
  if (raw == null) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
