const formatters = new Map<number, Intl.NumberFormat>();

function numberFormat(digits: number): Intl.NumberFormat {
  let f = formatters.get(digits);
  if (!f) {
    f = new Intl.NumberFormat("en-US", {
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    });
    formatters.set(digits, f);
  }
  return f;
}

/** `$1,234` / `-$1,234.50` */
export function formatCurrency(n: number, digits = 0): string {
  if (!Number.isFinite(n)) return "NaN";
  const body = numberFormat(digits).format(Math.abs(n));
  return n < 0 && body !== numberFormat(digits).format(0) ? `-$${body}` : `$${body}`;
}

export function formatCount(n: number): string {
  if (!Number.isFinite(n)) return "NaN";
  return numberFormat(0).format(Math.trunc(n));
}

// Values that round to zero print without a sign.
export function formatPercent(fraction: number, digits = 0): string {
  if (!Number.isFinite(fraction)) return "NaN";
  const body = numberFormat(digits).format(Math.abs(fraction * 100));
  return fraction < 0 && body !== numberFormat(digits).format(0) ? `-${body}%` : `${body}%`;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
