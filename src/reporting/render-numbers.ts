/**
 * Number formatting for metric tables.
 */

const VALUE_SIG_FIGS = 3;

/**
 * Format a number for display.
 *
 * - Integers: formatted with commas
 * - Floats: at least 1 decimal place and at least 3 significant figures
 * - NaN (a metric with missing values and `naRm: false`): `NA`
 */
export function defaultRenderNumber(value: number): string {
  if (Number.isNaN(value)) return 'NA';
  if (!Number.isFinite(value)) return value > 0 ? 'Inf' : '-Inf';
  if (Number.isInteger(value)) return formatWithCommas(value, 0);

  const absVal = Math.abs(value);
  const magnitude = Math.floor(Math.log10(absVal));
  const decimals =
    absVal >= 1 ? Math.max(1, VALUE_SIG_FIGS - (magnitude + 1)) : VALUE_SIG_FIGS - 1 - magnitude;
  return formatWithCommas(value, decimals);
}

/**
 * Format a number with a fixed number of decimals, `NA` for NaN.
 */
export function renderFixed(value: number, digits: number): string {
  if (Number.isNaN(value)) return 'NA';
  return formatWithCommas(value, digits);
}

function formatWithCommas(value: number, decimals: number): string {
  const [intDigits = '0', fraction] = Math.abs(value).toFixed(decimals).split('.');
  const intPart = intDigits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  return fraction ? `${sign}${intPart}.${fraction}` : `${sign}${intPart}`;
}
