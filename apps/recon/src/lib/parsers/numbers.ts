/**
 * Permissive number parsing for channel exports
 *
 * Accepts currency symbols and codes, thousands separators (comma, dot or
 * space), European decimal commas and accounting negatives "(12.50)".
 * Blank cells and a lone dash read as zero.
 */

const CURRENCY_SYMBOLS = /[$£€¥]/g;
const CURRENCY_CODE = /^[A-Z]{3}\s*|\s*[A-Z]{3}$/i;
const DIGIT_GROUP_SPACES = /(\d)\s+(?=\d)/g;
const PLAIN_NUMBER = /^\d+(\.\d+)?$/;
const COMMA_THOUSANDS = /^\d{1,3}(,\d{3})+$/;
const DOT_THOUSANDS = /^\d{1,3}(\.\d{3})+$/;

/**
 * Resolve thousands/decimal separators to a plain "1234.56" string
 */
function normalizeSeparators(value: string): string | null {
  const lastComma = value.lastIndexOf(',');
  const lastDot = value.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    // Whichever separator comes last is the decimal point
    return lastComma > lastDot
      ? value.replace(/\./g, '').replace(',', '.')
      : value.replace(/,/g, '');
  }

  if (lastComma >= 0) {
    if (COMMA_THOUSANDS.test(value)) return value.replace(/,/g, '');
    if (/^\d+,\d{1,2}$/.test(value)) return value.replace(',', '.');
    return null;
  }

  if (DOT_THOUSANDS.test(value) && value.split('.').length > 2) {
    return value.replace(/\./g, '');
  }

  return value;
}

/**
 * Parse a numeric cell.
 *
 * @returns the number, or null when the cell is not a number
 */
export function parseNumber(raw: string): number | null {
  let value = raw.trim();
  if (value === '' || value === '-') return 0;

  let negative = false;
  if (/^\(.*\)$/.test(value)) {
    negative = true;
    value = value.slice(1, -1).trim();
  }

  value = value.replace(CURRENCY_SYMBOLS, '').replace(CURRENCY_CODE, '').trim();

  if (value.startsWith('-')) {
    negative = !negative;
    value = value.slice(1).trim();
  } else if (value.startsWith('+')) {
    value = value.slice(1).trim();
  }

  // Symbols may sit after the sign: "-$1,200.00"
  value = value.replace(CURRENCY_SYMBOLS, '').replace(DIGIT_GROUP_SPACES, '$1');

  const normalized = normalizeSeparators(value);
  if (normalized === null || !PLAIN_NUMBER.test(normalized)) {
    return null;
  }

  const parsed = parseFloat(normalized);
  return negative && parsed !== 0 ? -parsed : parsed;
}
