const CURRENCY_CODE = /^[A-Z]{3}$/;

/** Display an amount in the dataset's currency; without a known ISO code, a plain two-decimal number. */
export const formatAmount = (value: number, currency?: string | null, locale = 'en-US') => {
  const code = currency?.trim().toUpperCase();
  if (code && CURRENCY_CODE.test(code)) {
    try {
      return new Intl.NumberFormat(locale, { style: 'currency', currency: code }).format(value);
    } catch (err) {
      console.warn(`Unsupported currency '${code}', formatting as a number:`, err);
    }
  }
  return new Intl.NumberFormat(locale, { minimumFractionDigits: 2, maximumFractionDigits: 2 }).format(value);
};
