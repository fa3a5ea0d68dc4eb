import type { CurrencyCode, CurrencySymbol, PayPeriod, SalaryInfo } from '@jobrows/row-sdk';

export interface Currency {
  code: CurrencyCode;
  symbol: CurrencySymbol;
}

/** Where the salary text came from. Description text only accepts amounts that look like pay. */
export type SalaryOrigin = 'column' | 'description';

export interface SalaryAmountMatch {
  rule: string;
  display: string;
  start: number;
  end: number;
  min: number;
  max: number;
}

interface AmountRule {
  name: string;
  origins: readonly SalaryOrigin[];
  accepts(match: RegExpMatchArray, text: string): boolean;
}

const CURRENCIES: readonly Currency[] = [
  { code: 'USD', symbol: '$' },
  { code: 'GBP', symbol: '£' },
  { code: 'EUR', symbol: '€' },
];

const CURRENCY_PATTERN = /[$£€]|\b(?:usd|gbp|eur)\b/i;

const NUMBER = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?`;
const CURRENCY_MARK = String.raw`[$£€]|\b(?:usd|gbp|eur)\b`;
const RANGE_SEPARATOR = String.raw`\s*(?:-|–|—|\bto\b)\s*`;

function moneyToken(side: 'low' | 'high'): string {
  return (
    String.raw`(?<![\d.,])(?:(?<${side}Prefix>${CURRENCY_MARK})\s?)?` +
    String.raw`(?<${side}>${NUMBER})(?<${side}Thousands>k\b)?` +
    String.raw`(?:\s?(?<${side}Suffix>\b(?:usd|gbp|eur)\b))?`
  );
}

/** A single amount or a low–high range, each side optionally carrying a currency mark. */
const MONEY_SOURCE = `${moneyToken('low')}(?:${RANGE_SEPARATOR}${moneyToken('high')})?`;

const PERIOD_FOLLOWER =
  /^\s*(?:(?:per|an?)\s+(?:hour|hr|day|week|month|year|annum)\b|\/\s*(?:hour|hr|h|day|week|wk|month|mo|year|yr)\b|(?:hourly|daily|weekly|monthly|yearly|annually|pcm)\b|p\.a\.?|pa\b)/i;

/**
 * Period keywords, checked in this order. The first period with any hit wins.
 */
export const PERIOD_RULES: ReadonlyArray<{ period: PayPeriod; pattern: RegExp }> = [
  { period: 'Hour', pattern: /\bper\s*(?:hour|hr)\b|\/\s*(?:hour|hr|h)\b|\bhourly\b|\ban hour\b|\bp\/h\b/i },
  { period: 'Day', pattern: /\bper\s*day\b|\/\s*day\b|\bdaily\b|\bday rate\b|\bp\/d\b/i },
  { period: 'Week', pattern: /\bper\s*week\b|\/\s*(?:week|wk)\b|\bweekly\b/i },
  { period: 'Month', pattern: /\bper\s*month\b|\/\s*(?:month|mo)\b|\bmonthly\b|\bpcm\b/i },
  { period: 'Year', pattern: /\bper\s*(?:year|annum)\b|\/\s*(?:year|yr)\b|\bannum\b|\bannual(?:ly)?\b|\byearly\b|\bp\.a\.?|\bpa\b|\ba year\b/i },
];

function hasCurrencyMark(match: RegExpMatchArray): boolean {
  const groups = match.groups ?? {};
  return Boolean(groups.lowPrefix ?? groups.lowSuffix ?? groups.highPrefix ?? groups.highSuffix);
}

/**
 * Evaluated top-down, first match wins; within a rule the leftmost amount wins.
 */
export const SALARY_AMOUNT_RULES: readonly AmountRule[] = [
  {
    name: 'currency-amount',
    origins: ['column', 'description'],
    accepts: (match) => hasCurrencyMark(match),
  },
  {
    name: 'period-amount',
    origins: ['column', 'description'],
    accepts: (match, text) => {
      const end = (match.index ?? 0) + match[0].length;
      return PERIOD_FOLLOWER.test(text.slice(end));
    },
  },
  {
    name: 'bare-amount',
    origins: ['column'],
    accepts: () => true,
  },
];

export const EMPTY_SALARY: Readonly<SalaryInfo> = Object.freeze({
  display: null,
  min_amount: null,
  max_amount: null,
  currency_code: null,
  currency_symbol: null,
  period: null,
});

function toAmount(raw: string, thousands: boolean): number {
  const value = Number(raw.replace(/,/g, ''));
  return thousands ? value * 1000 : value;
}

function toAmountMatch(rule: string, match: RegExpMatchArray): SalaryAmountMatch | null {
  const groups = match.groups ?? {};
  const low = groups.low;
  if (!low) return null;

  const start = match.index ?? 0;
  const base = { rule, display: match[0], start, end: start + match[0].length };
  const lowAmount = toAmount(low, Boolean(groups.lowThousands));

  const high = groups.high;
  if (!high) {
    return { ...base, min: lowAmount, max: lowAmount };
  }

  const highThousands = Boolean(groups.highThousands);
  const highAmount = toAmount(high, highThousands);
  // "50-60k": the lower bound shares the upper bound's suffix
  const sharedThousands = highThousands && !groups.lowThousands && toAmount(low, false) < toAmount(high, false);
  const adjustedLow = sharedThousands ? lowAmount * 1000 : lowAmount;

  return {
    ...base,
    min: Math.min(adjustedLow, highAmount),
    max: Math.max(adjustedLow, highAmount),
  };
}

/**
 * Locate the salary amount in free text using SALARY_AMOUNT_RULES.
 */
export function findSalaryAmount(text: string, origin: SalaryOrigin): SalaryAmountMatch | null {
  for (const rule of SALARY_AMOUNT_RULES) {
    if (!rule.origins.includes(origin)) continue;

    for (const match of text.matchAll(new RegExp(MONEY_SOURCE, 'gi'))) {
      if (!rule.accepts(match, text)) continue;

      const amount = toAmountMatch(rule.name, match);
      if (amount && Number.isFinite(amount.min) && Number.isFinite(amount.max)) {
        return amount;
      }
    }
  }

  return null;
}

function currencyForMark(mark: string): Currency | null {
  const normalized = mark.toUpperCase();
  return CURRENCIES.find((currency) => currency.code === normalized || currency.symbol === mark) ?? null;
}

/**
 * First currency symbol or code in the text, mapped to both forms.
 */
export function detectCurrency(text: string): Currency | null {
  const match = CURRENCY_PATTERN.exec(text);
  return match ? currencyForMark(match[0]) : null;
}

export function detectPeriod(text: string): PayPeriod | null {
  for (const { period, pattern } of PERIOD_RULES) {
    if (pattern.test(text)) return period;
  }
  return null;
}

const DESCRIPTION_WINDOW = 40;

function buildSalary(amount: SalaryAmountMatch, context: string): SalaryInfo {
  const currency = detectCurrency(amount.display) ?? detectCurrency(context);
  return {
    display: amount.display,
    min_amount: amount.min,
    max_amount: amount.max,
    currency_code: currency?.code ?? null,
    currency_symbol: currency?.symbol ?? null,
    period: detectPeriod(context),
  };
}

/**
 * Parse pay information from a dedicated salary column, falling back to the
 * description when the column carries no amount ("Competitive", "DOE", empty).
 */
export function parseSalary(salaryText?: string | null, descriptionText?: string | null): SalaryInfo {
  const column = salaryText?.trim() ?? '';
  if (column) {
    const amount = findSalaryAmount(column, 'column');
    if (amount) return buildSalary(amount, column);
  }

  const description = descriptionText?.trim() ?? '';
  if (description) {
    const amount = findSalaryAmount(description, 'description');
    if (amount) {
      const context = description.slice(Math.max(0, amount.start - DESCRIPTION_WINDOW), amount.end + DESCRIPTION_WINDOW);
      return buildSalary(amount, context);
    }
  }

  if (!column) return { ...EMPTY_SALARY };

  const currency = detectCurrency(column);
  return {
    ...EMPTY_SALARY,
    currency_code: currency?.code ?? null,
    currency_symbol: currency?.symbol ?? null,
    period: detectPeriod(column),
  };
}
