import { load } from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { isText } from 'domhandler';
import type { CardTransaction } from '../entities/Transaction.js';
import { normalizeWhitespace, parseLocaleAmount } from './AmountParser.js';

export type BalanceStrategyName = 'caption' | 'position' | 'elimination';

export interface ExtractionResult {
  balance: number | null;
  transactions: CardTransaction[];
  lastTransaction: CardTransaction | null;
  strategy: BalanceStrategyName | null;
  /** First visible figures on the page, filled only when no strategy found a balance. */
  candidates: string[];
  strategyErrors: string[];
}

interface BalanceStrategy {
  name: BalanceStrategyName;
  locate($: CheerioAPI): number | null;
}

const BALANCE_HEADING = 'h2.dnb-h--large';
const NUMBER_FORMAT = 'span.dnb-number-format';
const NUMBER_VISIBLE = 'span.dnb-number-format__visible';
const MAX_CAPTION_DEPTH = 10;
const MAX_CANDIDATES = 5;

const balanceCaption = /^saldo$/i;
const transactionsMarker = /Viser.*siste transaksjoner/i;

const MONTH_NAMES = new Set([
  'januar',
  'februar',
  'mars',
  'april',
  'mai',
  'juni',
  'juli',
  'august',
  'september',
  'oktober',
  'november',
  'desember',
]);

const readNumberFormat = (numberFormat: Cheerio<Element>): number | null => {
  const visible = numberFormat.find(NUMBER_VISIBLE).first();
  if (visible.length === 0) {
    return null;
  }

  return parseLocaleAmount(visible.text());
};

const readHeading = (heading: Cheerio<Element>): number | null => {
  const numberFormat = heading.find(NUMBER_FORMAT).first();
  if (numberFormat.length === 0) {
    return null;
  }

  return readNumberFormat(numberFormat);
};

const findMarkerIndex = (elements: Element[]): number => {
  return elements.findIndex((element) =>
    element.children.some((child) => isText(child) && transactionsMarker.test(child.data)),
  );
};

// A caption paragraph ("Saldo") and the large heading that shares an ancestor with it.
const captionStrategy: BalanceStrategy = {
  name: 'caption',
  locate($) {
    const caption = $('p')
      .filter((_, element) => balanceCaption.test($(element).text().trim()))
      .first();

    if (caption.length === 0) {
      return null;
    }

    let ancestor = caption.parent();
    for (let depth = 0; depth < MAX_CAPTION_DEPTH && ancestor.length > 0; depth += 1) {
      const heading = ancestor.find(BALANCE_HEADING).first();
      if (heading.length > 0) {
        const value = readHeading(heading);
        if (value !== null) {
          return value;
        }
      }

      ancestor = ancestor.parent();
    }

    return null;
  },
};

// Headline figures that come before the "Viser N siste transaksjoner" section, outside table rows.
const positionStrategy: BalanceStrategy = {
  name: 'position',
  locate($) {
    const elements = $<Element, '*'>('*').toArray();
    const markerIndex = findMarkerIndex(elements);
    if (markerIndex === -1) {
      return null;
    }

    const preceding = new Set(elements.slice(0, markerIndex));

    for (const numberFormat of $(NUMBER_FORMAT).toArray()) {
      if (!preceding.has(numberFormat)) {
        continue;
      }

      const node = $(numberFormat);
      if (node.closest(BALANCE_HEADING).length === 0 || node.closest('tr').length > 0) {
        continue;
      }

      const value = readNumberFormat(node);
      if (value !== null) {
        return value;
      }
    }

    return null;
  },
};

// Transactions live in tables, so the first positive headline figure outside any table is the balance.
const eliminationStrategy: BalanceStrategy = {
  name: 'elimination',
  locate($) {
    for (const heading of $(BALANCE_HEADING).toArray()) {
      const node = $(heading);
      if (node.closest('table').length > 0) {
        continue;
      }

      const value = readHeading(node);
      if (value !== null && value > 0) {
        return value;
      }
    }

    return null;
  },
};

export const BALANCE_STRATEGIES: readonly BalanceStrategy[] = [captionStrategy, positionStrategy, eliminationStrategy];

const isMonthHeading = (date: string): boolean =>
  date
    .split(' ')
    .some((token) => MONTH_NAMES.has(token.toLowerCase().replace(/[^\p{L}]/gu, '')));

export const extractTransactions = ($: CheerioAPI): CardTransaction[] => {
  const table = $('table[class*="dnb-table"]').first();
  const transactions: CardTransaction[] = [];

  table.find('tr[class*="dnb-table__tr"]').each((_, row) => {
    const cells = $(row);

    // Month group headers ("Desember 2025") are the only rows rendered with td cells.
    if (cells.find('td.dnb-table__td').length > 0) {
      return;
    }

    const dateParts: string[] = [];
    const weekday = cells.find('span[class*="dnb-span"]').first();
    if (weekday.length > 0) {
      dateParts.push(normalizeWhitespace(weekday.text()));
    }
    const dayOfMonth = cells.find('p[class*="dnb-p--bold"]').first();
    if (dayOfMonth.length > 0) {
      dateParts.push(normalizeWhitespace(dayOfMonth.text()));
    }
    const date = dateParts.join(' ');

    let description = '';
    cells.find('p.dnb-p').each((__, paragraph) => {
      const node = $(paragraph);
      if (node.hasClass('dnb-p--bold')) {
        return;
      }

      const text = normalizeWhitespace(node.text());
      if (text && !dateParts.includes(text)) {
        description = text;
        return false;
      }
    });

    const amountNode = cells.find(NUMBER_VISIBLE).first();
    const amount = amountNode.length > 0 ? normalizeWhitespace(amountNode.text()) : '';

    if ((description || amount) && !isMonthHeading(date)) {
      transactions.push({ date, description, amount });
    }
  });

  return transactions;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const extractBalance = (html: string): ExtractionResult => {
  const $ = load(html);
  const strategyErrors: string[] = [];

  let balance: number | null = null;
  let strategy: BalanceStrategyName | null = null;

  for (const candidate of BALANCE_STRATEGIES) {
    try {
      const value = candidate.locate($);
      if (value !== null) {
        balance = value;
        strategy = candidate.name;
        break;
      }
    } catch (error) {
      strategyErrors.push(`${candidate.name}: ${describeError(error)}`);
    }
  }

  let transactions: CardTransaction[] = [];
  try {
    transactions = extractTransactions($);
  } catch (error) {
    strategyErrors.push(`transactions: ${describeError(error)}`);
  }

  const candidates =
    balance === null
      ? $(NUMBER_VISIBLE)
          .slice(0, MAX_CANDIDATES)
          .toArray()
          .map((element) => normalizeWhitespace($(element).text()))
      : [];

  return {
    balance,
    transactions,
    lastTransaction: transactions[0] ?? null,
    strategy,
    candidates,
    strategyErrors,
  };
};
