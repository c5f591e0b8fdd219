import type { BalanceChangedNotificationDTO } from '../../../application/dto/BalanceChangedNotificationDTO.js';
import type { CardTransaction } from '../../../domain/entities/Transaction.js';

const amountFormat = new Intl.NumberFormat('nb-NO', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `1234.5` → `1 234,50 kr` (grouping uses the locale's no-break space). */
export const formatKroner = (value: number): string =>
  `${value < 0 ? '-' : ''}${amountFormat.format(Math.abs(value))} kr`;

export const formatSignedKroner = (value: number): string =>
  value < 0 ? formatKroner(value) : `+${formatKroner(value)}`;

// Legacy Telegram Markdown treats these as entity delimiters.
const escapeMarkdown = (text: string): string => text.replace(/([_*`[])/g, '\\$1');

export class MessageFormatter {
  balanceChanged(notification: BalanceChangedNotificationDTO): string {
    const lines = [
      '🔔 *Saldoendring oppdaget!*',
      '',
      `📊 *Ny saldo:* ${formatKroner(notification.currentBalance)}`,
      `📊 *Forrige saldo:* ${formatKroner(notification.previousBalance)}`,
      `📈 *Endring:* ${formatSignedKroner(notification.delta)}`,
    ];

    return [...lines, ...this.transactionLines(notification.lastTransaction)].join('\n');
  }

  balanceReply(balance: number, lastTransaction: CardTransaction | null): string {
    return [`📊 *Saldo:* ${formatKroner(balance)}`, ...this.transactionLines(lastTransaction)].join('\n');
  }

  private transactionLines(transaction: CardTransaction | null): string[] {
    if (!transaction) {
      return [];
    }

    const lines = ['', '📝 *Siste transaksjon:*'];
    if (transaction.date) {
      lines.push(`Dato: ${escapeMarkdown(transaction.date)}`);
    }
    if (transaction.description) {
      lines.push(`Beskrivelse: ${escapeMarkdown(transaction.description)}`);
    }
    if (transaction.amount) {
      lines.push(`Beløp: ${escapeMarkdown(transaction.amount)}`);
    }

    return lines;
  }
}
