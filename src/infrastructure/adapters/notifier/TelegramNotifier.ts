import type { BalanceChangedNotificationDTO } from '../../../application/dto/BalanceChangedNotificationDTO.js';
import { NotifyDeliveryError } from '../../../application/errors/CheckErrors.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { NotifierPort } from '../../../application/ports/NotifierPort.js';
import type { Transport } from '../../http/FetchTransport.js';
import type { MessageFormatter } from './MessageFormatter.js';

export interface TelegramConfig {
  botToken: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Delivers messages through the Bot API `sendMessage` method. The subscriber id
 * is the chat id the bot talks to.
 */
export class TelegramNotifier implements NotifierPort {
  private readonly baseUrl: string;

  constructor(
    private readonly config: TelegramConfig,
    private readonly transport: Transport,
    private readonly formatter: MessageFormatter,
    private readonly logger: LoggerPort,
  ) {
    this.baseUrl = config.baseUrl ?? 'https://api.telegram.org';
  }

  async notifyBalanceChanged(notification: BalanceChangedNotificationDTO): Promise<void> {
    await this.sendText(notification.subscriberId, this.formatter.balanceChanged(notification));
  }

  async sendText(subscriberId: string, text: string): Promise<void> {
    let status: number;

    try {
      const response = await this.transport({
        url: `${this.baseUrl}/bot${this.config.botToken}/sendMessage`,
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: subscriberId, text, parse_mode: 'Markdown' }),
        timeoutMs: this.config.timeoutMs,
      });
      status = response.status;
    } catch (error) {
      throw new NotifyDeliveryError(subscriberId, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (status < 200 || status >= 300) {
      throw new NotifyDeliveryError(subscriberId, `Bot API responded with status ${status}`);
    }

    this.logger.debug('Message delivered', { subscriberId });
  }
}
