import type { BalanceChangedNotificationDTO } from '../../../application/dto/BalanceChangedNotificationDTO.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { NotifierPort } from '../../../application/ports/NotifierPort.js';
import type { MessageFormatter } from './MessageFormatter.js';

export class LogNotifier implements NotifierPort {
  constructor(
    private readonly formatter: MessageFormatter,
    private readonly logger: LoggerPort,
  ) {}

  async notifyBalanceChanged(notification: BalanceChangedNotificationDTO): Promise<void> {
    await this.sendText(notification.subscriberId, this.formatter.balanceChanged(notification));
  }

  async sendText(subscriberId: string, text: string): Promise<void> {
    this.logger.info('Notification (no bot token configured)', { subscriberId, text });
  }
}
