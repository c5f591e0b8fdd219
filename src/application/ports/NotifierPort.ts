import type { BalanceChangedNotificationDTO } from '../dto/BalanceChangedNotificationDTO.js';

export interface NotifierPort {
  notifyBalanceChanged(notification: BalanceChangedNotificationDTO): Promise<void>;
  sendText(subscriberId: string, text: string): Promise<void>;
}
