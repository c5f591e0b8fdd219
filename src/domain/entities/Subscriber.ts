export interface Subscriber {
  id: string;
  identifier: string;
  displayName?: string;
  registeredAt: string; // ISO timestamp
}

export interface SubscriberRef {
  subscriberId: string;
  identifier: string;
}
