import { NotificationMessage } from '../domain/types/notification-message.type';

export interface NotificationSink {
  send(message: NotificationMessage): Promise<void>;
}
