import { SentMessageResult } from './outgoing-message.interface';

/**
 * Abstract messaging service interface.
 * Consumers should depend on this interface, not concrete implementations.
 */
export interface IMessagingService {
  /** Start receiving customer messages */
  initialize(): Promise<void>;

  /** Stop receiving and release the channel */
  disconnect(): Promise<void>;

  sendText(to: string, text: string): Promise<SentMessageResult>;
}
