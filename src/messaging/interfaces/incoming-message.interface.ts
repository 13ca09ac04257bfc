/**
 * Incoming customer text.
 */
export interface IncomingTextMessage {
  type: 'text';
  /** Channel message id */
  id: string;
  /** Conversation id; used as the session id */
  from: string;
  /** Unix timestamp (ms) */
  timestamp: number;
  body: string;
}
