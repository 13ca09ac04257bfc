/**
 * Injection token for the messaging service.
 * Use this to inject the messaging service abstraction.
 *
 * @example
 * constructor(@Inject(MESSAGING_SERVICE) private readonly messaging: IMessagingService) {}
 */
export const MESSAGING_SERVICE = Symbol('MESSAGING_SERVICE');

/**
 * EventEmitter2 event names for messaging events.
 * All modules should use these constants instead of string literals.
 */
export const MSG_EVENTS = {
  TEXT_RECEIVED: 'message.text.received',
  MESSAGE_SENT: 'message.sent',
  /** The channel stopped receiving (end of input or an exit command) */
  CHANNEL_CLOSED: 'channel.closed',
} as const;

/**
 * Console channel commands. Anything else is a customer message.
 */
export const CONSOLE_COMMANDS = {
  /** Start a fresh conversation with a new session id */
  NEW: '/new',
  EXIT: '/exit',
} as const;
