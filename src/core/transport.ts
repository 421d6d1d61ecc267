import { OutboundMessage } from './types.js';

export type DeliveryResult =
  | { status: 'ok'; messageId: string | null }
  | { status: 'transient_error'; error: string }
  | { status: 'permanent_error'; error: string };

/**
 * One delivery attempt to one recipient. Implementations must not retry
 * internally: retries belong to the dispatch engine.
 */
export interface MailTransport {
  deliver(message: OutboundMessage, recipient: string): Promise<DeliveryResult>;
  /** Check credentials and connectivity without sending. */
  verify?(): Promise<void>;
  close?(): void;
}
