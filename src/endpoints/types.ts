/**
 * Delivery endpoint contract. Every concrete adapter (webhook, chat service,
 * mail gateway) satisfies this shape; the dispatcher never branches on the
 * concrete type.
 */

import { Notification } from '../database/models';
import { HttpClientPools } from './HttpClientPools';

export interface DeliveryEndpoint {
  /** Short stable identifier such as `discord`. */
  readonly serviceId: string;

  /** Configures the endpoint from its service URL. */
  parse(serviceUrl: string): void;

  /** Pre-flight parse; throws InvalidEndpointURLError on bad structure. */
  validate(serviceUrl: string): void;

  /**
   * Delivers one notification. Rejects with TransientDeliveryError,
   * PermanentDeliveryError or CancelledError.
   */
  send(notification: Notification, signal: AbortSignal): Promise<void>;

  supportsAttachments(): boolean;

  /** 0 means unlimited. */
  maxBodyLength(): number;

  defaultPort(): number;
}

/**
 * Shared resources handed to factories when the registry is built
 */
export interface EndpointContext {
  pools: HttpClientPools;
}

export type EndpointFactory = (context: EndpointContext) => DeliveryEndpoint;
