import { DiscordEndpoint } from './DiscordEndpoint';
import { EndpointRegistryBuilder } from './EndpointRegistry';
import { WebhookEndpoint, WEBHOOK_SCHEMES } from './WebhookEndpoint';

/**
 * Registers the endpoints bundled with the scheduler
 */
export const registerBuiltinEndpoints = (
  builder: EndpointRegistryBuilder,
): EndpointRegistryBuilder =>
  builder
    .register(WEBHOOK_SCHEMES, ({ pools }) => new WebhookEndpoint(pools))
    .register('discord', ({ pools }) => new DiscordEndpoint(pools));
