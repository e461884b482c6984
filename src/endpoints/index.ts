export * from './types';
export * from './HttpClientPools';
export * from './HttpEndpoint';
export * from './EndpointRegistry';
export * from './WebhookEndpoint';
export * from './DiscordEndpoint';
export * from './builtin';
