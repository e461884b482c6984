/**
 * Scheme-to-factory table for delivery endpoints.
 *
 * Factories are registered on a builder during bootstrap; `build()` freezes
 * them into an EndpointRegistry that is read-only afterwards.
 */

import { ConflictError, InvalidEndpointURLError, UnknownSchemeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { DeliveryEndpoint, EndpointContext, EndpointFactory } from './types';

const logger = createLogger('EndpointRegistry');

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

/**
 * Returns the scheme of a service URL exactly as written (no case folding)
 */
export const extractScheme = (serviceUrl: string): string => {
  const match = SCHEME_PATTERN.exec(serviceUrl.trim());
  if (!match) {
    throw new InvalidEndpointURLError(
      'Service URL must start with scheme://',
      serviceUrl,
    );
  }
  return match[1];
};

/**
 * Like extractScheme, but returns null instead of throwing
 */
export const schemeOf = (serviceUrl: string): string | null =>
  SCHEME_PATTERN.exec(serviceUrl.trim())?.[1] ?? null;

export class EndpointRegistry {
  private readonly factories: ReadonlyMap<string, EndpointFactory>;

  constructor(
    factories: ReadonlyMap<string, EndpointFactory>,
    private readonly context: EndpointContext,
  ) {
    this.factories = new Map(factories);
  }

  has(scheme: string): boolean {
    return this.factories.has(scheme);
  }

  schemes(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Produces a configured endpoint for `serviceUrl`
   */
  resolve(serviceUrl: string): DeliveryEndpoint {
    const trimmed = serviceUrl.trim();
    const scheme = extractScheme(trimmed);
    const factory = this.factories.get(scheme);
    if (!factory) {
      throw new UnknownSchemeError(scheme);
    }

    const endpoint = factory(this.context);
    endpoint.parse(trimmed);
    return endpoint;
  }

  validate(serviceUrl: string): void {
    const trimmed = serviceUrl.trim();
    const scheme = extractScheme(trimmed);
    const factory = this.factories.get(scheme);
    if (!factory) {
      throw new UnknownSchemeError(scheme);
    }
    factory(this.context).validate(trimmed);
  }

  /**
   * Validates every URL and throws the first failure
   */
  validateAll(serviceUrls: readonly string[]): void {
    for (const serviceUrl of serviceUrls) {
      this.validate(serviceUrl);
    }
  }
}

export class EndpointRegistryBuilder {
  private readonly factories = new Map<string, EndpointFactory>();

  /**
   * Registers a factory under one or more schemes (aliases)
   */
  register(schemes: string | readonly string[], factory: EndpointFactory): this {
    const list = typeof schemes === 'string' ? [schemes] : schemes;
    for (const scheme of list) {
      if (!/^[a-zA-Z][a-zA-Z0-9+.-]*$/.test(scheme)) {
        throw new InvalidEndpointURLError(`Invalid scheme name: ${scheme}`);
      }
      if (this.factories.has(scheme)) {
        throw new ConflictError(`Scheme already registered: ${scheme}`);
      }
      this.factories.set(scheme, factory);
    }
    return this;
  }

  build(context: EndpointContext): EndpointRegistry {
    const registry = new EndpointRegistry(this.factories, context);
    logger.info('Endpoint registry built', { schemes: registry.schemes() });
    return registry;
  }
}
