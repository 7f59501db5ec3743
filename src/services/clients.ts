/**
 * Client facades
 * A business logic (BL) client manages programs and events; a virtual end node (VEN) client
 * reads them and reports back. Both share one TokenProvider across their interfaces.
 */

import { TokenProvider } from './token-provider.js';
import { ENV_KEYS, type ConfigService } from './config.js';
import { AuthReadOnlyHttpInterface } from './vtn/auth.js';
import { EventsHttpInterface, EventsReadOnlyHttpInterface } from './vtn/events.js';
import { ProgramsHttpInterface, ProgramsReadOnlyHttpInterface } from './vtn/programs.js';
import { ReportsHttpInterface, ReportsReadOnlyHttpInterface } from './vtn/reports.js';
import { VensHttpInterface } from './vtn/vens.js';
import { SubscriptionsHttpInterface, SubscriptionsReadOnlyHttpInterface } from './vtn/subscriptions.js';
import type { HttpInterfaceOptions } from './vtn/http-interface.js';
import type {
  ReadOnlyAuthInterface,
  ReadOnlyEventsInterface,
  ReadOnlyProgramsInterface,
  ReadOnlyReportsInterface,
  ReadOnlySubscriptionsInterface,
  ReadWriteEventsInterface,
  ReadWriteProgramsInterface,
  ReadWriteReportsInterface,
  ReadWriteSubscriptionsInterface,
  ReadWriteVensInterface,
} from './vtn/interfaces.js';
import type { ClientAuthMethod } from '../types/auth.js';
import { ConfigurationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export interface BusinessLogicClient {
  readonly auth: ReadOnlyAuthInterface;
  readonly events: ReadWriteEventsInterface;
  readonly programs: ReadWriteProgramsInterface;
  readonly reports: ReadOnlyReportsInterface;
  readonly vens: ReadWriteVensInterface;
  readonly subscriptions: ReadOnlySubscriptionsInterface;
  readonly tokenProvider: TokenProvider;
}

export interface VirtualEndNodeClient {
  readonly auth: ReadOnlyAuthInterface;
  readonly events: ReadOnlyEventsInterface;
  readonly programs: ReadOnlyProgramsInterface;
  readonly reports: ReadWriteReportsInterface;
  readonly vens: ReadWriteVensInterface;
  readonly subscriptions: ReadWriteSubscriptionsInterface;
  readonly tokenProvider: TokenProvider;
}

export interface VirtualEndNodeClientOptions {
  vtnBaseUrl: string;
  clientId: string;
  clientSecret: string;
  /** Token endpoint; discovered through `GET {vtnBaseUrl}/auth/server` when omitted */
  tokenUrl?: string;
  scopes?: string[];
  clientAuthMethod?: ClientAuthMethod;
  leewaySeconds?: number;
  requireHttps?: boolean;
  timeoutMs?: number;
  retry?: HttpInterfaceOptions['retry'];
}

export interface BusinessLogicClientOptions extends VirtualEndNodeClientOptions {
  audience?: string;
}

async function resolveTokenUrl(options: VirtualEndNodeClientOptions): Promise<string> {
  if (options.tokenUrl) {
    return options.tokenUrl;
  }
  const auth = new AuthReadOnlyHttpInterface(interfaceOptions(options));
  const { tokenURL } = await auth.getAuthServer();
  loggers.vtn.info('Discovered token endpoint', { tokenUrl: tokenURL });
  return tokenURL;
}

function interfaceOptions(options: VirtualEndNodeClientOptions): HttpInterfaceOptions {
  return {
    baseUrl: options.vtnBaseUrl,
    requireHttps: options.requireHttps,
    timeoutMs: options.timeoutMs,
    retry: options.retry,
  };
}

async function createTokenProvider(options: BusinessLogicClientOptions): Promise<TokenProvider> {
  const tokenUrl = await resolveTokenUrl(options);
  return new TokenProvider({
    tokenUrl,
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    scopes: options.scopes,
    audience: options.audience,
    clientAuthMethod: options.clientAuthMethod,
    leewaySeconds: options.leewaySeconds,
    timeoutMs: options.timeoutMs,
  });
}

/**
 * Creates a BL client talking to the VTN over HTTP
 */
export async function createBusinessLogicHttpClient(options: BusinessLogicClientOptions): Promise<BusinessLogicClient> {
  const tokenProvider = await createTokenProvider(options);
  const shared: HttpInterfaceOptions = { ...interfaceOptions(options), tokenSource: tokenProvider };

  return {
    auth: new AuthReadOnlyHttpInterface(interfaceOptions(options)),
    events: new EventsHttpInterface(shared),
    programs: new ProgramsHttpInterface(shared),
    reports: new ReportsReadOnlyHttpInterface(shared),
    vens: new VensHttpInterface(shared),
    subscriptions: new SubscriptionsReadOnlyHttpInterface(shared),
    tokenProvider,
  };
}

/**
 * Creates a VEN client talking to the VTN over HTTP
 */
export async function createVirtualEndNodeHttpClient(
  options: VirtualEndNodeClientOptions
): Promise<VirtualEndNodeClient> {
  const tokenProvider = await createTokenProvider(options);
  const shared: HttpInterfaceOptions = { ...interfaceOptions(options), tokenSource: tokenProvider };

  return {
    auth: new AuthReadOnlyHttpInterface(interfaceOptions(options)),
    events: new EventsReadOnlyHttpInterface(shared),
    programs: new ProgramsReadOnlyHttpInterface(shared),
    reports: new ReportsHttpInterface(shared),
    vens: new VensHttpInterface(shared),
    subscriptions: new SubscriptionsHttpInterface(shared),
    tokenProvider,
  };
}

/**
 * Options for either factory, read from the environment and config file
 * @throws ConfigurationError naming every missing setting
 */
export function clientOptionsFromConfig(config: ConfigService): BusinessLogicClientOptions {
  const vtnBaseUrl = config.getVtnBaseUrl();
  const clientId = config.getClientId();
  const clientSecret = config.getClientSecret();

  if (!vtnBaseUrl || !clientId || !clientSecret) {
    const missing = [
      ...(vtnBaseUrl ? [] : [ENV_KEYS.vtnBaseUrl]),
      ...(clientId ? [] : [ENV_KEYS.clientId]),
      ...(clientSecret ? [] : [ENV_KEYS.clientSecret]),
    ];
    throw new ConfigurationError(`Missing configuration: ${missing.join(', ')}`, missing);
  }

  return {
    vtnBaseUrl,
    clientId,
    clientSecret,
    tokenUrl: config.getTokenUrl(),
    scopes: config.getScopes(),
    clientAuthMethod: config.getClientAuthMethod(),
    leewaySeconds: config.getLeewaySeconds(),
  };
}

export async function createBusinessLogicClientFromConfig(config: ConfigService): Promise<BusinessLogicClient> {
  return createBusinessLogicHttpClient(clientOptionsFromConfig(config));
}

export async function createVirtualEndNodeClientFromConfig(config: ConfigService): Promise<VirtualEndNodeClient> {
  return createVirtualEndNodeHttpClient(clientOptionsFromConfig(config));
}
