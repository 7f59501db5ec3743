/**
 * Authorization server discovery (`GET /auth/server`). Anonymous: no bearer token is sent.
 */

import { parseAuthServerInfo, type AuthServerInfo } from '../../models/auth-server.js';
import { HttpInterface, type HttpInterfaceOptions } from './http-interface.js';
import type { ReadOnlyAuthInterface } from './interfaces.js';

export class AuthReadOnlyHttpInterface extends HttpInterface implements ReadOnlyAuthInterface {
  constructor(options: Omit<HttpInterfaceOptions, 'tokenSource'>) {
    super({ ...options, tokenSource: undefined });
  }

  async getAuthServer(): Promise<AuthServerInfo> {
    return this.request('GET', '/auth/server', { parse: parseAuthServerInfo });
  }
}
