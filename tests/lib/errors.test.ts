import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ConfigurationError,
  ConversionError,
  CreationGuardError,
  ModelValidationError,
  OpenADRError,
  TokenTransportError,
  VtnRequestError,
  exitCodeFor,
} from '../../src/lib/errors.js';

describe('error hierarchy', () => {
  it('should give every error a stable code', () => {
    const errors = [
      new ConfigurationError('Missing configuration: OAUTH_CLIENT_ID', ['OAUTH_CLIENT_ID']),
      new AuthenticationError('Token endpoint rejected the client credentials'),
      new TokenTransportError('Token endpoint unreachable'),
      new VtnRequestError('VTN request GET /events failed with status 500', { method: 'GET', url: '/events' }),
      new ModelValidationError('NewEvent', []),
      new CreationGuardError('Event'),
      new ConversionError('1 of 1 rows failed validation', []),
    ];

    expect(errors.every((error) => error instanceof OpenADRError)).toBe(true);
    expect(errors.map((error) => error.code)).toEqual([
      'CONFIGURATION_ERROR',
      'AUTHENTICATION_ERROR',
      'TOKEN_TRANSPORT_ERROR',
      'VTN_REQUEST_ERROR',
      'MODEL_VALIDATION_ERROR',
      'CREATION_GUARD_ERROR',
      'CONVERSION_ERROR',
    ]);
  });

  it('should make transport failures a kind of authentication failure', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = new TokenTransportError('Token endpoint unreachable', cause);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.name).toBe('TokenTransportError');
    expect(error.cause).toBe(cause);
    expect(error.status).toBeUndefined();
  });

  it('should keep the OAuth error fields', () => {
    const error = new AuthenticationError('Token endpoint rejected the client credentials', {
      status: 401,
      oauthError: 'invalid_client',
      oauthErrorDescription: 'Unknown client',
    });

    expect(error).toMatchObject({ status: 401, oauthError: 'invalid_client', oauthErrorDescription: 'Unknown client' });
  });

  it('should list field and model issues in the validation message', () => {
    const error = new ModelValidationError('NewEvent', [
      { path: 'intervals', message: 'Event must contain at least one interval' },
      { path: '', message: 'profile.event.name_required: eventName is required' },
    ]);

    expect(error.message).toBe(
      'Invalid NewEvent: intervals: Event must contain at least one interval; profile.event.name_required: eventName is required'
    );
  });
});

describe('exitCodeFor', () => {
  it('should map errors to CLI exit codes', () => {
    expect(exitCodeFor(new ConfigurationError('Missing configuration'))).toBe(3);
    expect(exitCodeFor(new TokenTransportError('unreachable'))).toBe(3);
    expect(exitCodeFor(new VtnRequestError('failed', { method: 'GET', url: '/events', status: 503 }))).toBe(2);
    expect(exitCodeFor(new ModelValidationError('NewEvent', []))).toBe(1);
    expect(exitCodeFor('unexpected')).toBe(1);
  });
});
