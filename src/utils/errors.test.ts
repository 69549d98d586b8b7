import { ConfigurationError, DataUnavailableError, getErrorMessage } from './errors';

describe('errors', () => {
  it('should name configuration errors', () => {
    const err = new ConfigurationError('maxSubSuites must be a positive integer, got 0');

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ConfigurationError');
    expect(err.message).toBe('maxSubSuites must be a positive integer, got 0');
  });

  it('should carry the HTTP status on data errors', () => {
    const err = new DataUnavailableError('stats unavailable', 503);

    expect(err.name).toBe('DataUnavailableError');
    expect(err.status).toBe(503);
    expect(new DataUnavailableError('offline').status).toBeUndefined();
  });
});

describe('getErrorMessage', () => {
  it('should return message from Error instances', () => {
    expect(getErrorMessage(new Error('something broke'))).toBe('something broke');
    expect(getErrorMessage(new ConfigurationError('bad config'))).toBe('bad config');
  });

  it('should stringify non-Error values', () => {
    expect(getErrorMessage('string error')).toBe('string error');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});
