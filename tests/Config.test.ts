import {
  DEFAULT_CONFIG,
  formatAddress,
  parseAddress,
  resolveServerConfig,
} from '../src/common/Config';
import { ConfigError } from '../src/common/Errors';

describe('parseAddress', () => {
  it('splits host and port', () => {
    expect(parseAddress('127.0.0.1:9090')).toEqual({ host: '127.0.0.1', port: 9090 });
    expect(parseAddress('localhost:0')).toEqual({ host: 'localhost', port: 0 });
  });

  it('unwraps bracketed IPv6 hosts', () => {
    expect(parseAddress('[::1]:9090')).toEqual({ host: '::1', port: 9090 });
  });

  it.each(['9090', ':9090', 'host:', 'host:port', 'host:70000'])('rejects %s', (value) => {
    expect(() => parseAddress(value)).toThrow(ConfigError);
  });
});

describe('formatAddress', () => {
  it('brackets IPv6 hosts only', () => {
    expect(formatAddress({ host: '127.0.0.1', port: 9090 })).toBe('127.0.0.1:9090');
    expect(formatAddress({ host: '::1', port: 9090 })).toBe('[::1]:9090');
  });
});

describe('resolveServerConfig', () => {
  it('fills in defaults', () => {
    expect(resolveServerConfig()).toEqual(DEFAULT_CONFIG);
  });

  it.each([0, 1.5, Number.NaN])('rejects maxConnections of %s', (maxConnections) => {
    expect(() => resolveServerConfig({ maxConnections })).toThrow('maxConnections must be a positive integer');
  });

  it.each([70000, -1, 80.5, Number.NaN])('rejects an http port of %s', (httpPort) => {
    expect(() => resolveServerConfig({ httpPort })).toThrow('httpPort must be between 0 and 65535');
  });

  it('accepts whole-number limits', () => {
    expect(resolveServerConfig({ maxConnections: 3, httpPort: 0 })).toMatchObject({ maxConnections: 3, httpPort: 0 });
  });
});
