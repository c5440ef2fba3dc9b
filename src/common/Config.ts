import { ConfigError } from './Errors';

export enum RunMode {
  SERVER = 'server',
  CLIENT = 'client',
}

/** Largest value a uint32 length prefix can describe. */
export const MAX_VALUE_LENGTH = 0xffffffff;

export const DEFAULT_COMPACTION_THRESHOLD = 1024;

export interface Address {
  readonly host: string;
  readonly port: number;
}

export interface ServerConfig {
  readonly address: Address;
  readonly compactionThreshold: number;
  readonly maxValueLength: number;
  readonly maxConnections?: number | undefined;
  readonly httpPort?: number | undefined;
}

export const DEFAULT_ADDRESS = '127.0.0.1:9090';

export const DEFAULT_CONFIG: ServerConfig = {
  address: { host: '127.0.0.1', port: 9090 },
  compactionThreshold: DEFAULT_COMPACTION_THRESHOLD,
  maxValueLength: MAX_VALUE_LENGTH,
};

/**
 * Parses `host:port`. IPv6 hosts must be bracketed (`[::1]:9090`).
 */
export function parseAddress(value: string): Address {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) {
    throw new ConfigError(`Invalid address: ${value}. Expected HOST:PORT`);
  }

  let host = value.slice(0, separator);
  const portStr = value.slice(separator + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  if (host.length === 0 || !/^\d+$/.test(portStr)) {
    throw new ConfigError(`Invalid address: ${value}. Expected HOST:PORT`);
  }

  const port = parseInt(portStr, 10);
  if (port > 65535) {
    throw new ConfigError(`Invalid port in address ${value}: must be <= 65535`);
  }

  return { host, port };
}

export function formatAddress(address: Address): string {
  return address.host.includes(':')
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`;
}

export function resolveServerConfig(config?: Partial<ServerConfig>): ServerConfig {
  const resolved: ServerConfig = { ...DEFAULT_CONFIG, ...config };

  if (!Number.isInteger(resolved.compactionThreshold) || resolved.compactionThreshold < 1) {
    throw new ConfigError('compactionThreshold must be a positive integer');
  }
  if (
    !Number.isInteger(resolved.maxValueLength) ||
    resolved.maxValueLength < 0 ||
    resolved.maxValueLength > MAX_VALUE_LENGTH
  ) {
    throw new ConfigError(`maxValueLength must be between 0 and ${MAX_VALUE_LENGTH}`);
  }
  if (
    resolved.maxConnections !== undefined &&
    (!Number.isInteger(resolved.maxConnections) || resolved.maxConnections < 1)
  ) {
    throw new ConfigError('maxConnections must be a positive integer');
  }
  if (
    resolved.httpPort !== undefined &&
    (!Number.isInteger(resolved.httpPort) || resolved.httpPort < 0 || resolved.httpPort > 65535)
  ) {
    throw new ConfigError('httpPort must be between 0 and 65535');
  }

  return resolved;
}
