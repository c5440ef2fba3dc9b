import * as net from 'net';
import { ITCPServer } from './ITCPServer';
import { IStorageEngine } from '../interfaces/Storage';
import { Address, MAX_VALUE_LENGTH, formatAddress } from '../common/Config';
import { ConnectionHandler } from './ConnectionHandler';

export type FatalErrorHandler = (err: Error) => void;

export interface TCPServerConfig {
  readonly address: Address;
  readonly maxValueLength?: number;
  /** Connections past this many are refused. Unbounded when omitted. */
  readonly maxConnections?: number | undefined;
  /** Listener failure after bind. The server cannot keep serving. */
  readonly onFatalError?: FatalErrorHandler | undefined;
}

export class TCPServer implements ITCPServer {
  private readonly store: IStorageEngine;
  private readonly config: TCPServerConfig;
  protected server: net.Server | null = null;
  private connections: Set<net.Socket> = new Set();

  constructor(store: IStorageEngine, config: TCPServerConfig) {
    this.store = store;
    this.config = config;
  }

  public async start(): Promise<void> {
    if (this.server !== null) {
      throw new Error('TCPServer: Already started');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    if (this.config.maxConnections !== undefined) {
      server.maxConnections = this.config.maxConnections;
    }
    this.server = server;

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error): void => {
        this.server = null;
        reject(err);
      };

      server.once('error', onBindError);

      server.listen(this.config.address.port, this.config.address.host, () => {
        server.off('error', onBindError);
        server.on('error', (err) => this.handleServerError(err));
        console.log(`TCPServer: Listening on ${formatAddress({ ...this.config.address, port: this.getPort() })}`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (server === null) {
      return;
    }

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    return new Promise((resolve) => {
      server.close(() => {
        this.server = null;
        console.log('TCPServer: Stopped');
        resolve();
      });
    });
  }

  public isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /** The bound port; differs from the configured one when that was 0. */
  public getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.address.port;
  }

  public getConnectionCount(): number {
    return this.connections.size;
  }

  private handleConnection(socket: net.Socket): void {
    this.connections.add(socket);

    const clientId = `${socket.remoteAddress}:${socket.remotePort}`;
    console.log(`TCPServer: Serving ${clientId}`);

    socket.on('close', () => {
      this.connections.delete(socket);
    });

    const handler = new ConnectionHandler(socket, this.store, {
      maxValueLength: this.config.maxValueLength ?? MAX_VALUE_LENGTH,
    });
    handler.start();
  }

  private handleServerError(err: Error): void {
    console.error('TCPServer: Listener failed:', err.message);

    if (this.config.onFatalError) {
      this.config.onFatalError(err);
      return;
    }

    throw err;
  }
}
