import * as net from 'net';
import { Address } from '../common/Config';
import { FrameDecoder, TextProtocol } from './TextProtocol';

export interface TCPClientConfig {
  readonly address: Address;
  /** Idle timeout in ms. None by default: `get` may block indefinitely. */
  readonly timeout?: number | undefined;
}

export class TCPClient {
  private readonly config: TCPClientConfig;
  private socket: net.Socket | null = null;
  private connected: boolean = false;
  private readonly decoder: FrameDecoder = new FrameDecoder();
  private pendingResponses: Array<{
    resolve: (message: string) => void;
    reject: (err: Error) => void;
  }> = [];

  constructor(config: TCPClientConfig) {
    this.config = config;
  }

  public async connect(): Promise<void> {
    if (this.connected) {
      throw new Error('TCPClient: Already connected');
    }

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;

      if (this.config.timeout !== undefined) {
        socket.setTimeout(this.config.timeout);
      }

      socket.on('connect', () => {
        this.connected = true;
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        this.handleData(chunk);
      });

      socket.on('error', (err) => {
        this.rejectAllPending(err);
        reject(err);
      });

      socket.on('close', () => {
        this.connected = false;
        this.rejectAllPending(new Error('Connection closed'));
      });

      socket.on('timeout', () => {
        socket.destroy();
        this.rejectAllPending(new Error('Connection timeout'));
      });

      socket.connect(this.config.address.port, this.config.address.host);
    });
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!this.connected || socket === null) {
      return;
    }

    return new Promise((resolve) => {
      socket.once('close', () => {
        this.socket = null;
        resolve();
      });
      socket.end();
    });
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Sends one raw request line and resolves with the server's response
   * payload. Responses are matched to requests in send order.
   */
  public async send(line: string): Promise<string> {
    const socket = this.ensureConnected();
    const message = TextProtocol.serializeRequest(line);

    const response = this.waitForResponse();
    socket.write(message);

    return response;
  }

  public async set(key: string, value: string): Promise<string> {
    return this.send(`set ${key} ${value}`);
  }

  public async get(key: string): Promise<string> {
    return this.send(`get ${key}`);
  }

  public async del(key: string): Promise<string> {
    return this.send(`del ${key}`);
  }

  private handleData(chunk: Buffer): void {
    for (const payload of this.decoder.push(chunk)) {
      const pending = this.pendingResponses.shift();
      if (pending) {
        pending.resolve(payload.toString('utf8'));
      } else {
        console.warn('TCPClient: Dropping unsolicited response');
      }
    }
  }

  private waitForResponse(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.pendingResponses.push({ resolve, reject });
    });
  }

  private rejectAllPending(err: Error): void {
    for (const pending of this.pendingResponses) {
      pending.reject(err);
    }
    this.pendingResponses = [];
  }

  private ensureConnected(): net.Socket {
    if (!this.connected || this.socket === null) {
      throw new Error('TCPClient: Not connected');
    }
    return this.socket;
  }
}
