import * as net from 'net';
import { IStorageEngine } from '../interfaces/Storage';
import { ParseError, StorageEngineStoppedError, ValueTooLongError } from '../common/Errors';
import {
  LineSplitter,
  Request,
  RequestCommand,
  RESPONSE_NOT_FOUND,
  RESPONSE_OK,
  TextProtocol,
} from './TextProtocol';

export interface ConnectionHandlerConfig {
  readonly maxValueLength: number;
}

/**
 * Serves one client socket. Lines are answered strictly in order: the
 * socket stays paused while a chunk's lines go through the engine, and
 * every request gets exactly one framed response. A response the peer is
 * not reading holds up the next line until the socket drains.
 */
export class ConnectionHandler {
  private readonly socket: net.Socket;
  private readonly store: IStorageEngine;
  private readonly config: ConnectionHandlerConfig;
  private readonly lines: LineSplitter = new LineSplitter();
  private readonly clientId: string;
  private terminated: boolean = false;

  constructor(socket: net.Socket, store: IStorageEngine, config: ConnectionHandlerConfig) {
    this.socket = socket;
    this.store = store;
    this.config = config;
    this.clientId = `${socket.remoteAddress}:${socket.remotePort}`;
  }

  public start(): void {
    this.socket.on('data', async (chunk: Buffer) => {
      this.socket.pause();

      try {
        await this.processChunk(chunk);
      } catch (err) {
        this.terminate(err);
        return;
      }

      if (!this.terminated) {
        this.socket.resume();
      }
    });

    this.socket.on('end', () => {
      const dropped = this.lines.pendingBytes();
      if (dropped > 0) {
        console.warn(`ConnectionHandler: Discarding ${dropped} bytes of unterminated input from ${this.clientId}`);
      }
      console.log(`ConnectionHandler: Disconnecting ${this.clientId}`);
    });

    this.socket.on('error', (err) => {
      this.terminated = true;
      console.error(`ConnectionHandler: Disconnecting ${this.clientId} due to error: ${err.message}`);
    });
  }

  /**
   * Builds the response text for one request line. Protocol mistakes are
   * answered; engine failures propagate.
   */
  public async execute(line: Buffer | string): Promise<string | Buffer> {
    let request: Request;
    try {
      request = TextProtocol.parseRequest(line);
    } catch (err) {
      if (err instanceof ParseError) {
        return err.message;
      }
      throw err;
    }

    switch (request.command) {
      case RequestCommand.SET:
        if (request.value.length > this.config.maxValueLength) {
          return new ValueTooLongError(this.config.maxValueLength).message;
        }
        await this.store.set(request.key, request.value);
        return RESPONSE_OK;

      case RequestCommand.GET: {
        const result = await this.store.get(request.key);
        return result.found ? TextProtocol.formatFound(result.value) : RESPONSE_NOT_FOUND;
      }

      case RequestCommand.DEL:
        await this.store.delete(request.key);
        return RESPONSE_OK;

      case RequestCommand.UNKNOWN:
        return TextProtocol.formatUnknownCommand(request.token);
    }
  }

  private async processChunk(chunk: Buffer): Promise<void> {
    for (const line of this.lines.push(chunk)) {
      if (this.terminated || this.socket.destroyed) {
        return;
      }

      const response = await this.execute(line);
      if (this.socket.destroyed) {
        return;
      }
      await this.write(TextProtocol.serializeResponse(response));
    }
  }

  private async write(frame: Buffer): Promise<void> {
    if (this.socket.write(frame)) {
      return;
    }

    await new Promise<void>((resolve) => {
      const done = (): void => {
        this.socket.off('drain', done);
        this.socket.off('close', done);
        resolve();
      };
      this.socket.on('drain', done);
      this.socket.on('close', done);
    });
  }

  private terminate(err: unknown): void {
    this.terminated = true;

    if (err instanceof StorageEngineStoppedError) {
      console.warn(`ConnectionHandler: Disconnecting ${this.clientId}, storage engine stopped`);
    } else {
      const errorMsg = err instanceof Error ? err.message : String(err);
      console.error(`ConnectionHandler: Disconnecting ${this.clientId} due to error: ${errorMsg}`);
    }

    this.socket.destroy();
  }
}
