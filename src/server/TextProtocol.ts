import { ParseError } from '../common/Errors';

export enum RequestCommand {
  SET = 'set',
  GET = 'get',
  DEL = 'del',
  UNKNOWN = 'unknown',
}

export interface SetRequest {
  readonly command: RequestCommand.SET;
  readonly key: string;
  /** Raw bytes as received; never decoded. */
  readonly value: Buffer;
}

export interface GetRequest {
  readonly command: RequestCommand.GET;
  readonly key: string;
}

export interface DelRequest {
  readonly command: RequestCommand.DEL;
  readonly key: string;
}

export interface UnknownRequest {
  readonly command: RequestCommand.UNKNOWN;
  readonly token: string;
}

export type Request = SetRequest | GetRequest | DelRequest | UnknownRequest;

export const RESPONSE_OK = 'ok';
export const RESPONSE_NOT_FOUND = 'not found';

const LINE_FEED = 0x0a;
const SPACE = 0x20;
const LENGTH_PREFIX_SIZE = 4;
const FOUND_PREFIX = Buffer.from('found: ', 'utf8');

function isAsciiWhitespace(byte: number | undefined): boolean {
  // space, \t, \n, \v, \f, \r
  return byte === SPACE || (byte !== undefined && byte >= 0x09 && byte <= 0x0d);
}

/**
 * Requests are single `\n`-terminated lines: `<command> <argument-body>`.
 * Responses are a uint32 little-endian byte length followed by that many
 * payload bytes, with no terminator. Keys and command tokens are text;
 * values are carried as bytes in both directions.
 */
export class TextProtocol {

  /**
   * Parses one request line, without its line feed. Surrounding ASCII
   * whitespace is ignored. Command tokens are case-sensitive; an
   * unrecognised token still needs an argument body to count as a request.
   */
  public static parseRequest(line: Buffer | string): Request {
    const trimmed = this.trim(typeof line === 'string' ? Buffer.from(line, 'utf8') : line);
    if (trimmed.length === 0) {
      throw new ParseError('empty request');
    }

    const [commandBytes, body] = this.splitFirst(trimmed);
    const command = commandBytes.toString('utf8');
    if (body === null) {
      throw new ParseError(`missing argument for '${command}'`);
    }

    switch (command) {
      case RequestCommand.SET: {
        const [keyBytes, value] = this.splitFirst(body);
        const key = keyBytes.toString('utf8');
        if (value === null) {
          throw new ParseError(`missing value for key '${key}'`);
        }
        // Own copy: the line may be a view into a socket chunk.
        return { command: RequestCommand.SET, key, value: Buffer.from(value) };
      }
      case RequestCommand.GET:
        return { command: RequestCommand.GET, key: body.toString('utf8') };
      case RequestCommand.DEL:
        return { command: RequestCommand.DEL, key: body.toString('utf8') };
      default:
        return { command: RequestCommand.UNKNOWN, token: command };
    }
  }

  public static serializeRequest(line: string): Buffer {
    if (line.includes('\n')) {
      throw new ParseError('request must be a single line');
    }
    return Buffer.from(`${line}\n`, 'utf8');
  }

  public static serializeResponse(message: string | Buffer): Buffer {
    const payload = typeof message === 'string' ? Buffer.from(message, 'utf8') : message;
    const buffer = Buffer.allocUnsafe(LENGTH_PREFIX_SIZE + payload.length);

    buffer.writeUInt32LE(payload.length, 0);
    payload.copy(buffer, LENGTH_PREFIX_SIZE);

    return buffer;
  }

  public static formatFound(value: Buffer): Buffer {
    return Buffer.concat([FOUND_PREFIX, value], FOUND_PREFIX.length + value.length);
  }

  public static formatUnknownCommand(token: string): string {
    return `unknown command '${token}'`;
  }

  private static trim(line: Buffer): Buffer {
    let start = 0;
    let end = line.length;
    while (start < end && isAsciiWhitespace(line[start])) {
      start++;
    }
    while (end > start && isAsciiWhitespace(line[end - 1])) {
      end--;
    }
    return line.subarray(start, end);
  }

  private static splitFirst(bytes: Buffer): [Buffer, Buffer | null] {
    const index = bytes.indexOf(SPACE);
    if (index === -1) {
      return [bytes, null];
    }
    return [bytes.subarray(0, index), bytes.subarray(index + 1)];
  }
}

/**
 * Collects socket chunks and hands back every complete line. Bytes after
 * the last line feed stay buffered until more data arrives. Only the new
 * chunk is scanned, and a line is joined once, when its line feed shows up.
 */
export class LineSplitter {
  private chunks: Buffer[] = [];
  private buffered: number = 0;

  public push(chunk: Buffer): Buffer[] {
    const lines: Buffer[] = [];
    let start = 0;
    let end = chunk.indexOf(LINE_FEED, start);

    while (end !== -1) {
      this.chunks.push(chunk.subarray(start, end));
      lines.push(Buffer.concat(this.chunks, this.buffered + (end - start)));
      this.chunks = [];
      this.buffered = 0;

      start = end + 1;
      end = chunk.indexOf(LINE_FEED, start);
    }

    if (start < chunk.length) {
      this.chunks.push(chunk.subarray(start));
      this.buffered += chunk.length - start;
    }

    return lines;
  }

  public pendingBytes(): number {
    return this.buffered;
  }
}

/**
 * Client-side counterpart of TextProtocol.serializeResponse. Chunks are
 * kept as they arrive and joined once per complete frame.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered: number = 0;

  public push(chunk: Buffer): Buffer[] {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
    }

    const payloads: Buffer[] = [];

    while (this.buffered >= LENGTH_PREFIX_SIZE) {
      const frameSize = LENGTH_PREFIX_SIZE + this.take(LENGTH_PREFIX_SIZE, false).readUInt32LE(0);
      if (this.buffered < frameSize) {
        break;
      }
      payloads.push(this.take(frameSize, true).subarray(LENGTH_PREFIX_SIZE));
    }

    return payloads;
  }

  public pendingBytes(): number {
    return this.buffered;
  }

  /** Joins the first `size` buffered bytes, removing them when `consume` is set. */
  private take(size: number, consume: boolean): Buffer {
    const parts: Buffer[] = [];
    let remaining = size;
    let index = 0;

    while (remaining > 0) {
      const head = this.chunks[index];
      if (head === undefined) {
        throw new RangeError(`FrameDecoder: ${size} bytes requested, ${this.buffered} buffered`);
      }

      if (head.length <= remaining) {
        parts.push(head);
        remaining -= head.length;
        index++;
      } else {
        parts.push(head.subarray(0, remaining));
        if (consume) {
          this.chunks[index] = head.subarray(remaining);
        }
        remaining = 0;
      }
    }

    if (consume) {
      this.chunks.splice(0, index);
      this.buffered -= size;
    }

    return parts.length === 1 && parts[0] !== undefined ? parts[0] : Buffer.concat(parts, size);
  }
}
