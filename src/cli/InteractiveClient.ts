import * as readline from 'readline';
import { Address, formatAddress } from '../common/Config';
import { TCPClient } from '../server/TCPClient';

export interface InteractiveClientOptions {
  readonly address: Address;
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
}

/**
 * Line-based terminal over the wire protocol: every non-empty input line
 * goes to the server as-is and the decoded response is printed after `< `.
 */
export class InteractiveClient {
  private readonly address: Address;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly client: TCPClient;

  constructor(options: InteractiveClientOptions) {
    this.address = options.address;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.client = new TCPClient({ address: options.address });
  }

  /** Resolves when the input ends. */
  public async run(): Promise<void> {
    console.log(`InteractiveClient: Connecting to ${formatAddress(this.address)}`);
    await this.client.connect();

    const rl = readline.createInterface({ input: this.input, output: this.output, prompt: '> ' });

    try {
      rl.prompt();

      for await (const line of rl) {
        if (line.trim().length > 0) {
          const response = await this.client.send(line);
          this.output.write(`< ${response}\n`);
        }
        rl.prompt();
      }

      this.output.write('\n');
      console.log('InteractiveClient: Disconnecting');
    } finally {
      rl.close();
      await this.client.disconnect();
    }
  }
}
