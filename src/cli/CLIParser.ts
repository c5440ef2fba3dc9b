import {
  ServerConfig,
  DEFAULT_ADDRESS,
  DEFAULT_CONFIG,
  parseAddress,
  resolveServerConfig,
} from '../common/Config';
import { ConfigError } from '../common/Errors';

export interface CLIOptions {
  /** As given; may name no known mode. */
  readonly mode: string;
  readonly config: ServerConfig;
  readonly help: boolean;
}

/**
 * Flags take `--name=value` or `--name value`. A single leading dash works
 * as well (`-mode=server`).
 */
export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('help') || this.args.includes('-h')) {
      return { mode: '', config: DEFAULT_CONFIG, help: true };
    }

    const config = resolveServerConfig({
      address: parseAddress(this.getString('address') ?? DEFAULT_ADDRESS),
      compactionThreshold: this.getNumber('compaction-threshold') ?? DEFAULT_CONFIG.compactionThreshold,
      maxValueLength: this.getNumber('max-value-length') ?? DEFAULT_CONFIG.maxValueLength,
      maxConnections: this.getNumber('max-connections'),
      httpPort: this.getNumber('http-port'),
    });

    return { mode: this.getString('mode') ?? '', config, help: false };
  }

  private getString(name: string): string | undefined {
    for (const flag of [`--${name}`, `-${name}`]) {
      const inline = this.args.find(arg => arg.startsWith(`${flag}=`));
      if (inline !== undefined) {
        return inline.slice(flag.length + 1);
      }

      const flagIndex = this.args.indexOf(flag);
      if (flagIndex !== -1) {
        const value = this.args[flagIndex + 1];
        if (value === undefined) {
          throw new ConfigError(`Missing value for ${flag}`);
        }
        return value;
      }
    }

    return undefined;
  }

  private getNumber(name: string): number | undefined {
    const str = this.getString(name);
    if (str === undefined) return undefined;

    if (!/^\d+$/.test(str)) {
      throw new ConfigError(`Invalid number for --${name}: ${str}`);
    }
    return parseInt(str, 10);
  }

  private hasFlag(name: string): boolean {
    return this.args.includes(`--${name}`) || this.args.includes(`-${name}`);
  }

  public static printHelp(): void {
    console.log(`
chanstore - in-memory key-value store over TCP

Usage: node dist/index.js --mode=MODE [options]

Options:
  --help, -h                  Show this help message
  --mode=MODE                 Either 'server' or 'client'
  --address=HOST:PORT         Listen address (server) or server to connect to
                              (client) (default: ${DEFAULT_ADDRESS})

Server Options:
  --http-port=PORT            Also serve the JSON API on this port
  --compaction-threshold=N    Deletions between map rebuilds (default: ${DEFAULT_CONFIG.compactionThreshold})
  --max-value-length=BYTES    Largest accepted value (default: ${DEFAULT_CONFIG.maxValueLength})
  --max-connections=N         Refuse connections past this many (default: unlimited)

Protocol:
  set <key> <value>           -> ok
  get <key>                   -> found: <value> | not found
  del <key>                   -> ok

Examples:
  node dist/index.js --mode=server --address=0.0.0.0:9090
  node dist/index.js --mode=client --address=127.0.0.1:9090
`);
  }
}
