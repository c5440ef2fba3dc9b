#!/usr/bin/env node
import { StorageEngine } from './engine/StorageEngine';
import { TCPServer } from './server/TCPServer';
import { HTTPServer } from './server/HTTPServer';
import { ServerConfig, RunMode, formatAddress } from './common/Config';
import { CLIParser } from './cli/CLIParser';
import { InteractiveClient } from './cli/InteractiveClient';

interface Application {
  engine: StorageEngine;
  tcpServer: TCPServer;
  httpServer: HTTPServer | undefined;
}

function createApplication(config: ServerConfig, onFatalError: (err: Error) => void): Application {
  const engine = new StorageEngine({ compactionThreshold: config.compactionThreshold });

  const tcpServer = new TCPServer(engine, {
    address: config.address,
    maxValueLength: config.maxValueLength,
    maxConnections: config.maxConnections,
    onFatalError,
  });

  const httpServer = config.httpPort !== undefined
    ? new HTTPServer(engine, {
      port: config.httpPort,
      host: config.address.host,
      maxValueLength: config.maxValueLength,
    })
    : undefined;

  return { engine, tcpServer, httpServer };
}

async function startApplication(app: Application, config: ServerConfig): Promise<void> {
  app.engine.start();
  await app.tcpServer.start();

  if (app.httpServer) {
    await app.httpServer.start();
  }

  printStartupInfo(config, app);
}

async function shutdownApplication(app: Application): Promise<void> {
  console.log('\nShutting down gracefully...');

  await app.tcpServer.stop();

  if (app.httpServer) {
    await app.httpServer.stop();
  }

  await app.engine.stop();
  console.log('Shutdown complete');
}

function printStartupInfo(config: ServerConfig, app: Application): void {
  console.log('chanstore - Ready!');
  console.log(`  TCP: ${formatAddress({ ...config.address, port: app.tcpServer.getPort() })}`);

  if (app.httpServer) {
    console.log(`  HTTP API: http://${formatAddress({ ...config.address, port: app.httpServer.getPort() })}`);
  }

  console.log(`  Compaction threshold: ${config.compactionThreshold} deletions`);

  if (config.maxConnections !== undefined) {
    console.log(`  Max connections: ${config.maxConnections}`);
  }
}

async function runServer(config: ServerConfig): Promise<void> {
  let shuttingDown = false;

  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    await shutdownApplication(app);
    process.exit(exitCode);
  };

  const shutdownOrExit = (exitCode: number): void => {
    shutdown(exitCode).catch((err) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };

  const app = createApplication(config, (err) => {
    console.error('Fatal error:', err);
    shutdownOrExit(1);
  });

  const onSignal = (): void => shutdownOrExit(0);

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await startApplication(app, config);
}

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  switch (options.mode) {
    case RunMode.SERVER:
      await runServer(options.config);
      break;

    case RunMode.CLIENT:
      await new InteractiveClient({ address: options.config.address }).run();
      break;

    default:
      console.log(`unknown mode '${options.mode}', valid values are: 'server', 'client'`);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
