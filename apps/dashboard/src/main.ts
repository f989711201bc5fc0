import { createServer } from 'http';
import type { Server } from 'http';
import type { LoggerPort } from '@vehicle-dash/domain';
import { isDashboardError } from '@vehicle-dash/domain';
import { createConsoleLogger, isLogLevel } from '@vehicle-dash/adapters';
import { buildApp } from './app.js';
import type { DashboardConfig } from './config/dashboard-config.js';
import { describeThresholds, loadConfig } from './config/dashboard-config.js';
import type { RuntimeOverrides } from './runtime.js';
import { createRuntime, stopRuntime } from './runtime.js';
import { WsGateway } from './ws/ws-gateway.js';

/** Where shutdown signals come from; `process` outside tests */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface MainOptions {
  /** Used for every log line; defaults to console loggers at the configured level */
  logger?: LoggerPort;
  cwd?: string;
  overrides?: RuntimeOverrides;
  signals?: SignalSource;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/**
 * Runs the dashboard until `max_ticks` or a shutdown signal.
 * Resolves 0 on a clean stop, 1 when configuration or startup fails.
 */
export async function main(env: Record<string, string | undefined>, opts: MainOptions = {}): Promise<number> {
  const requested = env['LOG_LEVEL'] ?? 'info';
  const bootLogger =
    opts.logger ?? createConsoleLogger({ level: isLogLevel(requested) ? requested : 'info', tag: 'server' });

  let config: DashboardConfig;
  try {
    config = loadConfig(env, bootLogger, opts.cwd);
  } catch (err) {
    if (!isDashboardError(err)) throw err;
    bootLogger.error(`startup failed: ${err.message}`);
    return 1;
  }
  const logger = opts.logger ?? createConsoleLogger({ level: config.logLevel, tag: 'server' });

  const runtime = createRuntime(config, logger, opts.overrides);
  logger.info(`vehicle dashboard initialized (run ${runtime.runId}, source ${runtime.source.name})`);
  logger.info(describeThresholds(config.alertThresholds));

  // registered before the source starts so a signal during the first poll still stops cleanly
  const signals: SignalSource = opts.signals ?? process;
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, finishing current tick...`);
    runtime.shutdown.abort();
  };
  for (const signal of SHUTDOWN_SIGNALS) signals.once(signal, onSignal);

  let httpServer: Server | null = null;
  try {
    if (config.httpPort !== null) {
      const app = buildApp({ query: runtime.loop, push: runtime.push, logger: logger.child('http') });
      const server = createServer(app);
      httpServer = server;
      runtime.loop.attach(new WsGateway(server, logger.child('ws-gateway')));
      await listen(server, config.httpPort);
      logger.info(`listening on http://0.0.0.0:${config.httpPort}`);
    }

    try {
      await runtime.feed.start();
    } catch (err) {
      if (!isDashboardError(err)) throw err;
      logger.error(`startup failed: ${err.message}`);
      return 1;
    }

    const outcome = await runtime.loop.run(runtime.shutdown.signal);
    logger.info(outcome === 'completed' ? 'monitoring cycle complete' : 'shutting down...');

    const { accepted, rejected } = runtime.aggregator.stats();
    logger.info(`${runtime.loop.ticksRendered()} ticks rendered, ${accepted} readings accepted, ${rejected} discarded`);
    return 0;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) signals.off(signal, onSignal);
    await stopRuntime(runtime);
    if (httpServer) await closeServer(httpServer);
  }
}
