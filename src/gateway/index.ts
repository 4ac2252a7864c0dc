/**
 * Gateway - the runtime plus the HTTP server, started and stopped together
 */

import { createLogger } from '../utils/logger';
import { createRuntime, shutdownRuntime, type EngineRuntime, type RuntimeDeps } from '../runtime';
import type { EngineConfig } from '../types';
import { createServer, type GatewayServer } from './server';

const logger = createLogger('gateway');

export interface Gateway {
  runtime: EngineRuntime;
  server: GatewayServer;
  start(): Promise<number>;
  stop(): Promise<void>;
}

export function createGateway(config: EngineConfig, deps: RuntimeDeps = {}): Gateway {
  const runtime = createRuntime(config, deps);
  const server = createServer(runtime, { port: config.server.port });
  let stopped = false;

  return {
    runtime,
    server,
    async start() {
      const port = await server.start();
      logger.info({ port, tabular: runtime.tabular.location, graph: runtime.graph.backend }, 'Gateway ready');
      return port;
    },
    async stop() {
      if (stopped) return;
      stopped = true;
      try {
        await server.stop();
      } finally {
        await shutdownRuntime(runtime);
      }
    },
  };
}

export { createServer, httpStatusFor, type GatewayServer, type ServerConfig } from './server';
