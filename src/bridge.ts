/**
 * WebSocket to MQTT Bridge Orchestrator
 *
 * Wires the broker client, publisher, extractor and upstream supervisor
 * together and owns the optional metrics and health endpoints.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type pino from 'pino';
import type { BridgeConfig, BridgeConfigInput } from './config/schema.js';
import { parseConfig } from './config/loader.js';
import { FieldExtractor } from './core/extract/extractor.js';
import { createBusClient } from './transports/mqtt/client.js';
import { MqttPublisher } from './transports/mqtt/publisher.js';
import type { BusClient, BusConnectionConfig } from './transports/mqtt/types.js';
import { UpstreamSupervisor } from './transports/upstream/supervisor.js';
import { initLogger, bridgeLogger } from './observability/logger.js';
import { HealthManager, createConnectionChecker } from './observability/health.js';
import { getMetrics, getContentType } from './observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type BusClientFactory = (config: BusConnectionConfig) => BusClient;

export interface BridgeDependencies {
  /** Builds the broker client; defaults to a real mqtt connection */
  createBusClient?: BusClientFactory;
}

// -----------------------------------------------------------------------------
// Bridge Class
// -----------------------------------------------------------------------------

export class WsMqttBridge {
  private readonly config: BridgeConfig;
  private readonly createBusClient: BusClientFactory;
  private logger: pino.Logger = bridgeLogger();

  private publisher: MqttPublisher | null = null;
  private supervisor: UpstreamSupervisor | null = null;

  // Observability
  private healthManager: HealthManager;
  private metricsServer: Server | null = null;
  private healthServer: Server | null = null;

  private running = false;

  constructor(config: BridgeConfigInput, deps: BridgeDependencies = {}) {
    this.config = parseConfig(config);
    this.createBusClient = deps.createBusClient ?? ((busConfig) => createBusClient(busConfig));
    this.healthManager = new HealthManager();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the bridge. The upstream loop keeps running until stop().
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Bridge is already running');
    }

    initLogger({
      level: this.config.logging.level,
      pretty: this.config.logging.pretty || this.config.environment === 'development',
    });
    this.logger = bridgeLogger();
    this.logger.info('Starting bridge...');

    try {
      this.initPipeline();
      await this.initObservability();

      this.running = true;
      this.supervisor?.start();
      this.logger.info(
        { upstream: this.config.upstream.url, mappings: this.config.mappings.length },
        'Bridge started'
      );
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to start bridge');
      await this.stop();
      throw error;
    }
  }

  /**
   * Stop the bridge: close the upstream session, end the broker connection
   * and shut the HTTP endpoints.
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping bridge...');

    this.healthManager.stopBackgroundChecks();

    if (this.supervisor) {
      await this.supervisor.stop();
      this.supervisor = null;
    }

    if (this.publisher) {
      await this.publisher.close();
      this.publisher = null;
    }

    await this.stopObservabilityServers();

    this.running = false;
    this.logger.info('Bridge stopped');
  }

  // ---------------------------------------------------------------------------
  // Initialisation
  // ---------------------------------------------------------------------------

  private initPipeline(): void {
    const { mqtt, upstream, device } = this.config;

    const client = this.createBusClient({
      host: mqtt.host,
      port: mqtt.port,
      protocol: mqtt.protocol,
      username: mqtt.username,
      password: mqtt.password,
      clientIdPrefix: mqtt.clientIdPrefix,
      keepalive: mqtt.keepalive,
      reconnectPeriod: mqtt.reconnectPeriod,
    });

    const publisher = new MqttPublisher(client, {
      baseTopic: this.config.baseTopic,
      discoveryPrefix: mqtt.discoveryPrefix,
      device: {
        id: device.id,
        name: device.name,
        manufacturer: device.manufacturer,
        model: device.model,
      },
    });
    this.publisher = publisher;

    const extractor = new FieldExtractor(this.config.mappings);

    this.supervisor = new UpstreamSupervisor(
      {
        url: upstream.url,
        headers: upstream.headers,
        handshakeTimeout: upstream.handshakeTimeout,
        heartbeatInterval: upstream.heartbeatInterval,
        heartbeatTimeout: upstream.heartbeatTimeout,
        reconnect: upstream.reconnect,
        debug: this.config.debug,
      },
      extractor,
      publisher
    );

    this.healthManager.registerChecker('upstream', createConnectionChecker('upstream', () => this.supervisor));
    this.healthManager.registerChecker('mqtt', createConnectionChecker('mqtt', () => this.publisher));
  }

  private async initObservability(): Promise<void> {
    if (this.config.metrics.enabled) {
      this.metricsServer = await listen(
        createServer((req, res) => this.dispatch(req, res, () => this.handleMetricsRequest(req, res))),
        this.config.metrics.port
      );
      this.logger.info(
        { port: this.config.metrics.port, path: this.config.metrics.path },
        'Metrics endpoint started'
      );
    }

    if (this.config.health.enabled) {
      this.healthServer = await listen(
        createServer((req, res) => this.dispatch(req, res, () => this.handleHealthRequest(req, res))),
        this.config.health.port
      );
      this.logger.info({ port: this.config.health.port }, 'Health endpoint started');

      this.healthManager.startBackgroundChecks(this.config.health.checkInterval);
    }
  }

  private dispatch(req: IncomingMessage, res: ServerResponse, handler: () => Promise<void>): void {
    handler().catch((error: unknown) => {
      this.logger.error({ err: error, url: req.url }, 'Request failed');
      res.statusCode = 500;
      res.end();
    });
  }

  private async handleMetricsRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== this.config.metrics.path) {
      res.statusCode = 404;
      res.end('Not found');
      return;
    }

    const metrics = await getMetrics();
    res.setHeader('Content-Type', getContentType());
    res.end(metrics);
  }

  private async handleHealthRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    res.setHeader('Content-Type', 'application/json');

    if (req.url === '/health' || req.url === '/health/') {
      const health = await this.healthManager.health();
      res.statusCode = health.status === 'unhealthy' ? 503 : 200;
      res.end(JSON.stringify(health));
    } else if (req.url === '/health/live' || req.url === '/live') {
      const liveness = this.healthManager.liveness();
      res.statusCode = liveness.alive ? 200 : 503;
      res.end(JSON.stringify(liveness));
    } else if (req.url === '/health/ready' || req.url === '/ready') {
      const readiness = await this.healthManager.readiness();
      res.statusCode = readiness.ready ? 200 : 503;
      res.end(JSON.stringify(readiness));
    } else {
      res.statusCode = 404;
      res.end(JSON.stringify({ error: 'Not found' }));
    }
  }

  private async stopObservabilityServers(): Promise<void> {
    const servers = [this.metricsServer, this.healthServer];
    this.metricsServer = null;
    this.healthServer = null;

    for (const server of servers) {
      if (server) {
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<BridgeConfig> {
    return this.config;
  }

  getSupervisor(): UpstreamSupervisor | null {
    return this.supervisor;
  }

  getPublisher(): MqttPublisher | null {
    return this.publisher;
  }

  getHealthManager(): HealthManager {
    return this.healthManager;
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function listen(server: Server, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
