/**
 * Device Simulator
 *
 * WebSocket server standing in for a device that streams JSON status frames.
 * Provides deterministic, scriptable behaviour for automated tests.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingHttpHeaders, IncomingMessage } from 'http';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface DeviceSimulatorConfig {
  /** Port to listen on (0 picks a free port) */
  port: number;
  host: string;
  /** Headers a client must present; mismatches are rejected with 401 */
  requiredHeaders?: Record<string, string>;
  /** Frame sent to every client right after it connects */
  greeting?: unknown;
  /** Answer pings; false mimics a device that vanished without closing */
  autoPong?: boolean;
}

export const DEFAULT_DEVICE_SIMULATOR_CONFIG: DeviceSimulatorConfig = {
  port: 0,
  host: '127.0.0.1',
};

export interface DeviceSimulatorEvent {
  type: 'client_connected' | 'client_disconnected' | 'client_rejected';
  clientId: string;
  headers?: IncomingHttpHeaders;
  timestamp: number;
}

export type DeviceSimulatorEventHandler = (event: DeviceSimulatorEvent) => void;

// -----------------------------------------------------------------------------
// Device Simulator
// -----------------------------------------------------------------------------

export class DeviceSimulator {
  private readonly config: DeviceSimulatorConfig;
  private server: WebSocketServer | null = null;
  private clients: Map<string, WebSocket> = new Map();
  private eventHandlers: Set<DeviceSimulatorEventHandler> = new Set();
  private eventLog: DeviceSimulatorEvent[] = [];
  private clientIdCounter = 0;

  constructor(config: Partial<DeviceSimulatorConfig> = {}) {
    this.config = { ...DEFAULT_DEVICE_SIMULATOR_CONFIG, ...config };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the simulator server.
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({
        port: this.config.port,
        host: this.config.host,
        autoPong: this.config.autoPong ?? true,
        verifyClient: (info: { req: IncomingMessage }) => this.verifyClient(info.req),
      });

      server.on('connection', (ws, req) => this.handleConnection(ws, req));
      server.once('listening', () => resolve());
      server.once('error', (error) => reject(error));

      this.server = server;
    });
  }

  /**
   * Stop the simulator server.
   */
  async stop(): Promise<void> {
    for (const ws of this.clients.values()) {
      ws.terminate();
    }
    this.clients.clear();

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  // ---------------------------------------------------------------------------
  // Connection Handling
  // ---------------------------------------------------------------------------

  private verifyClient(req: IncomingMessage): boolean {
    const required = this.config.requiredHeaders ?? {};

    for (const [name, value] of Object.entries(required)) {
      if (req.headers[name.toLowerCase()] !== value) {
        this.emitEvent({
          type: 'client_rejected',
          clientId: `rejected-${++this.clientIdCounter}`,
          headers: req.headers,
          timestamp: Date.now(),
        });
        return false;
      }
    }

    return true;
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const clientId = `client-${++this.clientIdCounter}`;
    this.clients.set(clientId, ws);

    ws.on('close', () => {
      this.clients.delete(clientId);
      this.emitEvent({ type: 'client_disconnected', clientId, timestamp: Date.now() });
    });
    ws.on('error', () => ws.terminate());

    this.emitEvent({
      type: 'client_connected',
      clientId,
      headers: req.headers,
      timestamp: Date.now(),
    });

    if (this.config.greeting !== undefined) {
      ws.send(JSON.stringify(this.config.greeting));
    }
  }

  // ---------------------------------------------------------------------------
  // Scripting
  // ---------------------------------------------------------------------------

  /**
   * Send a frame to every client. Strings go out verbatim, anything else as JSON.
   */
  sendFrame(frame: unknown): void {
    const payload = typeof frame === 'string' ? frame : JSON.stringify(frame);

    for (const ws of this.clients.values()) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  /**
   * Close every client connection with a protocol close frame.
   */
  closeClients(code = 1001, reason = 'Device restarting'): void {
    for (const ws of this.clients.values()) {
      ws.close(code, reason);
    }
  }

  /**
   * Drop every client connection without a close handshake.
   */
  dropClients(): void {
    for (const ws of this.clients.values()) {
      ws.terminate();
    }
  }

  // ---------------------------------------------------------------------------
  // Event Handling
  // ---------------------------------------------------------------------------

  private emitEvent(event: DeviceSimulatorEvent): void {
    this.eventLog.push(event);

    for (const handler of this.eventHandlers) {
      handler(event);
    }
  }

  onEvent(handler: DeviceSimulatorEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: DeviceSimulatorEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Simulator is not listening');
    }
    return address.port;
  }

  get url(): string {
    return `ws://${this.config.host}:${this.port}`;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  getEventLog(): DeviceSimulatorEvent[] {
    return [...this.eventLog];
  }
}
