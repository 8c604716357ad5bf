/**
 * Upstream Supervisor
 *
 * Owns the WebSocket session to the device: connects, consumes frames,
 * detects failure and reconnects with exponential backoff. Every successful
 * connection re-announces discovery for all mappings; every frame is
 * extracted and published in arrival order.
 */

import { WebSocket } from 'ws';
import type pino from 'pino';
import { Backoff } from '../../core/backoff.js';
import type { FieldExtractor } from '../../core/extract/extractor.js';
import type { JsonValue } from '../../core/types.js';
import type { StatePublisher } from '../mqtt/publisher.js';
import { upstreamLogger } from '../../observability/logger.js';
import {
  recordFrame,
  recordUpstreamReconnect,
  updateUpstreamState,
} from '../../observability/metrics.js';
import type {
  UpstreamConfig,
  UpstreamEvent,
  UpstreamEventHandler,
  UpstreamMetrics,
  UpstreamState,
} from './types.js';
import {
  ConnectionState,
  DEFAULT_UPSTREAM_CONFIG,
  INITIAL_UPSTREAM_METRICS,
} from './types.js';

export type UpstreamSupervisorOptions = Partial<UpstreamConfig> & Pick<UpstreamConfig, 'url'>;

// -----------------------------------------------------------------------------
// Upstream Supervisor
// -----------------------------------------------------------------------------

export class UpstreamSupervisor {
  private readonly config: UpstreamConfig;
  private readonly backoff: Backoff;
  private readonly logger: pino.Logger;

  private ws: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private pongTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  /** Error reported for the current attempt; a close event follows it */
  private attemptError: string | null = null;
  /** Set when the supervisor drops the socket itself */
  private dropReason: string | null = null;

  private state: UpstreamState;
  private metrics: UpstreamMetrics;
  private eventHandlers: Set<UpstreamEventHandler> = new Set();

  /** Raw-frame log budget for the whole process; only ever decremented */
  private rawFramesLeft: number;

  constructor(
    options: UpstreamSupervisorOptions,
    private readonly extractor: FieldExtractor,
    private readonly publisher: StatePublisher,
    logger: pino.Logger = upstreamLogger()
  ) {
    this.config = {
      ...DEFAULT_UPSTREAM_CONFIG,
      ...options,
      reconnect: { ...DEFAULT_UPSTREAM_CONFIG.reconnect, ...options.reconnect },
      debug: { ...DEFAULT_UPSTREAM_CONFIG.debug, ...options.debug },
    };
    this.logger = logger;
    this.backoff = new Backoff(this.config.reconnect);
    this.rawFramesLeft = this.config.debug.logRawFrames ? Math.max(this.config.debug.rawFramesLimit, 0) : 0;
    this.metrics = { ...INITIAL_UPSTREAM_METRICS };
    this.state = {
      connectionState: ConnectionState.DISCONNECTED,
      backoffDelay: this.backoff.current,
      lastConnected: null,
      lastDisconnected: null,
      consecutiveFailures: 0,
      lastError: null,
    };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the connection loop. It runs until stop() is called.
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.connect();
  }

  /**
   * Cancel any pending reconnect and close the live session, resolving once
   * the socket has closed.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.clearReconnectTimer();
    this.stopHeartbeat();

    const ws = this.ws;
    if (!ws) {
      this.updateConnectionState(ConnectionState.DISCONNECTED);
      return;
    }

    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());

      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close(1000, 'Bridge shutdown');
      }
    });
  }

  // ---------------------------------------------------------------------------
  // WebSocket Connection
  // ---------------------------------------------------------------------------

  private connect(): void {
    if (!this.running) {
      return;
    }

    this.metrics.connectionAttempts++;
    this.attemptError = null;
    this.dropReason = null;
    this.updateConnectionState(ConnectionState.CONNECTING);
    this.emitEvent({ type: 'connecting', url: this.config.url });
    this.logger.info({ url: this.config.url }, 'Connecting to upstream WebSocket');

    let ws: WebSocket;
    try {
      ws = new WebSocket(this.config.url, {
        headers: this.config.headers,
        handshakeTimeout: this.config.handshakeTimeout,
      });
    } catch (error) {
      // Invalid URL or unsupported scheme
      this.handleFailure(describeError(error));
      return;
    }

    this.ws = ws;

    ws.on('open', () => this.handleOpen(ws));
    ws.on('message', (data) => this.handleMessage(ws, data));
    ws.on('pong', () => this.handlePong(ws));
    ws.on('error', (error) => this.handleSocketError(ws, error));
    ws.on('close', (code, reason) => this.handleClose(ws, code, reason.toString()));
  }

  private handleOpen(ws: WebSocket): void {
    if (ws !== this.ws) return;

    this.backoff.reset();
    this.state.backoffDelay = this.backoff.current;
    this.state.consecutiveFailures = 0;
    this.state.lastConnected = Date.now();
    this.state.lastError = null;
    this.metrics.connections++;

    this.updateConnectionState(ConnectionState.CONNECTED);
    this.logger.info('WebSocket connected');
    this.startHeartbeat(ws);

    try {
      this.publisher.publishAllDiscovery(this.extractor.mappings);
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to publish discovery');
    }

    this.emitEvent({ type: 'connected' });
  }

  private handleMessage(ws: WebSocket, data: WebSocket.RawData): void {
    if (ws !== this.ws) return;

    this.handleFrame(rawDataToString(data));
  }

  private handleSocketError(ws: WebSocket, error: Error): void {
    if (ws !== this.ws) return;

    // A close event always follows; reconnect is scheduled from there
    this.attemptError = error.message;
    this.state.lastError = error.message;
    this.logger.debug({ err: error }, 'WebSocket error');
    this.emitEvent({ type: 'error', error: error.message });
  }

  private handleClose(ws: WebSocket, code: number, reason: string): void {
    if (ws !== this.ws) return;

    this.ws = null;
    this.stopHeartbeat();

    const wasConnected = this.state.connectionState === ConnectionState.CONNECTED;
    const closeDescription = `closed with code ${code}${reason ? ` (${reason})` : ''}`;
    const description =
      this.dropReason ?? (wasConnected ? closeDescription : (this.attemptError ?? closeDescription));

    this.handleFailure(description);
  }

  private handleFailure(reason: string): void {
    this.state.lastError = reason;
    this.state.lastDisconnected = Date.now();

    if (this.running) {
      this.state.consecutiveFailures++;
    }

    this.updateConnectionState(ConnectionState.DISCONNECTED);
    this.emitEvent({ type: 'disconnected', reason });

    this.scheduleReconnect(reason);
  }

  // ---------------------------------------------------------------------------
  // Heartbeat
  // ---------------------------------------------------------------------------

  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();
    if (this.config.heartbeatInterval <= 0) {
      return;
    }

    this.heartbeatTimer = setInterval(() => {
      // one ping in flight at a time
      if (ws.readyState !== WebSocket.OPEN || this.pongTimer) {
        return;
      }

      this.pongTimer = setTimeout(() => this.handleHeartbeatTimeout(ws), this.config.heartbeatTimeout);
      ws.ping();
    }, this.config.heartbeatInterval);
  }

  private handlePong(ws: WebSocket): void {
    if (ws !== this.ws || !this.pongTimer) return;

    clearTimeout(this.pongTimer);
    this.pongTimer = null;
  }

  private handleHeartbeatTimeout(ws: WebSocket): void {
    this.pongTimer = null;
    if (ws !== this.ws) return;

    this.metrics.heartbeatTimeouts++;
    this.dropReason = 'keepalive ping timeout';
    this.logger.warn({ timeoutMs: this.config.heartbeatTimeout }, 'No pong from upstream, dropping connection');
    ws.terminate();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Frame Processing
  // ---------------------------------------------------------------------------

  private handleFrame(text: string): void {
    this.metrics.framesReceived++;

    let frame: JsonValue;
    try {
      frame = JSON.parse(text);
    } catch (error) {
      this.logRawFrame('nonjson', () => text);
      this.metrics.framesDropped++;
      recordFrame('dropped');
      this.emitEvent({ type: 'frame_dropped', reason: describeError(error) });
      return;
    }

    this.logRawFrame('json', () => JSON.stringify(frame));

    try {
      const values = this.extractor.extract(frame);

      for (const mapping of this.extractor.mappings) {
        this.publisher.publishState(mapping.uniqueId, values.get(mapping.uniqueId) ?? null, mapping.transform);
      }

      this.metrics.framesProcessed++;
      recordFrame('processed');
      this.emitEvent({ type: 'frame', values });
    } catch (error) {
      this.metrics.framesFailed++;
      recordFrame('failed');
      this.logger.error({ err: error }, 'Failed to process frame');
    }
  }

  private logRawFrame(kind: 'json' | 'nonjson', render: () => string): void {
    if (this.rawFramesLeft <= 0) {
      return;
    }

    this.rawFramesLeft--;
    this.metrics.rawFramesLogged++;
    this.logger.info(`RAW(${kind}) = ${render().slice(0, this.config.rawFrameLogLength)}`);
  }

  // ---------------------------------------------------------------------------
  // Reconnection
  // ---------------------------------------------------------------------------

  private scheduleReconnect(reason: string): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }

    const delay = this.backoff.next();
    this.state.backoffDelay = this.backoff.current;
    this.metrics.reconnects++;
    recordUpstreamReconnect(delay);

    this.logger.warn(
      { reason, delayMs: delay, attempt: this.state.consecutiveFailures },
      `WebSocket error: ${reason}, retrying in ${delay / 1000}s`
    );
    this.emitEvent({ type: 'reconnecting', attempt: this.state.consecutiveFailures, delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // State Updates
  // ---------------------------------------------------------------------------

  private updateConnectionState(state: ConnectionState): void {
    this.state.connectionState = state;
    updateUpstreamState(state === ConnectionState.CONNECTED);
  }

  private emitEvent(event: UpstreamEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Event handler error');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  onEvent(handler: UpstreamEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: UpstreamEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  getState(): Readonly<UpstreamState> {
    return { ...this.state };
  }

  getMetrics(): Readonly<UpstreamMetrics> {
    return { ...this.metrics };
  }

  isConnected(): boolean {
    return this.state.connectionState === ConnectionState.CONNECTED;
  }

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<UpstreamConfig> {
    return { ...this.config };
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
