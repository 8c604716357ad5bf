/**
 * Upstream Supervisor Types
 */

import type { BackoffPolicy } from '../../core/backoff.js';
import { DEFAULT_BACKOFF_POLICY } from '../../core/backoff.js';
import type { ExtractedValueSet } from '../../core/types.js';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface RawFrameLogging {
  /** Log raw frames while the quota lasts */
  logRawFrames: boolean;
  /** Total frames logged for the process lifetime; never replenished */
  rawFramesLimit: number;
}

export interface UpstreamConfig {
  /** WebSocket endpoint of the device */
  url: string;
  /** Extra handshake headers (auth tokens, origin, ...) */
  headers: Record<string, string>;
  /** Opening handshake timeout (ms) */
  handshakeTimeout: number;
  /** Ping interval while connected (ms); 0 disables the heartbeat */
  heartbeatInterval: number;
  /** Time allowed for the matching pong before the socket is dropped (ms) */
  heartbeatTimeout: number;
  reconnect: BackoffPolicy;
  debug: RawFrameLogging;
  /** Characters of a raw frame kept in diagnostic log lines */
  rawFrameLogLength: number;
}

export const DEFAULT_UPSTREAM_CONFIG: Omit<UpstreamConfig, 'url'> = {
  headers: {},
  handshakeTimeout: 10000,
  heartbeatInterval: 20000,
  heartbeatTimeout: 20000,
  reconnect: { ...DEFAULT_BACKOFF_POLICY },
  debug: {
    logRawFrames: false,
    rawFramesLimit: 0,
  },
  rawFrameLogLength: 500,
};

// -----------------------------------------------------------------------------
// State
// -----------------------------------------------------------------------------

export const ConnectionState = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  CONNECTED: 'connected',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export interface UpstreamState {
  connectionState: ConnectionState;
  /** Delay the next failure will wait (ms) */
  backoffDelay: number;
  lastConnected: number | null;
  lastDisconnected: number | null;
  /** Failures since the last successful connection */
  consecutiveFailures: number;
  lastError: string | null;
}

// -----------------------------------------------------------------------------
// Events
// -----------------------------------------------------------------------------

export type UpstreamEvent =
  | { type: 'connecting'; url: string }
  | { type: 'connected' }
  | { type: 'disconnected'; reason: string }
  | { type: 'reconnecting'; attempt: number; delay: number }
  | { type: 'frame'; values: ExtractedValueSet }
  | { type: 'frame_dropped'; reason: string }
  | { type: 'error'; error: string };

export type UpstreamEventHandler = (event: UpstreamEvent) => void;

// -----------------------------------------------------------------------------
// Metrics
// -----------------------------------------------------------------------------

export interface UpstreamMetrics {
  connectionAttempts: number;
  connections: number;
  framesReceived: number;
  framesProcessed: number;
  framesDropped: number;
  framesFailed: number;
  rawFramesLogged: number;
  heartbeatTimeouts: number;
  reconnects: number;
}

export const INITIAL_UPSTREAM_METRICS: UpstreamMetrics = {
  connectionAttempts: 0,
  connections: 0,
  framesReceived: 0,
  framesProcessed: 0,
  framesDropped: 0,
  framesFailed: 0,
  rawFramesLogged: 0,
  heartbeatTimeouts: 0,
  reconnects: 0,
};
