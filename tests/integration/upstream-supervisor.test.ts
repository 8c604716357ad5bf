/**
 * Upstream Supervisor Integration Tests
 *
 * Runs the supervisor against the device simulator with a recording bus.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { UpstreamSupervisor } from '../../src/transports/upstream/supervisor.js';
import type { UpstreamSupervisorOptions } from '../../src/transports/upstream/supervisor.js';
import { DeviceSimulator } from '../../src/transports/upstream/simulator.js';
import { ConnectionState } from '../../src/transports/upstream/types.js';
import type { UpstreamEvent } from '../../src/transports/upstream/types.js';
import { MqttPublisher } from '../../src/transports/mqtt/publisher.js';
import type { StatePublisher } from '../../src/transports/mqtt/publisher.js';
import { FieldExtractor } from '../../src/core/extract/extractor.js';
import { RecordingBusClient, waitFor } from '../helpers/recording-bus.js';
import { TEST_DEVICE, TEST_MAPPINGS } from '../fixtures/mappings.js';

const FAST_RECONNECT = { initialDelay: 50, maxDelay: 200 };

const DISCOVERY_TOPICS = [
  'homeassistant/sensor/k1max/k1_progress/config',
  'homeassistant/sensor/k1max/k1_time_left/config',
  'homeassistant/sensor/k1max/k1_nozzle_temp/config',
];

describe('UpstreamSupervisor Integration', () => {
  let simulator: DeviceSimulator;
  let bus: RecordingBusClient;
  let publisher: MqttPublisher;
  let supervisor: UpstreamSupervisor | null;
  let events: UpstreamEvent[];

  beforeEach(async () => {
    simulator = new DeviceSimulator();
    await simulator.start();

    bus = new RecordingBusClient();
    publisher = new MqttPublisher(bus, {
      baseTopic: 'k1max',
      discoveryPrefix: 'homeassistant',
      device: TEST_DEVICE,
    });
    supervisor = null;
    events = [];
  });

  afterEach(async () => {
    await supervisor?.stop();
    await simulator.stop();
  });

  function startSupervisor(
    options: Partial<UpstreamSupervisorOptions> = {},
    statePublisher: StatePublisher = publisher,
    logger?: pino.Logger
  ): UpstreamSupervisor {
    const instance = new UpstreamSupervisor(
      { url: simulator.url, reconnect: FAST_RECONNECT, ...options },
      new FieldExtractor(TEST_MAPPINGS),
      statePublisher,
      logger
    );
    instance.onEvent((event) => events.push(event));
    instance.start();
    supervisor = instance;
    return instance;
  }

  function count(type: UpstreamEvent['type']): number {
    return events.filter((event) => event.type === type).length;
  }

  function framesSeen(): number {
    return count('frame') + count('frame_dropped');
  }

  describe('connection', () => {
    it('should connect and announce discovery for every mapping', async () => {
      const instance = startSupervisor();
      await waitFor(() => count('connected') === 1);

      expect(instance.isConnected()).toBe(true);
      expect(instance.getState().connectionState).toBe(ConnectionState.CONNECTED);
      expect(bus.topics()).toEqual(DISCOVERY_TOPICS);
      expect(simulator.clientCount).toBe(1);
    });

    it('should send the configured headers', async () => {
      await simulator.stop();
      simulator = new DeviceSimulator({ requiredHeaders: { Authorization: 'Bearer test-secret' } });
      await simulator.start();

      startSupervisor({ headers: { Authorization: 'Bearer test-secret' } });
      await waitFor(() => count('connected') === 1);

      const connected = simulator.getEventLog().find((e) => e.type === 'client_connected');
      expect(connected?.headers?.['authorization']).toBe('Bearer test-secret');
    });

    it('should retry when the handshake is rejected', async () => {
      await simulator.stop();
      simulator = new DeviceSimulator({ requiredHeaders: { Authorization: 'Bearer test-secret' } });
      await simulator.start();

      const instance = startSupervisor();
      await waitFor(() => count('reconnecting') === 2);

      expect(events.find((e) => e.type === 'disconnected')).toEqual({
        type: 'disconnected',
        reason: 'Unexpected server response: 401',
      });
      expect(count('connected')).toBe(0);
      expect(bus.published).toEqual([]);
      expect(instance.getState().consecutiveFailures).toBeGreaterThanOrEqual(2);
    });

    it('should retry when the URL is invalid', async () => {
      const instance = startSupervisor({ url: 'not a url' });
      await waitFor(() => count('reconnecting') === 2);

      expect(events[1]).toEqual({ type: 'disconnected', reason: 'Invalid URL: not a url' });
      expect(instance.getState().lastError).toBe('Invalid URL: not a url');
    });
  });

  describe('frames', () => {
    it('should publish transformed values in mapping order', async () => {
      startSupervisor();
      await waitFor(() => count('connected') === 1);
      bus.clear();

      simulator.sendFrame({ progress: 0.42, time_left: 125 });
      await waitFor(() => count('frame') === 1);

      expect(bus.published).toEqual([
        { topic: 'k1max/state/k1_progress', payload: '42.0', qos: 0, retain: true },
        { topic: 'k1max/state/k1_time_left', payload: '00:02:05', qos: 0, retain: true },
        { topic: 'k1max/state/k1_nozzle_temp', payload: '', qos: 0, retain: true },
      ]);
    });

    it('should process frames in arrival order', async () => {
      startSupervisor();
      await waitFor(() => count('connected') === 1);
      bus.clear();

      simulator.sendFrame({ status: { nozzleTemp: 180 } });
      simulator.sendFrame({ status: { nozzleTemp: 190 } });
      simulator.sendFrame({ status: { nozzleTemp: 200 } });
      await waitFor(() => count('frame') === 3);

      expect(bus.forTopic('k1max/state/k1_nozzle_temp').map((p) => p.payload)).toEqual(['180', '190', '200']);
    });

    it('should drop malformed frames and stay connected', async () => {
      const instance = startSupervisor();
      await waitFor(() => count('connected') === 1);
      bus.clear();

      simulator.sendFrame('{"progress": 0.5');
      await waitFor(() => count('frame_dropped') === 1);

      expect(bus.published).toEqual([]);
      expect(instance.isConnected()).toBe(true);
      expect(instance.getMetrics().framesDropped).toBe(1);

      simulator.sendFrame({ progress: 0.5 });
      await waitFor(() => count('frame') === 1);
      expect(bus.forTopic('k1max/state/k1_progress')[0]?.payload).toBe('50.0');
    });

    it('should keep running when publishing throws', async () => {
      const failing: StatePublisher = {
        publishAllDiscovery: () => undefined,
        publishState: () => {
          throw new Error('bus unavailable');
        },
      };
      const instance = startSupervisor({}, failing);
      await waitFor(() => count('connected') === 1);

      simulator.sendFrame({ progress: 0.1 });
      await waitFor(() => instance.getMetrics().framesFailed === 1);

      expect(instance.isConnected()).toBe(true);
      expect(instance.getMetrics().framesProcessed).toBe(0);
    });
  });

  describe('raw frame logging', () => {
    it('should log a bounded number of truncated frames', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });

      startSupervisor({ debug: { logRawFrames: true, rawFramesLimit: 2 }, rawFrameLogLength: 8 }, publisher, logger);
      await waitFor(() => count('connected') === 1);

      simulator.sendFrame('hello world');
      simulator.sendFrame({ a: 1 });
      simulator.sendFrame({ b: 2 });
      await waitFor(() => framesSeen() === 3);

      const rawMessages = lines
        .map((line): unknown => JSON.parse(line))
        .map((entry) => (typeof entry === 'object' && entry !== null && 'msg' in entry ? entry.msg : undefined))
        .filter((msg): msg is string => typeof msg === 'string' && msg.startsWith('RAW('));

      expect(rawMessages).toEqual(['RAW(nonjson) = hello wo', 'RAW(json) = {"a":1}']);
    });

    it('should not log frames when disabled', async () => {
      const instance = startSupervisor({ debug: { logRawFrames: false, rawFramesLimit: 10 } });
      await waitFor(() => count('connected') === 1);

      simulator.sendFrame({ a: 1 });
      await waitFor(() => count('frame') === 1);

      expect(instance.getMetrics().rawFramesLogged).toBe(0);
    });

    it('should not replenish the budget across reconnects', async () => {
      const instance = startSupervisor({ debug: { logRawFrames: true, rawFramesLimit: 1 } });
      await waitFor(() => count('connected') === 1);

      simulator.sendFrame({ a: 1 });
      await waitFor(() => count('frame') === 1);

      simulator.closeClients();
      await waitFor(() => count('connected') === 2);

      simulator.sendFrame({ a: 2 });
      await waitFor(() => count('frame') === 2);

      expect(instance.getMetrics().rawFramesLogged).toBe(1);
    });
  });

  describe('reconnection', () => {
    it('should reconnect after a close and republish identical discovery', async () => {
      startSupervisor();
      await waitFor(() => count('connected') === 1);
      const firstDiscovery = bus.published.map((p) => p.payload);
      bus.clear();

      simulator.closeClients();
      await waitFor(() => count('connected') === 2);

      expect(events.find((e) => e.type === 'disconnected')).toEqual({
        type: 'disconnected',
        reason: 'closed with code 1001 (Device restarting)',
      });
      expect(bus.topics()).toEqual(DISCOVERY_TOPICS);
      expect(bus.published.map((p) => p.payload)).toEqual(firstDiscovery);
    });

    it('should reset the backoff after a successful connection', async () => {
      startSupervisor();
      await waitFor(() => count('connected') === 1);

      simulator.dropClients();
      await waitFor(() => count('connected') === 2);
      simulator.dropClients();
      await waitFor(() => count('connected') === 3);

      const delays = events.flatMap((e) => (e.type === 'reconnecting' ? [e.delay] : []));
      expect(delays).toEqual([50, 50]);
    });

    it('should double the delay up to the ceiling while the device is down', async () => {
      const url = simulator.url;
      await simulator.stop();

      const instance = startSupervisor({ url });
      await waitFor(() => count('reconnecting') === 4);

      const delays = events.flatMap((e) => (e.type === 'reconnecting' ? [e.delay] : []));
      expect(delays).toEqual([50, 100, 200, 200]);
      expect(instance.isConnected()).toBe(false);
      expect(instance.getState().lastError).toContain('ECONNREFUSED');
    });
  });

  describe('heartbeat', () => {
    it('should drop a connection whose pings go unanswered and reconnect', async () => {
      await simulator.stop();
      simulator = new DeviceSimulator({ autoPong: false });
      await simulator.start();

      const instance = startSupervisor({ heartbeatInterval: 50, heartbeatTimeout: 50 });
      await waitFor(() => count('reconnecting') === 1);

      const types = events.map((e) => e.type);
      expect(types.slice(0, 4)).toEqual(['connecting', 'connected', 'disconnected', 'reconnecting']);
      expect(events[2]).toEqual({ type: 'disconnected', reason: 'keepalive ping timeout' });
      expect(instance.getMetrics().heartbeatTimeouts).toBe(1);
    });

    it('should keep a connection that answers pings', async () => {
      const instance = startSupervisor({ heartbeatInterval: 20, heartbeatTimeout: 50 });
      await waitFor(() => count('connected') === 1);

      await new Promise((resolve) => setTimeout(resolve, 200));

      expect(instance.isConnected()).toBe(true);
      expect(count('disconnected')).toBe(0);
      expect(instance.getMetrics().heartbeatTimeouts).toBe(0);
    });
  });

  describe('stop', () => {
    it('should close the live session without reconnecting', async () => {
      const instance = startSupervisor();
      await waitFor(() => count('connected') === 1);

      await instance.stop();
      await new Promise((resolve) => setTimeout(resolve, 150));

      expect(instance.isRunning()).toBe(false);
      expect(instance.getState().connectionState).toBe(ConnectionState.DISCONNECTED);
      expect(count('connecting')).toBe(1);
      expect(count('reconnecting')).toBe(0);
    });

    it('should cancel a pending backoff wait', async () => {
      const url = simulator.url;
      await simulator.stop();

      const instance = startSupervisor({ url, reconnect: { initialDelay: 100, maxDelay: 100 } });
      await waitFor(() => count('reconnecting') === 1);

      await instance.stop();
      await new Promise((resolve) => setTimeout(resolve, 250));

      expect(count('connecting')).toBe(1);
    });
  });
});
