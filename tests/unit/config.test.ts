/**
 * Configuration Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigParseError,
  ConfigValidationError,
  deepMerge,
  loadConfig,
  loadEnvConfig,
  normaliseAddonOptions,
  parseConfig,
  validateConfig,
} from '../../src/config/loader.js';

const ADDON_OPTIONS = {
  ws_url: 'ws://192.168.1.50:9999',
  ws_headers: { Origin: 'http://192.168.1.50' },
  mqtt: {
    host: 'core-mosquitto',
    port: 1883,
    username: '',
    password: 'test-secret',
    discovery_prefix: 'homeassistant',
  },
  base_topic: 'k1max',
  device_id: 'k1max',
  device_name: 'K1 Max',
  mappings: [
    {
      name: 'Progress',
      unique_id: 'k1_progress',
      jsonpath: '$.progress',
      transform: 'percent_0_1_to_0_100',
      unit: '%',
      icon: '',
      device_class: '',
      state_class: 'measurement',
    },
  ],
  debug: { log_raw_frames: true, raw_frames_limit: 5 },
};

const MINIMAL_CONFIG = {
  upstream: { url: 'ws://printer.local:9999' },
  device: { id: 'k1max', name: 'K1 Max' },
};

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ws-mqtt-bridge-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  it('should fill defaults around a minimal file', () => {
    const config = loadConfig({ configPath: writeConfig('bridge.json', MINIMAL_CONFIG), env: {} });

    expect(config.upstream).toEqual({
      url: 'ws://printer.local:9999',
      headers: {},
      handshakeTimeout: 10000,
      heartbeatInterval: 20000,
      heartbeatTimeout: 20000,
      reconnect: { initialDelay: 2000, maxDelay: 60000 },
    });
    expect(config.mqtt.host).toBe('localhost');
    expect(config.mqtt.port).toBe(1883);
    expect(config.mqtt.discoveryPrefix).toBe('homeassistant');
    expect(config.baseTopic).toBe('ws_bridge');
    expect(config.device).toEqual({
      id: 'k1max',
      name: 'K1 Max',
      manufacturer: 'Creality',
      model: 'K1/K1 Max (WS Bridge)',
    });
    expect(config.mappings).toEqual([]);
    expect(config.debug).toEqual({ logRawFrames: false, rawFramesLimit: 0 });
    expect(config.logging).toEqual({ level: 'info', pretty: true });
  });

  it('should keep human-readable logging for add-on options', () => {
    const config = loadConfig({ configPath: writeConfig('options.json', ADDON_OPTIONS), env: {} });
    expect(config.logging.pretty).toBe(true);
  });

  it('should allow JSON log lines to be selected', () => {
    const config = loadConfig({
      configPath: writeConfig('bridge.json', MINIMAL_CONFIG),
      env: { BRIDGE_LOGGING_PRETTY: 'false', BRIDGE_UPSTREAM_HEARTBEATINTERVAL: '0' },
    });

    expect(config.logging.pretty).toBe(false);
    expect(config.upstream.heartbeatInterval).toBe(0);
  });

  it('should read the add-on options format', () => {
    const config = loadConfig({ configPath: writeConfig('options.json', ADDON_OPTIONS), env: {} });

    expect(config.upstream.url).toBe('ws://192.168.1.50:9999');
    expect(config.upstream.headers).toEqual({ Origin: 'http://192.168.1.50' });
    expect(config.mqtt.host).toBe('core-mosquitto');
    expect(config.mqtt.username).toBeUndefined();
    expect(config.mqtt.password).toBe('test-secret');
    expect(config.baseTopic).toBe('k1max');
    expect(config.mappings).toEqual([
      {
        uniqueId: 'k1_progress',
        name: 'Progress',
        path: '$.progress',
        transform: 'percent_0_1_to_0_100',
        unit: '%',
        stateClass: 'measurement',
      },
    ]);
    expect(config.debug).toEqual({ logRawFrames: true, rawFramesLimit: 5 });
  });

  it('should apply environment then explicit overrides', () => {
    const config = loadConfig({
      configPath: writeConfig('bridge.json', MINIMAL_CONFIG),
      env: {
        BRIDGE_MQTT_HOST: 'broker.local',
        BRIDGE_MQTT_PORT: '1884',
        BRIDGE_UPSTREAM_RECONNECT_MAXDELAY: '30000',
        BRIDGE_BASETOPIC: 'printer',
      },
      overrides: { mqtt: { port: 8883 } },
    });

    expect(config.mqtt.host).toBe('broker.local');
    expect(config.mqtt.port).toBe(8883);
    expect(config.upstream.reconnect).toEqual({ initialDelay: 2000, maxDelay: 30000 });
    expect(config.baseTopic).toBe('printer');
  });

  it('should skip environment overrides when disabled', () => {
    const config = loadConfig({
      configPath: writeConfig('bridge.json', MINIMAL_CONFIG),
      env: { BRIDGE_MQTT_HOST: 'broker.local' },
      applyEnv: false,
    });

    expect(config.mqtt.host).toBe('localhost');
  });

  it('should report malformed JSON', () => {
    const path = writeConfig('broken.json', '{ "upstream": ');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(ConfigParseError);
  });

  it('should report a top-level value that is not an object', () => {
    const path = writeConfig('list.json', '[]');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(
      `Failed to parse config file '${path}': top-level value must be an object`
    );
  });

  it('should report a missing explicit file', () => {
    expect(() => loadConfig({ configPath: join(dir, 'absent.json'), env: {} })).toThrow(ConfigParseError);
  });

  it('should list every validation issue', () => {
    const path = writeConfig('bridge.json', { device: { id: 'k1max', name: 'K1 Max' } });

    try {
      loadConfig({ configPath: path, env: {} });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors).toEqual(['upstream: Required']);
      }
    }
  });
});

describe('parseConfig', () => {
  it('should reject duplicate unique ids', () => {
    const mapping = { uniqueId: 'a', name: 'A', path: '$.a' };

    expect(() => parseConfig({ ...MINIMAL_CONFIG, mappings: [mapping, mapping] })).toThrow(
      "mappings.1.uniqueId: Duplicate uniqueId 'a'"
    );
  });

  it('should reject malformed paths', () => {
    expect(() =>
      parseConfig({ ...MINIMAL_CONFIG, mappings: [{ uniqueId: 'a', name: 'A', path: '$.' }] })
    ).toThrow('mappings.0.path: Invalid JSON path expression');
  });

  it('should reject a ceiling below the floor', () => {
    expect(() =>
      parseConfig({
        ...MINIMAL_CONFIG,
        upstream: { url: 'ws://printer.local', reconnect: { initialDelay: 5000, maxDelay: 1000 } },
      })
    ).toThrow('upstream.reconnect.maxDelay: maxDelay must not be lower than initialDelay');
  });

  it('should default the transform mode', () => {
    const config = parseConfig({ ...MINIMAL_CONFIG, mappings: [{ uniqueId: 'a', name: 'A', path: '$.a' }] });
    expect(config.mappings[0]?.transform).toBe('none');
  });
});

describe('validateConfig', () => {
  it('should return the parsed configuration', () => {
    const result = validateConfig(MINIMAL_CONFIG);
    expect(result.valid).toBe(true);
    expect(result.config?.upstream.url).toBe('ws://printer.local:9999');
  });

  it('should return errors instead of throwing', () => {
    const result = validateConfig({ ...MINIMAL_CONFIG, mqtt: { port: 0 } });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['mqtt.port: Number must be greater than or equal to 1']);
  });
});

describe('normaliseAddonOptions', () => {
  it('should leave native configuration untouched', () => {
    const native = { ...MINIMAL_CONFIG };
    expect(normaliseAddonOptions(native)).toBe(native);
  });

  it('should drop empty credentials and optional attributes', () => {
    const normalised = normaliseAddonOptions(ADDON_OPTIONS);

    expect(normalised['mqtt']).toEqual({
      host: 'core-mosquitto',
      port: 1883,
      password: 'test-secret',
      discoveryPrefix: 'homeassistant',
    });
    expect(normalised['device']).toEqual({ id: 'k1max', name: 'K1 Max' });
  });
});

describe('loadEnvConfig', () => {
  it('should nest prefixed variables and parse their values', () => {
    expect(
      loadEnvConfig({
        BRIDGE_MQTT_PORT: '1884',
        BRIDGE_LOGGING_LEVEL: 'debug',
        BRIDGE_DEBUG_LOGRAWFRAMES: 'true',
        BRIDGE_CONFIG_PATH: '/data/options.json',
        OTHER_VALUE: '1',
      })
    ).toEqual({
      mqtt: { port: 1884 },
      logging: { level: 'debug' },
      debug: { logRawFrames: true },
    });
  });
});

describe('deepMerge', () => {
  it('should merge nested objects and replace arrays', () => {
    expect(deepMerge({ a: { b: 1, c: [1] } }, { a: { c: [2], d: 3 } }, { e: undefined })).toEqual({
      a: { b: 1, c: [2], d: 3 },
    });
  });
});
