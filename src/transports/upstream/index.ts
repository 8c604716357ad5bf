/**
 * Upstream Transport Module
 */

export { UpstreamSupervisor } from './supervisor.js';
export type { UpstreamSupervisorOptions } from './supervisor.js';
export { DeviceSimulator, DEFAULT_DEVICE_SIMULATOR_CONFIG } from './simulator.js';
export type {
  DeviceSimulatorConfig,
  DeviceSimulatorEvent,
  DeviceSimulatorEventHandler,
} from './simulator.js';
export * from './types.js';
