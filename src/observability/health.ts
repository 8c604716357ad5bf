/**
 * Health Checks
 *
 * Liveness, readiness, and dependency health endpoints.
 */

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export const HealthStatus = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  lastCheck: number;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  version: string;
  dependencies: DependencyHealth[];
}

export interface LivenessReport {
  alive: boolean;
  timestamp: number;
}

export interface ReadinessReport {
  ready: boolean;
  timestamp: number;
  reason?: string;
}

export type HealthChecker = () => Promise<DependencyHealth>;

/**
 * Anything with a connection that can be probed.
 */
export interface ConnectionProbe {
  isConnected: () => boolean;
  getState?: () => { lastError: string | null };
}

const CHECK_TIMEOUT_MS = 5000;

// -----------------------------------------------------------------------------
// Health Manager
// -----------------------------------------------------------------------------

export class HealthManager {
  private readonly startTime: number;
  private readonly version: string;
  private checkers: Map<string, HealthChecker> = new Map();
  private lastCheckResults: Map<string, DependencyHealth> = new Map();
  private checkInterval: ReturnType<typeof setInterval> | null = null;

  constructor(version = '0.1.0') {
    this.startTime = Date.now();
    this.version = version;
  }

  // ---------------------------------------------------------------------------
  // Checker Registration
  // ---------------------------------------------------------------------------

  /**
   * Register a health checker for a dependency.
   */
  registerChecker(name: string, checker: HealthChecker): void {
    this.checkers.set(name, checker);
  }

  unregisterChecker(name: string): void {
    this.checkers.delete(name);
    this.lastCheckResults.delete(name);
  }

  // ---------------------------------------------------------------------------
  // Health Checks
  // ---------------------------------------------------------------------------

  /**
   * Check liveness (is the process alive and responsive).
   */
  liveness(): LivenessReport {
    return {
      alive: true,
      timestamp: Date.now(),
    };
  }

  /**
   * Ready when no dependency is unhealthy. A disconnected upstream is only
   * degraded: the supervisor is expected to recover it.
   */
  async readiness(): Promise<ReadinessReport> {
    const results = await this.runAllChecks();
    const unhealthyDeps = results.filter((r) => r.status === HealthStatus.UNHEALTHY);

    if (unhealthyDeps.length > 0) {
      return {
        ready: false,
        timestamp: Date.now(),
        reason: `Unhealthy dependencies: ${unhealthyDeps.map((d) => d.name).join(', ')}`,
      };
    }

    return {
      ready: true,
      timestamp: Date.now(),
    };
  }

  /**
   * Get full health report.
   */
  async health(): Promise<HealthReport> {
    const dependencies = await this.runAllChecks();

    let status: HealthStatus = HealthStatus.HEALTHY;

    if (dependencies.some((d) => d.status === HealthStatus.UNHEALTHY)) {
      status = HealthStatus.UNHEALTHY;
    } else if (dependencies.some((d) => d.status === HealthStatus.DEGRADED)) {
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      timestamp: Date.now(),
      uptime: this.getUptime(),
      version: this.version,
      dependencies,
    };
  }

  /**
   * Run all registered health checks.
   */
  private async runAllChecks(): Promise<DependencyHealth[]> {
    const results: DependencyHealth[] = [];

    for (const [name, checker] of this.checkers) {
      const startTime = Date.now();
      let timer: ReturnType<typeof setTimeout> | undefined;

      try {
        const result = await Promise.race([
          checker(),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Health check timeout for ${name}`)), CHECK_TIMEOUT_MS);
          }),
        ]);
        result.latencyMs = Date.now() - startTime;
        results.push(result);
        this.lastCheckResults.set(name, result);
      } catch (error) {
        const errorResult: DependencyHealth = {
          name,
          status: HealthStatus.UNHEALTHY,
          lastCheck: Date.now(),
          error: error instanceof Error ? error.message : 'Check failed',
        };
        results.push(errorResult);
        this.lastCheckResults.set(name, errorResult);
      } finally {
        clearTimeout(timer);
      }
    }

    return results;
  }

  // ---------------------------------------------------------------------------
  // Background Checks
  // ---------------------------------------------------------------------------

  /**
   * Start periodic background health checks.
   */
  startBackgroundChecks(intervalMs = 30000): void {
    if (this.checkInterval) {
      return;
    }

    this.checkInterval = setInterval(() => {
      void this.runAllChecks();
    }, intervalMs);

    void this.runAllChecks();
  }

  stopBackgroundChecks(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }

  /**
   * Get cached results from last check.
   */
  getLastResults(): DependencyHealth[] {
    return Array.from(this.lastCheckResults.values());
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }
}

// -----------------------------------------------------------------------------
// Built-in Health Checkers
// -----------------------------------------------------------------------------

/**
 * Create a health checker for a connection. Missing means unhealthy,
 * disconnected means degraded.
 */
export function createConnectionChecker(
  name: string,
  getProbe: () => ConnectionProbe | null
): HealthChecker {
  return async () => {
    const probe = getProbe();

    if (!probe) {
      return {
        name,
        status: HealthStatus.UNHEALTHY,
        lastCheck: Date.now(),
        error: 'Not initialised',
      };
    }

    if (!probe.isConnected()) {
      return {
        name,
        status: HealthStatus.DEGRADED,
        lastCheck: Date.now(),
        error: probe.getState?.().lastError ?? 'Not connected',
        metadata: { connected: false },
      };
    }

    return {
      name,
      status: HealthStatus.HEALTHY,
      lastCheck: Date.now(),
      metadata: { connected: true },
    };
  };
}
