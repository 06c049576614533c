import { recordSubsystemStatuses } from '../metrics/health.metrics';
import { logger } from '../utils/logger';
import type { LivenessRegistry } from './liveness-registry.service';

export type GatewayHealthStatus = 'healthy' | 'degraded';

export interface GatewayHealth {
  status: GatewayHealthStatus;
  subsystems: Record<string, boolean>;
  checkedAt: string;
}

export interface LivenessProbe {
  readonly subsystem: string;
  probe(): Promise<boolean>;
}

export interface HealthMonitorOptions {
  liveness: LivenessRegistry;
  /** Subsystems that must all be live for the gateway to count as healthy. */
  subsystems: string[];
  probes?: LivenessProbe[];
  now?: () => Date;
}

/**
 * Single place where gateway health is derived. Status is the AND of the
 * tracked subsystems; a subsystem never seen counts as not live.
 */
export class HealthMonitor {
  private readonly now: () => Date;

  constructor(private readonly options: HealthMonitorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  getHealth(): GatewayHealth {
    const subsystems: Record<string, boolean> = {};
    for (const name of this.options.subsystems) {
      subsystems[name] = this.options.liveness.get(name)?.live ?? false;
    }
    const status: GatewayHealthStatus = Object.values(subsystems).every(Boolean) ? 'healthy' : 'degraded';
    recordSubsystemStatuses(subsystems);
    return { status, subsystems, checkedAt: this.now().toISOString() };
  }

  /** Runs every registered probe, then reports. Probe failures only affect liveness. */
  async probe(): Promise<GatewayHealth> {
    const probes = this.options.probes ?? [];
    const results = await Promise.allSettled(probes.map((p) => p.probe()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const subsystem = probes[i].subsystem;
        this.options.liveness.markDown(subsystem, 'probe failed');
        logger.warn('health-monitor:probe-failed', {
          subsystem,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
    return this.getHealth();
  }
}
