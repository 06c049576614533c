import * as client from 'prom-client';
import { HealthMonitor, type LivenessProbe } from '../../../services/health-monitor.service';
import { LivenessRegistry } from '../../../services/liveness-registry.service';

const CHECKED_AT = new Date('2026-03-02T09:30:00.000Z');

function liveProbe(liveness: LivenessRegistry, subsystem: string): LivenessProbe {
  return {
    subsystem,
    probe: async () => {
      liveness.markLive(subsystem);
      return true;
    },
  };
}

function makeMonitor() {
  const liveness = new LivenessRegistry(() => CHECKED_AT);
  const monitor = new HealthMonitor({ liveness, subsystems: ['model', 'curriculum'], now: () => CHECKED_AT });
  return { liveness, monitor };
}

describe('HealthMonitor', () => {
  it('counts subsystems that were never seen as not live', () => {
    const { monitor } = makeMonitor();

    expect(monitor.getHealth()).toEqual({
      status: 'degraded',
      subsystems: { model: false, curriculum: false },
      checkedAt: '2026-03-02T09:30:00.000Z',
    });
  });

  it('is healthy only when every subsystem is live', () => {
    const { liveness, monitor } = makeMonitor();
    liveness.markLive('model');
    expect(monitor.getHealth().status).toBe('degraded');

    liveness.markLive('curriculum');
    expect(monitor.getHealth()).toMatchObject({ status: 'healthy', subsystems: { model: true, curriculum: true } });
  });

  it('reflects the latest liveness write', () => {
    const { liveness, monitor } = makeMonitor();
    liveness.markLive('model');
    liveness.markLive('curriculum');
    liveness.markDown('model', 'authentication rejected');

    expect(monitor.getHealth().subsystems).toEqual({ model: false, curriculum: true });
  });

  it('exports subsystem liveness as a gauge', async () => {
    const { liveness, monitor } = makeMonitor();
    liveness.markLive('curriculum');
    monitor.getHealth();

    const text = await client.register.getSingleMetricAsString('gateway_subsystem_live');
    expect(text).toContain('gateway_subsystem_live{subsystem="model"} 0');
    expect(text).toContain('gateway_subsystem_live{subsystem="curriculum"} 1');
  });

  it('runs probes before reporting', async () => {
    const liveness = new LivenessRegistry(() => CHECKED_AT);
    const monitor = new HealthMonitor({
      liveness,
      subsystems: ['model', 'curriculum'],
      probes: [liveProbe(liveness, 'model'), liveProbe(liveness, 'curriculum')],
    });

    await expect(monitor.probe()).resolves.toMatchObject({ status: 'healthy' });
  });

  it('marks a subsystem down when its probe throws', async () => {
    const liveness = new LivenessRegistry(() => CHECKED_AT);
    const monitor = new HealthMonitor({
      liveness,
      subsystems: ['model', 'curriculum'],
      probes: [liveProbe(liveness, 'model'), { subsystem: 'curriculum', probe: () => Promise.reject(new Error('boom')) }],
    });
    liveness.markLive('curriculum');

    const health = await monitor.probe();

    expect(health).toMatchObject({ status: 'degraded', subsystems: { model: true, curriculum: false } });
    expect(liveness.get('curriculum')).toMatchObject({ live: false, detail: 'probe failed' });
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('"msg":"health-monitor:probe-failed"'));
  });
});
