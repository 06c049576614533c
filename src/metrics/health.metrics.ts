import * as client from 'prom-client';

const subsystemLiveGauge = (() => {
  const name = 'gateway_subsystem_live';
  const existing = client.register.getSingleMetric(name) as client.Gauge<'subsystem'> | undefined;
  return (
    existing ||
    new client.Gauge<'subsystem'>({
      name,
      help: 'Last known liveness per gateway subsystem (1 live, 0 not live)',
      labelNames: ['subsystem'],
    })
  );
})();

export function recordSubsystemStatuses(subsystems: Record<string, boolean>): void {
  subsystemLiveGauge.reset();
  Object.entries(subsystems).forEach(([subsystem, live]) => {
    subsystemLiveGauge.set({ subsystem }, live ? 1 : 0);
  });
}
