export interface LivenessEntry {
  live: boolean;
  updatedAt: string;
  /** Last success timestamp, kept across failures. */
  lastSuccessAt?: string;
  detail?: string;
}

/**
 * Process-wide liveness cache shared by the gateways and the health monitor.
 * Each write replaces the whole entry, so readers always see a completed update.
 */
export class LivenessRegistry {
  private entries = new Map<string, Readonly<LivenessEntry>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  markLive(subsystem: string): void {
    const at = this.now().toISOString();
    this.entries.set(subsystem, Object.freeze({ live: true, updatedAt: at, lastSuccessAt: at }));
  }

  markDown(subsystem: string, detail?: string): void {
    const previous = this.entries.get(subsystem);
    this.entries.set(
      subsystem,
      Object.freeze({
        live: false,
        updatedAt: this.now().toISOString(),
        ...(previous?.lastSuccessAt ? { lastSuccessAt: previous.lastSuccessAt } : {}),
        ...(detail ? { detail } : {}),
      })
    );
  }

  get(subsystem: string): Readonly<LivenessEntry> | undefined {
    return this.entries.get(subsystem);
  }

  clear(): void {
    this.entries = new Map();
  }
}
