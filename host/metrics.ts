import type { MetricsSink } from "@sensorcast/core";

type Counter = { name: string; help?: string; value: number };
type Gauge = Counter;

const HELP: Record<string, string> = {
  readings_ingested: "Readings accepted on POST /data",
  updates_sent: "Live updates written to observers",
  delivery_failures: "Observers dropped after a failed write",
  snapshots_sent: "Initial snapshots delivered",
  dispatch_errors: "Change events whose latest lookup failed",
  notifier_restarts: "Times the change feed was reopened",
  observers_connected: "Open observer connections",
  devices_watched: "Devices with at least one observer",
};

export class Metrics implements MetricsSink {
  readonly counters: Record<string, Counter> = {};
  readonly gauges: Record<string, Gauge> = {};

  inc(name: string, by = 1, help = HELP[name]): void {
    const c = (this.counters[name] ??= { name, help, value: 0 });
    c.value += by;
  }

  set(name: string, value: number, help = HELP[name]): void {
    const g = (this.gauges[name] ??= { name, help, value });
    g.value = value;
  }

  get(name: string): number {
    return this.counters[name]?.value ?? this.gauges[name]?.value ?? 0;
  }

  reset(): void {
    for (const k of Object.keys(this.counters)) delete this.counters[k];
    for (const k of Object.keys(this.gauges)) delete this.gauges[k];
  }

  render(): string {
    const lines: string[] = [];
    for (const c of Object.values(this.counters)) {
      if (c.help) lines.push(`# HELP ${c.name} ${c.help}`);
      lines.push(`# TYPE ${c.name} counter`);
      lines.push(`${c.name} ${c.value}`);
    }
    for (const g of Object.values(this.gauges)) {
      if (g.help) lines.push(`# HELP ${g.name} ${g.help}`);
      lines.push(`# TYPE ${g.name} gauge`);
      lines.push(`${g.name} ${g.value}`);
    }
    return lines.join("\n") + "\n";
  }
}

export const metrics = new Metrics();
