import { z } from "zod";
import type { ObserverMessage } from "@sensorcast/core";
import type { DeviceReading, NewReading } from "./types";

/** JSON shape of a reading on the wire; field names match what devices post. */
export type WireReading = {
  id: number;
  device_id: string;
  recorded_at: string;
  carbon_monoxide_ppm: number;
  temperature_celcius: number;
  pm1_ug_m3: number;
  pm2_5_ug_m3: number;
  pm4_ug_m3: number;
  pm10_ug_m3: number;
};

export type WireMessage =
  | { type: "snapshot"; device_id: string; readings: WireReading[] }
  | { type: "update"; device_id: string; reading: WireReading }
  | { type: "pong" };

export function toWire(r: DeviceReading): WireReading {
  return {
    id: r.id,
    device_id: r.deviceId,
    recorded_at: r.recordedAt,
    carbon_monoxide_ppm: r.carbonMonoxidePpm,
    temperature_celcius: r.temperatureCelsius,
    pm1_ug_m3: r.pm1,
    pm2_5_ug_m3: r.pm2_5,
    pm4_ug_m3: r.pm4,
    pm10_ug_m3: r.pm10,
  };
}

export function toWireMessage(m: ObserverMessage<DeviceReading>): WireMessage {
  switch (m.type) {
    case "snapshot":
      return { type: "snapshot", device_id: m.deviceId, readings: m.readings.map(toWire) };
    case "update":
      return { type: "update", device_id: m.deviceId, reading: toWire(m.reading) };
    case "pong":
      return { type: "pong" };
  }
}

export function encodeMessage(m: ObserverMessage<DeviceReading>): string {
  return JSON.stringify(toWireMessage(m));
}

const measurement = z.number().finite();

const OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * ISO 8601 date-time, normalized to `toISOString()`. A space may stand in for
 * the `T`, and a time without an offset is read as UTC.
 */
const timestamp = z
  .string()
  .transform(s => s.trim().replace(" ", "T"))
  .pipe(z.string().datetime({ offset: true, local: true }))
  .transform((s, ctx) => {
    const d = new Date(OFFSET.test(s) ? s : `${s}Z`);
    if (Number.isNaN(d.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.invalid_string, validation: "datetime", message: "Invalid datetime" });
      return z.NEVER;
    }
    return d.toISOString();
  });

/** Body of `POST /data`. */
export const readingInputSchema = z.object({
  device_id: z.string().min(1),
  recorded_at: timestamp,
  carbon_monoxide_ppm: measurement,
  temperature_celcius: measurement,
  pm1_ug_m3: measurement,
  pm2_5_ug_m3: measurement,
  pm4_ug_m3: measurement,
  pm10_ug_m3: measurement,
});

export type ReadingInput = z.infer<typeof readingInputSchema>;

export function fromInput(input: ReadingInput): NewReading {
  return {
    deviceId: input.device_id,
    recordedAt: input.recorded_at,
    carbonMonoxidePpm: input.carbon_monoxide_ppm,
    temperatureCelsius: input.temperature_celcius,
    pm1: input.pm1_ug_m3,
    pm2_5: input.pm2_5_ug_m3,
    pm4: input.pm4_ug_m3,
    pm10: input.pm10_ug_m3,
  };
}

/** Human-readable summary of a zod failure, one `path: message` per issue. */
export function describeIssues(err: z.ZodError): string {
  return err.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}
