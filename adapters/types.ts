import type { ObserverChannel, Reading } from "@sensorcast/core";

/** Air-quality sample reported by a device. Particulate fields are µg/m³. */
export type SensorFields = {
  carbonMonoxidePpm: number;
  temperatureCelsius: number;
  pm1: number;
  pm2_5: number;
  pm4: number;
  pm10: number;
};

/** A persisted reading: store id, device, normalized ISO-8601 UTC timestamp, fields. */
export type DeviceReading = Reading & SensorFields;

/** Write-path input, before the store assigns an id. */
export type NewReading = SensorFields & {
  deviceId: string;
  recordedAt: string | Date;
};

export interface Adapter {
  name: string;
  health?(): Promise<{ ok: boolean; detail?: string }>;
  /** Release resources on shutdown. */
  drain?(): Promise<void>;
}

/** Serve one observer until it leaves; resolves after cleanup. */
export type ObserverHandler = (deviceId: string, channel: ObserverChannel) => Promise<void>;
