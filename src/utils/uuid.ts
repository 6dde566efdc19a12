/**
 * Stable device UUIDs.
 * The same device id always yields the same UUID, across restarts and hosts.
 */
import { v5 as uuidv5 } from "uuid";

/** Name prefix hashed together with the device id */
const DEVICE_NAME_PREFIX = "gpgga-device-";

/** Name-based (v5, URL namespace) UUID for a device id */
export function deviceUuid(deviceId: string): string {
  return uuidv5(`${DEVICE_NAME_PREFIX}${deviceId}`, uuidv5.URL);
}
