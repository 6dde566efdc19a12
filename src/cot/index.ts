/**
 * CoT Module
 *
 * Position record → Cursor-on-Target event conversion and device identities.
 */

export {
  CotEncoder,
  toCotXml,
  formatCotTime,
  howForFixQuality,
  calculateCircularError,
} from "./cot-encoder.ts";
export type { CotEncoderOptions, CotConversionError, CotConversionResult } from "./cot-encoder.ts";

export { DeviceIdentityCache, DEVICE_UID_PREFIX } from "./device-identity.ts";
export type { DeviceIdentity, DeviceIdentityEvent, DeviceIdentityCallback } from "./device-identity.ts";
