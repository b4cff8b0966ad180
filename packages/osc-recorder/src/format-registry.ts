import { deviceClassOf, expectedPayloadLength, positionOffset } from "./schema.js";
import type { DeviceClass, PayloadValue, RotationFormat } from "./types.js";

export const UNIT_NORM_TOLERANCE = 1e-3;

interface Detection {
  format: RotationFormat;
  cache: boolean;
}

function leadingNumbers(values: PayloadValue[]): number[] {
  const out: number[] = [];
  for (const value of values) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      break;
    }
    out.push(value);
  }
  return out;
}

export function isUnitQuaternion(components: number[]): boolean {
  if (components.length !== 4 || components.some((c) => c < -1 || c > 1)) {
    return false;
  }
  const norm = Math.sqrt(components.reduce((sum, c) => sum + (c * c), 0));
  return Math.abs(norm - 1) <= UNIT_NORM_TOLERANCE;
}

export function inspectRotation(deviceClass: DeviceClass, payload: PayloadValue[]): Detection {
  if (deviceClass === "unknown") {
    return { format: "unknown", cache: false };
  }
  if (payload.length === expectedPayloadLength(deviceClass, "quaternion")) {
    return { format: "quaternion", cache: true };
  }
  if (payload.length === expectedPayloadLength(deviceClass, "euler")) {
    return { format: "euler", cache: true };
  }

  const segment = payload.slice(positionOffset(deviceClass) + 3);
  const numbers = leadingNumbers(segment);
  if (segment.length === 0) {
    return { format: "unknown", cache: false };
  }

  // Headset payloads end with the rotation, so its length is the segment length.
  if (deviceClass === "headset") {
    if (segment.length === 4 && isUnitQuaternion(numbers)) {
      return { format: "quaternion", cache: true };
    }
    if (segment.length === 3 && numbers.length === 3) {
      return { format: "euler", cache: true };
    }
    return { format: "unknown", cache: true };
  }

  if (isUnitQuaternion(numbers.slice(0, 4))) {
    return { format: "quaternion", cache: true };
  }
  if (numbers.length >= 3) {
    return { format: "euler", cache: true };
  }
  return { format: "unknown", cache: true };
}

/**
 * Remembers the rotation format of every device address for the session.
 * The first payload that carries a rotation segment decides.
 */
export class RotationFormatRegistry {
  private readonly formats = new Map<string, RotationFormat>();

  detect(address: string, payload: PayloadValue[]): RotationFormat {
    const cached = this.formats.get(address);
    if (cached !== undefined) {
      return cached;
    }

    const detection = inspectRotation(deviceClassOf(address), payload);
    if (detection.cache) {
      this.formats.set(address, detection.format);
    }
    return detection.format;
  }

  get(address: string): RotationFormat | undefined {
    return this.formats.get(address);
  }

  snapshot(): Record<string, RotationFormat> {
    return Object.fromEntries(this.formats);
  }

  reset(): void {
    this.formats.clear();
  }
}
