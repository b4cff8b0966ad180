import {
  AXIS_COUNT,
  BUTTON_COUNT,
  JOINT_COUNT,
  MISSING,
  deviceClassOf,
  deviceName,
  emptyRow,
  positionOffset,
  rotationWidth,
} from "./schema.js";
import type { PayloadValue, Rotation, RotationFormat, UnifiedRow, Vec3 } from "./types.js";

function numberAt(payload: PayloadValue[], index: number): number {
  const value = payload[index];
  return typeof value === "number" ? value : MISSING;
}

function numbersAt(payload: PayloadValue[], start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => numberAt(payload, start + i));
}

function vec3At(payload: PayloadValue[], start: number): Vec3 {
  return [numberAt(payload, start), numberAt(payload, start + 1), numberAt(payload, start + 2)];
}

function rotationAt(payload: PayloadValue[], start: number, width: number): Rotation {
  return [
    numberAt(payload, start),
    numberAt(payload, start + 1),
    numberAt(payload, start + 2),
    width === 4 ? numberAt(payload, start + 3) : MISSING,
  ];
}

/**
 * Maps a device payload onto the unified row. Relative times and the local
 * time are left missing; the session clock fills them in.
 */
export function normalize(address: string, payload: PayloadValue[], format: RotationFormat): UnifiedRow {
  const deviceClass = deviceClassOf(address);
  const row = emptyRow(deviceName(address));

  if (deviceClass === "unknown") {
    return row;
  }

  const offset = positionOffset(deviceClass);
  if (deviceClass === "hand") {
    row.timeProtocol = numberAt(payload, 0);
  } else {
    row.deviceId = numberAt(payload, 0);
    row.timeProtocol = numberAt(payload, 1);
  }
  row.position = vec3At(payload, offset);

  const width = rotationWidth(format);
  if (width === 0) {
    return row;
  }
  row.rotation = rotationAt(payload, offset + 3, width);

  let cursor = offset + 3 + width;
  if (deviceClass === "controller") {
    row.buttons = numbersAt(payload, cursor, BUTTON_COUNT);
    cursor += BUTTON_COUNT;
    row.axes = numbersAt(payload, cursor, AXIS_COUNT);
  } else if (deviceClass === "hand") {
    for (let joint = 0; joint < JOINT_COUNT; joint += 1) {
      row.joints[joint] = {
        position: vec3At(payload, cursor),
        rotation: rotationAt(payload, cursor + 3, width),
      };
      cursor += 3 + width;
    }
  }

  return row;
}
