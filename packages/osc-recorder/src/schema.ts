import type { DeviceClass, JointSample, RotationFormat, UnifiedRow } from "./types.js";

export const MISSING = Number.NaN;

export const BUTTON_COUNT = 14;
export const AXIS_COUNT = 10;

const FINGER_JOINTS: Array<[finger: string, joints: number]> = [
  ["thumb", 4],
  ["index", 5],
  ["middle", 5],
  ["ring", 5],
  ["pinky", 5],
];

export const JOINT_NAMES: string[] = FINGER_JOINTS.flatMap(([finger, joints]) =>
  Array.from({ length: joints }, (_, i) => `${finger}${i}`),
);

export const JOINT_COUNT = JOINT_NAMES.length;

const POSE_SUFFIXES = ["posX", "posY", "posZ", "rotX", "rotY", "rotZ", "rotW"];

export const COLUMNS: string[] = [
  "device",
  "message",
  "deviceid",
  "time_ovr",
  "time_sys",
  "rtime_ovr",
  "rtime_sys",
  ...POSE_SUFFIXES,
  ...Array.from({ length: BUTTON_COUNT }, (_, i) => `button${i + 1}`),
  ...Array.from({ length: AXIS_COUNT / 2 }, (_, i) => [`axis${i + 1}X`, `axis${i + 1}Y`]).flat(),
  ...JOINT_NAMES.flatMap((joint) => POSE_SUFFIXES.map((suffix) => `${joint}_${suffix}`)),
];

const CLASS_PREFIXES: Array<[prefix: string, deviceClass: DeviceClass]> = [
  ["HMD", "headset"],
  ["TrackingReference", "headset"],
  ["DisplayRedirect", "headset"],
  ["Controller", "controller"],
  ["GenericTracker", "controller"],
  ["Tracker", "controller"],
  ["Hand", "hand"],
];

export function deviceClassOf(address: string): DeviceClass {
  const name = deviceName(address);
  for (const [prefix, deviceClass] of CLASS_PREFIXES) {
    if (name.startsWith(prefix)) {
      return deviceClass;
    }
  }
  return "unknown";
}

export function deviceName(address: string): string {
  return address.replace(/^\/+/, "");
}

/** Index of the first position component within a payload. */
export function positionOffset(deviceClass: DeviceClass): number {
  return deviceClass === "hand" ? 1 : 2;
}

export function rotationWidth(format: RotationFormat): number {
  switch (format) {
    case "quaternion":
      return 4;
    case "euler":
      return 3;
    default:
      return 0;
  }
}

export function expectedPayloadLength(deviceClass: DeviceClass, format: RotationFormat): number | undefined {
  const width = rotationWidth(format);
  if (width === 0) {
    return undefined;
  }
  switch (deviceClass) {
    case "headset":
      return 2 + 3 + width;
    case "controller":
      return 2 + 3 + width + BUTTON_COUNT + AXIS_COUNT;
    case "hand":
      return 1 + (3 + width) * (JOINT_COUNT + 1);
    default:
      return undefined;
  }
}

function missingJoint(): JointSample {
  return {
    position: [MISSING, MISSING, MISSING],
    rotation: [MISSING, MISSING, MISSING, MISSING],
  };
}

export function emptyRow(device: string, message = ""): UnifiedRow {
  return {
    device,
    message,
    deviceId: MISSING,
    timeProtocol: MISSING,
    timeLocal: MISSING,
    relTimeProtocol: MISSING,
    relTimeLocal: MISSING,
    position: [MISSING, MISSING, MISSING],
    rotation: [MISSING, MISSING, MISSING, MISSING],
    buttons: new Array<number>(BUTTON_COUNT).fill(MISSING),
    axes: new Array<number>(AXIS_COUNT).fill(MISSING),
    joints: Array.from({ length: JOINT_COUNT }, missingJoint),
  };
}

/** Flattens a row into column order; text fields stay strings. */
export function rowValues(row: UnifiedRow): Array<string | number> {
  return [
    row.device,
    row.message,
    row.deviceId,
    row.timeProtocol,
    row.timeLocal,
    row.relTimeProtocol,
    row.relTimeLocal,
    ...row.position,
    ...row.rotation,
    ...row.buttons,
    ...row.axes,
    ...row.joints.flatMap((joint) => [...joint.position, ...joint.rotation]),
  ];
}
