import { describe, expect, it } from "vitest";
import { normalize } from "../src/normalizer.js";
import { COLUMNS, JOINT_COUNT, expectedPayloadLength, rowValues } from "../src/schema.js";

function handPayload(width: 3 | 4): number[] {
  const payload = [42.5, 0.1, 0.2, 0.3, ...(width === 4 ? [0, 0, 0, 1] : [10, 20, 30])];
  for (let joint = 0; joint < JOINT_COUNT; joint += 1) {
    payload.push(joint, joint + 0.5, -joint, ...(width === 4 ? [0, 0, 1, 0] : [1, 2, 3]));
  }
  return payload;
}

describe("normalize", () => {
  it("maps a headset quaternion payload", () => {
    const row = normalize("/HMD", [3, 100.5, 0.1, 1.2, -0.3, 0, 0, 0, 1], "quaternion");

    expect(row.device).toBe("HMD");
    expect(row.message).toBe("");
    expect(row.deviceId).toBe(3);
    expect(row.timeProtocol).toBe(100.5);
    expect(row.position).toEqual([0.1, 1.2, -0.3]);
    expect(row.rotation).toEqual([0, 0, 0, 1]);
    expect(row.buttons.every(Number.isNaN)).toBe(true);
    expect(row.relTimeLocal).toBeNaN();
  });

  it("writes Euler angles into X/Y/Z and leaves rotW missing", () => {
    const row = normalize("/HMD", [3, 100.5, 0, 0, 0, 10, 20, 30], "euler");

    expect(row.rotation.slice(0, 3)).toEqual([10, 20, 30]);
    expect(row.rotation[3]).toBeNaN();
  });

  it("copies controller buttons and axes", () => {
    const buttons = Array.from({ length: 14 }, (_, i) => i % 2);
    const axes = Array.from({ length: 10 }, (_, i) => i / 10);
    const payload = [2, 7.25, 1, 2, 3, 0, 0, 0, 1, ...buttons, ...axes];
    expect(payload).toHaveLength(expectedPayloadLength("controller", "quaternion") ?? 0);

    const row = normalize("/Controller", payload, "quaternion");

    expect(row.deviceId).toBe(2);
    expect(row.buttons).toEqual(buttons);
    expect(row.axes).toEqual(axes);
  });

  it("pads short payloads and drops excess fields", () => {
    const short = normalize("/Tracker1", [7, 2.0, 0, 0, 0, 0, 0, 0, 1, 1, 1, 1], "quaternion");
    expect(short.buttons.slice(0, 3)).toEqual([1, 1, 1]);
    expect(short.buttons.slice(3).every(Number.isNaN)).toBe(true);

    const long = normalize("/HMD", [3, 1.0, 0, 0, 0, 0, 0, 0, 1, 99, 99], "quaternion");
    expect(rowValues(long)).toHaveLength(COLUMNS.length);
    expect(long.buttons.every(Number.isNaN)).toBe(true);
  });

  it("maps hand joints in both rotation formats", () => {
    const quat = normalize("/Hand_L", handPayload(4), "quaternion");
    expect(quat.deviceId).toBeNaN();
    expect(quat.timeProtocol).toBe(42.5);
    expect(quat.joints[0]).toEqual({ position: [0, 0.5, -0], rotation: [0, 0, 1, 0] });
    expect(quat.joints[23]).toEqual({ position: [23, 23.5, -23], rotation: [0, 0, 1, 0] });

    const euler = normalize("/Hand_R", handPayload(3), "euler");
    expect(euler.device).toBe("Hand_R");
    expect(euler.joints[5]?.position).toEqual([5, 5.5, -5]);
    expect(euler.joints[5]?.rotation.slice(0, 3)).toEqual([1, 2, 3]);
    expect(euler.joints[5]?.rotation[3]).toBeNaN();
  });

  it("leaves rotation and trailing fields missing for an unknown format", () => {
    const row = normalize("/Controller", [2, 7.25, 1, 2, 3, 0.5, 0.5], "unknown");

    expect(row.position).toEqual([1, 2, 3]);
    expect(row.rotation.every(Number.isNaN)).toBe(true);
    expect(row.buttons.every(Number.isNaN)).toBe(true);
  });

  it("treats non-numeric values as missing", () => {
    const row = normalize("/HMD", [3, "late", 0, "x", 0, 0, 0, 0, 1], "quaternion");

    expect(row.timeProtocol).toBeNaN();
    expect(row.position[1]).toBeNaN();
  });

  it("records only the device name for unknown device classes", () => {
    const row = normalize("/Skeleton", [1, 2, 3], "unknown");

    expect(row.device).toBe("Skeleton");
    expect(row.timeProtocol).toBeNaN();
    expect(rowValues(row)).toHaveLength(COLUMNS.length);
  });
});
