import type { RotationFormat } from "@vrlog/osc-recorder-contracts";

export type { RotationFormat };

export type DeviceClass = "headset" | "controller" | "hand" | "unknown";

export type PayloadValue = number | string;

export type Vec3 = [number, number, number];
export type Rotation = [number, number, number, number];

export interface JointSample {
  position: Vec3;
  rotation: Rotation;
}

/**
 * One output record. Every field is always present; values the source did not
 * report hold `NaN`.
 */
export interface UnifiedRow {
  device: string;
  message: string;
  deviceId: number;
  timeProtocol: number;
  timeLocal: number;
  relTimeProtocol: number;
  relTimeLocal: number;
  position: Vec3;
  rotation: Rotation;
  buttons: number[];
  axes: number[];
  joints: JointSample[];
}

export interface SyncedTimes {
  timeProtocol: number;
  timeLocal: number;
  relTimeProtocol: number;
  relTimeLocal: number;
}

export interface LogMessageEvent {
  text: string;
  timeLocal: number;
}
