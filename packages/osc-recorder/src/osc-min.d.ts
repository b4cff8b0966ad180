declare module "osc-min" {
  export interface OscArgument {
    type: string;
    value: unknown;
  }

  export interface OscMessage {
    oscType: "message";
    address: string;
    args: OscArgument[];
  }

  export interface OscBundle {
    oscType: "bundle";
    timetag: unknown;
    elements: OscPacket[];
  }

  export type OscPacket = OscMessage | OscBundle;

  /** Lenient decoding accepts any address-like prefix and may omit `oscType`. */
  export interface LenientOscMessage {
    oscType?: "message";
    address: string;
    args: OscArgument[];
  }

  export interface OscMessageInput {
    oscType?: "message";
    address: string;
    args?: OscArgument[];
  }

  export interface OscBundleInput {
    oscType: "bundle";
    timetag: number;
    elements: Array<OscMessageInput | OscBundleInput>;
  }

  const osc: {
    fromBuffer(buffer: Buffer, strict: true): OscPacket;
    fromBuffer(buffer: Buffer, strict?: boolean): LenientOscMessage | OscBundle;
    toBuffer(packet: OscMessageInput | OscBundleInput, strict?: boolean): Buffer;
  };

  export default osc;
}
