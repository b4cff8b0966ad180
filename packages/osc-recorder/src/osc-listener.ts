import { createSocket, type Socket } from "node:dgram";
import osc, { type OscPacket } from "osc-min";
import type { Logger } from "./logger.js";
import type { PayloadValue } from "./types.js";

export type OscMessageHandler = (address: string, payload: PayloadValue[]) => void;

export interface DecodedMessage {
  address: string;
  payload: PayloadValue[];
}

function toPayloadValue(value: unknown): PayloadValue {
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return Number.NaN;
}

function flatten(packet: OscPacket, out: DecodedMessage[]): void {
  if (packet.oscType === "bundle") {
    for (const element of packet.elements) {
      flatten(element, out);
    }
    return;
  }
  out.push({
    address: packet.address,
    payload: packet.args.map((arg) => toPayloadValue(arg.value)),
  });
}

export function decodeDatagram(datagram: Buffer): DecodedMessage[] {
  const out: DecodedMessage[] = [];
  // Strict decoding rejects bytes without OSC string padding or a type tag.
  flatten(osc.fromBuffer(datagram, true), out);
  return out;
}

/** Compiles an OSC address pattern (`*`, `?`, `[abc]`, `{a,b}`) to a matcher. */
export function compileAddressPattern(pattern: string): (address: string) => boolean {
  if (!/[*?[{]/.test(pattern)) {
    return (address) => address === pattern;
  }

  let source = "";
  for (let i = 0; i < pattern.length; i += 1) {
    const ch = pattern.charAt(i);
    if (ch === "*") {
      source += "[^/]*";
    } else if (ch === "?") {
      source += "[^/]";
    } else if (ch === "[") {
      const end = pattern.indexOf("]", i);
      if (end === -1) {
        source += "\\[";
        continue;
      }
      const body = pattern.slice(i + 1, end).replace(/^!/, "^");
      source += `[${body}]`;
      i = end;
    } else if (ch === "{") {
      const end = pattern.indexOf("}", i);
      if (end === -1) {
        source += "\\{";
        continue;
      }
      const options = pattern.slice(i + 1, end).split(",").map(escapeRegExp);
      source += `(?:${options.join("|")})`;
      i = end;
    } else {
      source += escapeRegExp(ch);
    }
  }
  const regex = new RegExp(`^${source}$`);
  return (address) => regex.test(address);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * UDP endpoint that decodes OSC datagrams and hands every message whose
 * address matches a subscribed pattern to its handler.
 */
export class OscListener {
  private socket: Socket | null = null;
  private readonly routes: Array<{ pattern: string; matches: (address: string) => boolean; handler: OscMessageHandler }> = [];

  constructor(private readonly logger: Logger) {}

  map(pattern: string, handler: OscMessageHandler): void {
    this.routes.push({ pattern, matches: compileAddressPattern(pattern), handler });
  }

  dispatch(datagram: Buffer): number {
    let messages: DecodedMessage[];
    try {
      messages = decodeDatagram(datagram);
    } catch (error) {
      this.logger.debug({ err: error, bytes: datagram.length }, "dropping undecodable OSC datagram");
      return 0;
    }

    let handled = 0;
    for (const message of messages) {
      for (const route of this.routes) {
        if (route.matches(message.address)) {
          route.handler(message.address, message.payload);
          handled += 1;
        }
      }
    }
    return handled;
  }

  listen(host: string, port: number): Promise<void> {
    const socket = createSocket("udp4");
    this.socket = socket;
    socket.on("message", (datagram) => {
      this.dispatch(datagram);
    });

    return new Promise((resolve, reject) => {
      socket.once("error", reject);
      socket.bind(port, host, () => {
        socket.off("error", reject);
        socket.on("error", (error) => {
          this.logger.error({ err: error }, "OSC socket error");
        });
        this.logger.info(
          { host, port, addresses: this.routes.map((route) => route.pattern) },
          "OSC server listening",
        );
        resolve();
      });
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }
    this.socket = null;
    return new Promise((resolve) => {
      socket.close(() => {
        this.logger.info("OSC server shut down");
        resolve();
      });
    });
  }
}
