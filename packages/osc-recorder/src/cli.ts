import { parseArgs } from "node:util";
import { DeviceAddressSchema } from "@vrlog/osc-recorder-contracts";
import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export const USAGE = `Usage: osc-recorder [options]

Receives OSC motion data from the OpenVR recorder and writes it to a CSV log.

Options:
  -f, --file <path>         Log file name (default: openvr_data.csv)
  -a, --address <addr>      OSC address to log; repeat or comma-separate
                            (default: /HMD /Controller /Hand_L /Hand_R)
  -d, --duration <sec>      Recording duration in seconds (default: until CTRL+C)
  -i, --ip <address>        OSC server IP address to bind to (default: 127.0.0.1)
  -p, --port <port>         OSC server UDP port (default: 7775)
  -v, --verbose             Print received OSC data to the console
      --precision <digits>  Decimal precision of output file (default: 10)
      --separator <char>    Column separator (default: ",")
      --control-host <addr> HTTP control server host (default: 127.0.0.1)
      --control-port <port> HTTP control server port, 0 disables it (default: 0)
  -h, --help                Show this help
`;

export interface CliResult {
  help: boolean;
  overrides: Partial<AppConfig>;
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid numeric value for --${flag}: ${value}`);
  }
  return parsed;
}

export function validateAddresses(addresses: string[]): string[] {
  for (const address of addresses) {
    const isPattern = /[*?[{]/.test(address);
    if (!isPattern && !DeviceAddressSchema.safeParse(address).success) {
      throw new ConfigError(`Unsupported address type specified: ${address}. Forgot a "/"?`);
    }
  }
  return addresses;
}

export function parseCli(argv: string[]): CliResult {
  const { values } = parseArgs({
    args: argv,
    allowPositionals: false,
    options: {
      file: { type: "string", short: "f" },
      address: { type: "string", short: "a", multiple: true },
      duration: { type: "string", short: "d" },
      ip: { type: "string", short: "i" },
      port: { type: "string", short: "p" },
      verbose: { type: "boolean", short: "v" },
      precision: { type: "string" },
      separator: { type: "string" },
      "control-host": { type: "string" },
      "control-port": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const addresses = values.address
    ?.flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return {
    help: values.help ?? false,
    overrides: {
      logFile: values.file,
      addresses: addresses ? validateAddresses(addresses) : undefined,
      durationSec: toNumber("duration", values.duration),
      oscHost: values.ip,
      oscPort: toNumber("port", values.port),
      verbose: values.verbose,
      precision: toNumber("precision", values.precision),
      separator: values.separator,
      controlHost: values["control-host"],
      controlPort: toNumber("control-port", values["control-port"]),
    },
  };
}
