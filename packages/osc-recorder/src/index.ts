import type { FastifyInstance } from "fastify";
import { parseCli, USAGE, validateAddresses } from "./cli.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { OscListener } from "./osc-listener.js";
import { OscRecorder } from "./recorder.js";
import { FileSink } from "./row-writer.js";
import { buildServer } from "./server.js";

async function main(): Promise<void> {
  const cli = parseCli(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadConfig(cli.overrides);
  validateAddresses(config.addresses);
  const logger = createLogger(config.logLevel);

  const listener = new OscListener(logger);
  let control: FastifyInstance | null = null;
  let durationTimer: NodeJS.Timeout | undefined;
  let stopping: Promise<void> | null = null;
  const stop = (reason: string): Promise<void> => {
    if (!stopping) {
      logger.info({ reason }, "stopping recorder");
      stopping = (async () => {
        clearTimeout(durationTimer);
        await listener.close();
        await control?.close();
        await recorder.shutdown();
      })();
    }
    return stopping;
  };

  const recorder = new OscRecorder({
    sink: new FileSink(config.logFile),
    logger,
    logFile: config.logFile,
    precision: config.precision,
    separator: config.separator,
    autoRecord: config.autoRecord,
    verbose: config.verbose,
    onError: () => {
      process.exitCode = 1;
      stop("sink_write_failed").catch((error: unknown) => {
        logger.error({ err: error }, "shutdown after write failure did not complete");
      });
    },
  });
  await recorder.startSession();

  for (const address of config.addresses) {
    listener.map(address, (matched, payload) => recorder.handlePacket(matched, payload));
  }
  await listener.listen(config.oscHost, config.oscPort);

  if (config.controlPort > 0) {
    control = await buildServer(config, recorder);
    await control.listen({ host: config.controlHost, port: config.controlPort });
  }

  if (config.durationSec !== undefined) {
    durationTimer = setTimeout(() => {
      stop("duration_elapsed").catch((error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    }, config.durationSec * 1000);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).catch((error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
