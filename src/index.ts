import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { buildServer } from "./server";

const config = loadConfig();
const log = createLogger(config);

const app = buildServer({
  logger: log,
  envelopeProfile: config.envelopeProfile,
});

async function main() {
  log.info(
    {
      evt: "server.start",
      level: config.logLevel,
      envelopeProfile: config.envelopeProfile.name,
      forceOkStatus: config.envelopeProfile.forceOkStatus,
    },
    "server.start"
  );
  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  log.error({ err }, "server.start_failed");
  process.exit(1);
});
