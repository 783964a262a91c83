import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const app = buildApp(config);

app
  .listen({ port: config.port, host: config.host })
  .then((address) => {
    app.log.info({ address }, "Payment result API listening");
  })
  .catch((error: unknown) => {
    app.log.error({ err: error }, "Failed to start payment result API");
    process.exit(1);
  });
