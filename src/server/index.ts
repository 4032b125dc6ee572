/**
 * permgate server entry point
 */

import { config } from "../lib/config.js";
import { buildApp } from "./app.js";

const app = buildApp();
app.listen({ port: config.port, host: config.host }).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
