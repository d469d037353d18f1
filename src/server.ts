import { createRecoveryAgentApp } from "./app.js";
import { loadSettings } from "./config/settings.js";
import { createRecoveryServices } from "./container.js";
import { createLogger } from "./observability/logger.js";
import { resolveExecutionContext } from "./services/privileged-executor.js";

const settings = loadSettings();
const logger = createLogger({ component: "pitrctl-server" }, settings.logLevel);
const services = createRecoveryServices(
  settings,
  resolveExecutionContext({ nonInteractive: true }),
  logger,
);

const app = createRecoveryAgentApp({
  roleDetector: services.roleDetector,
  orchestrator: services.orchestrator,
  defaults: services.defaults,
  logger: logger.child({ component: "http" }),
});

app.listen(settings.port, () => {
  logger.info(`pitrctl server listening on :${settings.port}`);
});
