import { startWsServer } from "./wsServer";
import { loadAdvisorConfig } from "./config";
import { setStateCheckpoints } from "../engine";

const config = loadAdvisorConfig(process.env);
setStateCheckpoints(config.validateState);

const ws = startWsServer({ port: config.wsPort, config });

console.log("Advisor WS server running on port", ws.port);
console.log(`Connect: ws://localhost:${ws.port}`);
console.log(
  "Advisor options:",
  JSON.stringify(
    {
      trials: config.trials,
      compareLegs: config.compareLegs,
      maxTrials: config.maxTrials,
      seed: config.seed ?? null,
      validateState: config.validateState,
      wsPort: ws.port,
    },
    null,
    2
  )
);

function shutdown(signal: string) {
  console.log(`Received ${signal}, closing advisor server`);
  ws.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
