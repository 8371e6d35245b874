import { CalcEngine } from "../engine/index.js";
import { WsServer } from "../server/index.js";
import { loadServerConfig } from "../config/server.js";
import { devError, devLog, setDebugEnabled } from "../shared/index.js";

export async function main(): Promise<void> {
  const config = loadServerConfig();
  setDebugEnabled(config.debug);

  const engine = new CalcEngine({
    onReply: (clientId, data) => wsServer.send(clientId, data),
  });
  const wsServer = new WsServer({
    port: config.port,
    onMessage: (clientId, data) => engine.handleMessage(clientId, data),
    onDisconnect: (clientId) => engine.dropClient(clientId),
  });

  await engine.start();
  try {
    await wsServer.start();
  } catch (err) {
    await engine.stop();
    throw err;
  }

  console.log(`SmartCalc ready on ws://localhost:${wsServer.port}`);

  const shutdown = async (): Promise<void> => {
    await wsServer.stop();
    await engine.stop();
    devLog("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      devError("Shutdown failed:", err);
      process.exitCode = 1;
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
