import { loadServerConfigFromEnv } from "./config.js";
import { startSceneServer } from "./server.js";

async function main() {
  const config = loadServerConfigFromEnv();
  const handle = await startSceneServer(config);
  console.log(`scenewire server listening on http://${handle.host}:${handle.port}`);
  console.log(`- health: http://${handle.host}:${handle.port}/health`);
  console.log(`- ws: ws://${handle.host}:${handle.port}${handle.syncPath}`);

  const shutdown = () => {
    void handle.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
