import { startSocksServer } from "./server";

async function main(): Promise<void> {
  const running = await startSocksServer();

  const shutdown = () => {
    running.close().then(
      () => {
        process.exitCode = 0;
      },
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(err);
        process.exitCode = 1;
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
