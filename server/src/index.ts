import { startHexapawnServer } from "./app.ts";

startHexapawnServer()
  .then(({ url }) => {
    // eslint-disable-next-line no-console
    console.log(`[hexapawn-server] listening on ${url}`);
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[hexapawn-server] failed to start", err);
    process.exitCode = 1;
  });
