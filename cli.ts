import { ConfigError } from "./config";
import { main } from "./http_server";

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof ConfigError ? `error: ${err.message}` : err);
  process.exitCode = 1;
});
