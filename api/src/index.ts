import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

try {
  const config = loadConfig();
  const app = await createApp({ config });
  await app.listen({ host: config.host, port: config.port });
  app.log.info({ port: config.port }, "API listening");
} catch (error) {
  console.error(error);
  process.exit(1);
}
