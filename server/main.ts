import { serve } from "@hono/node-server";
import { createApp } from "@server/index";
import { loadConfig } from "@server/lib/config";

const config = loadConfig();
const app = createApp({ config });

serve(
  {
    fetch: app.fetch,
    hostname: config.host,
    port: config.port,
  },
  (info) => {
    console.log(`folder gateway listening on http://${info.address}:${info.port}`);
  },
);
