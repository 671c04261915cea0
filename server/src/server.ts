import "dotenv/config";

import { createApp } from "./app";
import { VoiceDesignClient } from "./voices/client";

const client = VoiceDesignClient.fromEnv();
const app = createApp(client);

const port = Number(process.env.PORT ?? 8090);
app.listen(port, () => {
  console.log(`voice relay listening on http://localhost:${port}`);
  console.log(`forwarding to ${client.endpoint}`);
});
