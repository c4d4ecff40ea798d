import { createApp } from "./app.js";
import { bootstrapEnv, loadConfig } from "./config.js";

bootstrapEnv();

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`[api] material-dispatch API listening on :${config.port}`);
});
