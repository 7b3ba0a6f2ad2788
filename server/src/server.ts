// server/src/server.ts
import 'dotenv/config';
import { loadConfig } from './config';
import { createApp } from './routes';
import { createServices } from './services';

const config = loadConfig();
const app = createApp(createServices(config));
app.listen(config.port, () =>
  console.log(`[server] ${config.appName} v${config.appVersion} listening on :${config.port} (model ${config.llm.model}, ${config.llm.family} prompts)`),
);
