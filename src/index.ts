import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './services';

dotenv.config();

const bootstrap = (): void => {
  const config = loadConfig();
  const services = createServices(config);
  const app = createApp(services);

  app.listen(config.port, () => {
    console.info(`[server] Listening on port ${config.port}`);
    console.info(`[server] Data in ${config.dataDir}, Chroma at ${config.chroma.url}, model ${config.llm.model}`);
  });
};

try {
  bootstrap();
} catch (error) {
  console.error('[server] Startup failed:', error);
  process.exitCode = 1;
}
