import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`🎵 Soundwave render server running on port ${config.port}`);
});

export default app;
