import './env';
import { createApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Stack usage API running on ${config.port}`);
  console.log(`Serving report from ${config.outputPath}`);
});
