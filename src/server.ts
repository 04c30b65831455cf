import { config, isDebug } from './config';
import { createApp } from './app';

const app = createApp();
const PORT = config.port;

app.listen(PORT, () => {
  console.log(`📦 Box Picker API listening on port ${PORT}`);
  console.log(`Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`Debug mode: ${isDebug ? 'ON' : 'OFF'}`);
  console.log(`Health check: http://localhost:${PORT}/health`);
});
