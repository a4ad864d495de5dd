import { loadConfigFromEnvironment } from '../../config.js';
import { openDatabase } from '../db/database.js';
import { createApp } from './app.js';

const config = loadConfigFromEnvironment();
const db = openDatabase(config.databasePath);
const app = createApp({ config, db });

const server = app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
