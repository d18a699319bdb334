import express from 'express';
import cors from 'cors';
import { config } from './config';
import { createApiRouter } from './api/routes';
import { logger } from './utils/logger';
import fs from 'fs';

const app = express();

// Middleware; résumés may arrive inline as base64
app.use(cors());
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true }));

// API routes
app.use('/api', createApiRouter());

// Create required directories
const directories = [config.dataDir, config.screenshotsDir, config.logsDir];

for (const dir of directories) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    logger.info(`Created directory: ${dir}`);
  }
}

// Start server
app.listen(config.port, () => {
  logger.info(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   FormPilot Server Started                                ║
║                                                           ║
║   URL: http://localhost:${config.port}                         ║
║   API: http://localhost:${config.port}/api                     ║
║                                                           ║
║   Environment: ${config.nodeEnv.padEnd(39)}║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
});

export default app;
