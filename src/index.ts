import dotenv from 'dotenv';
import app from './config/app';
import { createServer } from 'http';
import logger from './utils/logger';

dotenv.config();

const PORT = parseInt(process.env.PORT || '5000', 10);

const httpServer = createServer(app);

// 🚀 Start the server
httpServer.listen(PORT, '0.0.0.0', () => {
  logger.info(`🚀 Payment methods API listening on http://0.0.0.0:${PORT}`);
});
