import dotenv from 'dotenv';
import path from 'path';

// Load .env from server dir (__dirname = server/src when running) or cwd
dotenv.config({ path: path.resolve(__dirname, '../.env') });
dotenv.config();

import { createServer } from './app';
import env from './utils/env';
import { logger } from './middleware/logger';

const app = createServer();

app.listen(env.PORT, () => {
  logger.info('server_listening', { port: env.PORT, mailTransport: env.MAIL_TRANSPORT });
});
