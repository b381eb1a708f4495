import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config();

import { startServer } from './api/server.js';

console.log(`
╔════════════════════════════════════════════════════════════════╗
║     Tender Cards                                               ║
║     Business cards from procurement announcement contacts      ║
╚════════════════════════════════════════════════════════════════╝
`);

startServer().catch(error => {
  console.error(error);
  process.exit(1);
});
