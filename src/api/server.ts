import { loadSettings } from '../config/settings.js';
import { IS_TURSO, initializeDb } from '../db/database.js';
import { RunManager } from '../pipeline/run-manager.js';
import { createFetcher } from '../scraper/create-fetcher.js';
import { createApp } from './app.js';

export async function startServer() {
  const settings = loadSettings();

  // Initialize database
  await initializeDb();

  const runManager = new RunManager({ createFetcher: () => createFetcher(settings), settings });
  const app = createApp({ runManager, settings });

  app.listen(settings.port, () => {
    console.log(`Server running at http://localhost:${settings.port}`);
    console.log(`API available at http://localhost:${settings.port}/api`);
    console.log(`Database: ${IS_TURSO() ? 'Turso' : settings.dbPath}`);
    console.log('\nEndpoints:');
    console.log('  POST /api/search - Start a crawl ({"background": true} runs it on Trigger.dev)');
    console.log('  POST /api/stop - Stop the running crawl');
    console.log('  GET  /api/status - Current run, recent events and run history');
    console.log('  GET  /api/cards - Search business cards (?q= or ?company=&like=true)');
    console.log('  GET  /api/cards/:id/mentions - Announcements crediting a card');
    console.log('  GET  /api/announcements - Stored announcements');
    console.log('  GET  /api/stats - Directory statistics');
    console.log('  GET|PUT /api/keywords - Keyword file');
  });
}
