import { initializeDb, getAnnouncementIdByUrl } from '../db/database.js';
import { StoreError } from '../types/errors.js';

/**
 * Has this announcement URL already been stored?
 * The announcements.url unique key is the only "seen" record.
 */
export async function alreadyIngested(url: string): Promise<boolean> {
  try {
    await initializeDb();
    return (await getAnnouncementIdByUrl(url)) !== null;
  } catch (error) {
    throw new StoreError(`Dedup lookup failed for ${url}`, error);
  }
}
