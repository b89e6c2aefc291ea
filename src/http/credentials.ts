import fs from 'node:fs';
import { resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Read the session cookie from `cookieFile`. Never throws: a missing or
 * unreadable file means requests go out without a session.
 */
export function loadCookie(cookieFile: string): string | undefined {
  const filePath = resolvePath(cookieFile);

  if (!fs.existsSync(filePath)) {
    logger.debug({ file: filePath }, 'No cookie file, continuing without session');
    return undefined;
  }

  try {
    const cookie = fs.readFileSync(filePath, 'utf-8').trim();
    if (!cookie) {
      logger.warn({ file: filePath }, 'Cookie file is empty');
      return undefined;
    }
    logger.info({ file: filePath }, 'Cookie loaded');
    return cookie;
  } catch (err) {
    logger.warn(
      { file: filePath, error: errorMessage(err) },
      'Could not read cookie file, some requests may be limited',
    );
    return undefined;
  }
}
