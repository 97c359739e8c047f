/**
 * Cruise ID Client
 * 
 * Thin wrapper around undici for asking the shipboard data warehouse
 * which cruise is current. Any failure resolves to null.
 */

import { request } from 'undici';
import { LookupError, describeCause } from '@cruise-packager/core';
import { isNonEmptyString, isObject, type Logger } from '@cruise-packager/utils';

export interface CruiseLookupOptions {
  url: string;
  timeoutMs: number;
  logger: Logger;
}

export async function fetchCruiseId(options: CruiseLookupOptions): Promise<string | null> {
  const { url, timeoutMs, logger } = options;

  try {
    const { statusCode, body } = await request(url, {
      method: 'GET',
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new LookupError(url, `HTTP ${statusCode}`);
    }

    const data: unknown = await body.json();
    const cruiseId = isObject(data) ? data['cruiseID'] : undefined;

    if (!isNonEmptyString(cruiseId)) {
      throw new LookupError(url, 'response has no cruiseID');
    }

    logger.info({ cruiseId }, `Retrieved cruise ID: ${cruiseId}`);
    return cruiseId.trim();
  } catch (error) {
    const lookupError = error instanceof LookupError
      ? error
      : new LookupError(url, describeCause(error), error);
    logger.error({ url, err: error }, `Error fetching cruise ID: ${lookupError.message}`);
    return null;
  }
}
