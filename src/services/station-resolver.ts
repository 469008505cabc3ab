/**
 * Station Resolver
 * Turns a free-text station query into a StopPoint id through the search endpoint
 */

import { TflClient } from '../core/tfl-client.js';
import { getRecords, getString } from '../utils/record-utils.js';

export const RAIL_MODES = 'tube,overground,dlr';

export type StationResolution =
  | { found: true; stationId: string }
  | { found: false };

export class StationResolver {
  constructor(private client: TflClient) {}

  /**
   * Search rail modes for the query and take the first match as-is.
   * A failed search is reported the same way as an empty one.
   */
  async resolve(query: string): Promise<StationResolution> {
    const result = await this.client.request(
      `StopPoint/Search/${encodeURIComponent(query)}`,
      { modes: RAIL_MODES }
    );

    if (!result.ok) {
      return { found: false };
    }

    const [firstMatch] = getRecords(result.data, 'matches');
    const stationId = getString(firstMatch, 'id', '');

    if (!stationId) {
      return { found: false };
    }

    return { found: true, stationId };
  }
}
