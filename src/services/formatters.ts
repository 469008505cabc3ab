/**
 * Formatters
 * Pure functions turning one upstream record into one text block. Every block
 * ends with the separator line so blocks can be joined with newlines.
 */

import { TimeUtils } from '../utils/time-utils.js';
import {
  getArray,
  getFlag,
  getNumber,
  getRecords,
  getString,
  getStringList,
  pluckStrings
} from '../utils/record-utils.js';

export const BLOCK_SEPARATOR = '---';

function block(lines: string[]): string {
  return [...lines, BLOCK_SEPARATOR].join('\n');
}

function yesNo(flag: boolean): string {
  return flag ? 'Yes' : 'No';
}

/**
 * Keys of additionalProperties entries in the given category
 */
function propertyKeys(record: unknown, category: string): string[] {
  return getRecords(record, 'additionalProperties')
    .filter(property => getString(property, 'category', '') === category)
    .map(property => getString(property, 'key', ''));
}

function propertyValue(record: unknown, key: string, fallback: string): string {
  // last match wins
  let value = fallback;
  for (const property of getRecords(record, 'additionalProperties')) {
    if (getString(property, 'key', '') === key) {
      value = getString(property, 'value', fallback);
    }
  }
  return value;
}

export function formatLineStatus(line: unknown): string {
  const name = getString(line, 'name', 'Unknown Line');
  const [current] = getRecords(line, 'lineStatuses');
  const status = getString(current, 'statusSeverityDescription', 'Unknown');
  const reason = getString(current, 'reason', '');

  const lines = [`Line: ${name}`, `Status: ${status}`];
  if (reason) {
    lines.push(`Reason: ${reason}`);
  }
  return block(lines);
}

/**
 * @param now clock reading used for the minutes-until-arrival figure
 */
export function formatArrival(arrival: unknown, now: Date = new Date()): string {
  return block([
    `Line: ${getString(arrival, 'lineName', 'Unknown Line')}`,
    `Platform: ${getString(arrival, 'platformName', 'Unknown Platform')}`,
    `Destination: ${getString(arrival, 'destinationName', 'Unknown Destination')}`,
    `Arrival: ${TimeUtils.describeArrival(getString(arrival, 'expectedArrival', ''), now)}`
  ]);
}

export function formatBikePoint(point: unknown): string {
  return block([
    `Location: ${getString(point, 'commonName', 'Unknown Location')}`,
    `Bikes Available: ${propertyValue(point, 'NbBikes', 'Unknown')}`,
    `Empty Docks: ${propertyValue(point, 'NbEmptyDocks', 'Unknown')}`
  ]);
}

export function formatStationInfo(station: unknown): string {
  const lines = [
    `Station: ${getString(station, 'commonName', 'Unknown Station')}`,
    `Transport Modes: ${getStringList(station, 'modes').join(', ')}`,
    `Zones: ${getStringList(station, 'zones').join(', ')}`,
    `Lines: ${pluckStrings(station, 'lines', 'name').join(', ')}`
  ];

  const facilities = propertyKeys(station, 'Facility');
  if (facilities.length > 0) {
    lines.push(`Facilities: ${facilities.join(', ')}`);
  }

  const accessibility = propertyKeys(station, 'Accessibility');
  if (accessibility.length > 0) {
    lines.push(`Accessibility: ${accessibility.join(', ')}`);
  }

  return block(lines);
}

export function formatNearbyStop(stop: unknown): string {
  return block([
    `Stop: ${getString(stop, 'commonName', 'Unknown Location')}`,
    `Distance: ${getNumber(stop, 'distance', 0).toFixed(0)}m`,
    `Modes: ${getStringList(stop, 'modes').join(', ')}`,
    `Lines: ${pluckStrings(stop, 'lines', 'name').join(', ')}`
  ]);
}

// Resource views

export function formatLineSummary(line: unknown): string {
  return block([
    `Name: ${getString(line, 'name', 'Unknown Line')}`,
    `ID: ${getString(line, 'id', 'Unknown')}`,
    `Mode: ${getString(line, 'modeName', 'Unknown')}`,
    `Routes: ${getArray(line, 'routeSections').length}`
  ]);
}

export function formatStationSummary(station: unknown): string {
  return block([
    `Name: ${getString(station, 'commonName', 'Unknown Station')}`,
    `ID: ${getString(station, 'id', 'Unknown')}`,
    `Modes: ${getStringList(station, 'modes').join(', ')}`,
    `Zones: ${getStringList(station, 'zones').join(', ')}`,
    `Lines: ${pluckStrings(station, 'lines', 'name').join(', ')}`
  ]);
}

export function formatMode(mode: unknown): string {
  return block([
    `Name: ${getString(mode, 'modeName', 'Unknown')}`,
    `Description: ${getString(mode, 'description', 'No description available')}`,
    `Is TfL Service: ${yesNo(getFlag(mode, 'isTflService'))}`,
    `Is Scheduled Service: ${yesNo(getFlag(mode, 'isScheduledService'))}`
  ]);
}
