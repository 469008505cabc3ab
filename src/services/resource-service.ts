/**
 * Resource Service
 * Three parameterless read-only views over TfL reference data
 */

import { TflClient } from '../core/tfl-client.js';
import { validationError } from '../core/error-handler.js';
import { MCPResourceDefinition } from '../types/mcp.types.js';
import { asRecordList, getArray } from '../utils/record-utils.js';
import { RAIL_MODES } from './station-resolver.js';
import { formatLineSummary, formatMode, formatStationSummary } from './formatters.js';

export const RESOURCE_URIS = ['tfl://lines', 'tfl://stations', 'tfl://modes'] as const;

export type ResourceUri = typeof RESOURCE_URIS[number];

type ResourceHandler = () => Promise<string>;

export const MAX_STATIONS_IN_VIEW = 50;

export const RESOURCE_DEFINITIONS: Record<ResourceUri, MCPResourceDefinition> = {
  'tfl://lines': {
    uri: 'tfl://lines',
    name: 'TfL Lines',
    description: 'List of all TfL lines and their basic information',
    mimeType: 'text/plain'
  },
  'tfl://stations': {
    uri: 'tfl://stations',
    name: 'TfL Stations',
    description: 'List of all TfL stations and their basic information',
    mimeType: 'text/plain'
  },
  'tfl://modes': {
    uri: 'tfl://modes',
    name: 'TfL Transport Modes',
    description: 'List of all available transport modes',
    mimeType: 'text/plain'
  }
};

export function isResourceUri(uri: string): uri is ResourceUri {
  return (RESOURCE_URIS as readonly string[]).includes(uri);
}

export class ResourceService {
  private readonly handlers: Record<ResourceUri, ResourceHandler>;

  constructor(private client: TflClient) {
    this.handlers = {
      'tfl://lines': () => this.readLines(),
      'tfl://stations': () => this.readStations(),
      'tfl://modes': () => this.readModes()
    };
  }

  listResources(): MCPResourceDefinition[] {
    return RESOURCE_URIS.map(uri => RESOURCE_DEFINITIONS[uri]);
  }

  async readResource(uri: string): Promise<string> {
    if (!isResourceUri(uri)) {
      throw validationError(`Unknown resource URI: ${uri}`, { uri });
    }

    return this.handlers[uri]();
  }

  private async readLines(): Promise<string> {
    const result = await this.client.request(`Line/Mode/${RAIL_MODES}`);
    const lines = result.ok ? asRecordList(result.data) : null;

    if (!lines || lines.length === 0) {
      return 'Failed to retrieve lines data';
    }

    return 'TfL Lines:\n\n' + lines.map(formatLineSummary).join('\n');
  }

  private async readStations(): Promise<string> {
    const result = await this.client.request(`StopPoint/Mode/${RAIL_MODES}`);
    const stations = result.ok ? asRecordList(getArray(result.data, 'stopPoints')) : null;

    if (!stations || stations.length === 0) {
      return 'Failed to retrieve stations data';
    }

    const firstStations = stations.slice(0, MAX_STATIONS_IN_VIEW).map(formatStationSummary);

    return `TfL Stations (first ${MAX_STATIONS_IN_VIEW}):\n\n` + firstStations.join('\n');
  }

  private async readModes(): Promise<string> {
    const result = await this.client.request('Mode');
    const modes = result.ok ? asRecordList(result.data) : null;

    if (!modes || modes.length === 0) {
      return 'Failed to retrieve transport modes data';
    }

    return 'TfL Transport Modes:\n\n' + modes.map(formatMode).join('\n');
  }
}
