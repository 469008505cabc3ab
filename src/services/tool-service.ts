/**
 * Tool Service
 * The five MCP tools: argument validation, upstream calls and response assembly.
 * Upstream failures come back as ordinary text responses; only bad input throws.
 */

import { TflClient } from '../core/tfl-client.js';
import { ErrorHandler, TflError, validationError } from '../core/error-handler.js';
import { MCPToolDefinition, MCPToolResponse, ToolArguments } from '../types/mcp.types.js';
import { ValidationUtils, VALIDATION_BOUNDS } from '../utils/validation-utils.js';
import { TimeUtils } from '../utils/time-utils.js';
import { asRecordList, getArray, getString, isRecord } from '../utils/record-utils.js';
import { RAIL_MODES, StationResolver } from './station-resolver.js';
import {
  formatArrival,
  formatBikePoint,
  formatLineStatus,
  formatNearbyStop,
  formatStationInfo
} from './formatters.js';

export const TOOL_NAMES = [
  'get-line-status',
  'get-arrivals',
  'search-bike-points',
  'get-station-info',
  'find-stops-by-radius'
] as const;

export type ToolName = typeof TOOL_NAMES[number];

type ToolHandler = (args: ToolArguments) => Promise<MCPToolResponse>;

export const RESULT_LIMITS = {
  ARRIVALS: 10,
  BIKE_POINTS: 5,
  NEARBY_STOPS: 10
} as const;

export const TOOL_DEFINITIONS: Record<ToolName, MCPToolDefinition> = {
  'get-line-status': {
    name: 'get-line-status',
    description: 'Get the current status of specified London transport lines',
    inputSchema: {
      type: 'object',
      properties: {
        lines: {
          type: 'string',
          description: 'Comma-separated list of line names (e.g., victoria,northern,central)'
        }
      },
      required: ['lines']
    }
  },
  'get-arrivals': {
    name: 'get-arrivals',
    description: 'Get arrival predictions for a specific station',
    inputSchema: {
      type: 'object',
      properties: {
        station: {
          type: 'string',
          description: 'Station name or ID'
        }
      },
      required: ['station']
    }
  },
  'search-bike-points': {
    name: 'search-bike-points',
    description: 'Search for bike points near a location',
    inputSchema: {
      type: 'object',
      properties: {
        location: {
          type: 'string',
          description: 'Location name in London'
        }
      },
      required: ['location']
    }
  },
  'get-station-info': {
    name: 'get-station-info',
    description: 'Get detailed information about a specific station including facilities, lines, and accessibility',
    inputSchema: {
      type: 'object',
      properties: {
        station: {
          type: 'string',
          description: 'Station name or ID'
        }
      },
      required: ['station']
    }
  },
  'find-stops-by-radius': {
    name: 'find-stops-by-radius',
    description: 'Find stops within a specified radius of a location',
    inputSchema: {
      type: 'object',
      properties: {
        lat: {
          type: 'number',
          description: 'Latitude of the center point'
        },
        lon: {
          type: 'number',
          description: 'Longitude of the center point'
        },
        radius: {
          type: 'number',
          description: `Radius in meters (max ${VALIDATION_BOUNDS.MAX_RADIUS})`
        }
      },
      required: ['lat', 'lon', 'radius']
    }
  }
};

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

export function textResponse(text: string): MCPToolResponse {
  return {
    content: [{
      type: 'text',
      text
    }]
  };
}

export class ToolService {
  private readonly handlers: Record<ToolName, ToolHandler>;
  private readonly resolver: StationResolver;

  constructor(
    private client: TflClient,
    private errorHandler: ErrorHandler,
    private clock: () => Date = () => new Date()
  ) {
    this.resolver = new StationResolver(client);
    this.handlers = {
      'get-line-status': args => this.getLineStatus(args),
      'get-arrivals': args => this.getArrivals(args),
      'search-bike-points': args => this.searchBikePoints(args),
      'get-station-info': args => this.getStationInfo(args),
      'find-stops-by-radius': args => this.findStopsByRadius(args)
    };
  }

  listTools(): MCPToolDefinition[] {
    return TOOL_NAMES.map(name => TOOL_DEFINITIONS[name]);
  }

  async callTool(name: string, args: unknown): Promise<MCPToolResponse> {
    try {
      if (!isToolName(name)) {
        throw validationError(`Unknown tool: ${name}`, { tool: name });
      }

      return await this.handlers[name](ValidationUtils.validateArguments(args));
    } catch (error) {
      if (error instanceof TflError) {
        this.errorHandler.logError('Tool input rejected', error, { tool: name });
      }
      throw error;
    }
  }

  private async getLineStatus(args: ToolArguments): Promise<MCPToolResponse> {
    const lineIds = ValidationUtils.parseLineIds(args.lines);

    const result = await this.client.request(
      `Line/${lineIds.map(encodeURIComponent).join(',')}/Status`
    );
    const lines = result.ok ? asRecordList(result.data) : null;

    if (!lines || lines.length === 0) {
      return textResponse('Failed to retrieve line statuses');
    }

    return textResponse('Current Line Statuses:\n\n' + lines.map(formatLineStatus).join('\n'));
  }

  private async getArrivals(args: ToolArguments): Promise<MCPToolResponse> {
    const station = ValidationUtils.validateApiInput(args.station, 'Station');

    const resolution = await this.resolver.resolve(station);
    if (!resolution.found) {
      return textResponse(`Could not find station: ${station}`);
    }

    const result = await this.client.request(
      `StopPoint/${encodeURIComponent(resolution.stationId)}/Arrivals`
    );
    const arrivals = result.ok ? asRecordList(result.data) : null;

    if (!arrivals || arrivals.length === 0) {
      return textResponse(`Failed to retrieve arrivals for ${station}`);
    }

    const now = this.clock();
    const upcoming = [...arrivals]
      .sort((a, b) => TimeUtils.compareTimestamps(
        getString(a, 'expectedArrival', ''),
        getString(b, 'expectedArrival', '')
      ))
      .slice(0, RESULT_LIMITS.ARRIVALS)
      .map(arrival => formatArrival(arrival, now));

    return textResponse(`Next arrivals at ${station}:\n\n` + upcoming.join('\n'));
  }

  private async searchBikePoints(args: ToolArguments): Promise<MCPToolResponse> {
    const location = ValidationUtils.validateApiInput(args.location, 'Location');

    const result = await this.client.request('BikePoint/Search', { query: location });
    const points = result.ok ? asRecordList(result.data) : null;

    if (!points) {
      return textResponse(`Failed to search for bike points near ${location}`);
    }

    if (points.length === 0) {
      return textResponse(`No bike points found near ${location}`);
    }

    const nearest = points.slice(0, RESULT_LIMITS.BIKE_POINTS).map(formatBikePoint);

    return textResponse(`Bike points near ${location}:\n\n` + nearest.join('\n'));
  }

  private async getStationInfo(args: ToolArguments): Promise<MCPToolResponse> {
    const station = ValidationUtils.validateApiInput(args.station, 'Station');

    const resolution = await this.resolver.resolve(station);
    if (!resolution.found) {
      return textResponse(`Could not find station: ${station}`);
    }

    const result = await this.client.request(`StopPoint/${encodeURIComponent(resolution.stationId)}`);

    if (!result.ok || !isRecord(result.data)) {
      return textResponse(`Failed to retrieve information for ${station}`);
    }

    return textResponse(formatStationInfo(result.data));
  }

  private async findStopsByRadius(args: ToolArguments): Promise<MCPToolResponse> {
    const lat = ValidationUtils.validateCoordinate(args.lat, 'Latitude', VALIDATION_BOUNDS.LATITUDE_MAX);
    const lon = ValidationUtils.validateCoordinate(args.lon, 'Longitude', VALIDATION_BOUNDS.LONGITUDE_MAX);
    const radius = ValidationUtils.resolveRadius(args.radius);

    const result = await this.client.request('StopPoint', {
      lat,
      lon,
      radius,
      modes: RAIL_MODES
    });

    if (!result.ok || !isRecord(result.data) || !Array.isArray(result.data.stopPoints)) {
      return textResponse(`Failed to find stops within ${radius}m of ${lat}, ${lon}`);
    }

    const stops = getArray(result.data, 'stopPoints');
    if (stops.length === 0) {
      return textResponse(`No stops found within ${radius}m of ${lat}, ${lon}`);
    }

    const closest = stops.slice(0, RESULT_LIMITS.NEARBY_STOPS).map(formatNearbyStop);

    return textResponse(`Stops within ${radius}m of ${lat}, ${lon}:\n\n` + closest.join('\n'));
  }
}
