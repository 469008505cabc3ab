/**
 * TfL (Transport for London) API Type Definitions
 * Loose shapes of the unified API responses. Every field is optional because
 * the upstream omits whatever it has no data for.
 */

export interface TflLineStatus {
  statusSeverityDescription?: string;
  reason?: string;
}

export interface TflLine {
  id?: string;
  name?: string;
  modeName?: string;
  lineStatuses?: TflLineStatus[];
  routeSections?: unknown[];
}

export interface TflArrival {
  lineName?: string;
  platformName?: string;
  destinationName?: string;
  expectedArrival?: string;
}

/**
 * Key/value pair attached to bike points and stop points
 */
export interface TflAdditionalProperty {
  category?: string;
  key?: string;
  value?: string;
}

export interface TflLineIdentifier {
  id?: string;
  name?: string;
}

export interface TflBikePoint {
  id?: string;
  commonName?: string;
  additionalProperties?: TflAdditionalProperty[];
}

export interface TflStopPoint {
  id?: string;
  commonName?: string;
  distance?: number;
  modes?: string[];
  zones?: Array<string | number>;
  lines?: TflLineIdentifier[];
  additionalProperties?: TflAdditionalProperty[];
}

export interface TflMode {
  modeName?: string;
  description?: string;
  isTflService?: boolean;
  isScheduledService?: boolean;
}

export interface TflSearchMatch {
  id?: string;
  name?: string;
}

export interface TflSearchResponse {
  query?: string;
  total?: number;
  matches?: TflSearchMatch[];
}

/**
 * Envelope returned by the radius and per-mode StopPoint endpoints
 */
export interface TflStopPointsResponse {
  stopPoints?: TflStopPoint[];
}
