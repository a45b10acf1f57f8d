/**
 * Initialization handshake
 *
 * The server is stateless over HTTP: every request is served on its own,
 * so `initialize` only negotiates a protocol version and describes the
 * server. It does not gate later requests.
 */

import { z } from 'zod';
import { InvalidParamsError } from './errors.js';

// =============================================================================
// Constants
// =============================================================================

/** Newest first */
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-06-18', '2025-03-26', '2024-11-05'] as const;

export type ProtocolVersion = (typeof SUPPORTED_PROTOCOL_VERSIONS)[number];

export const LATEST_PROTOCOL_VERSION: ProtocolVersion = SUPPORTED_PROTOCOL_VERSIONS[0];

// =============================================================================
// Capability Types
// =============================================================================

export interface ServerCapabilities {
  tools?: {
    listChanged?: boolean;
  };
}

export interface ServerInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: ProtocolVersion;
  capabilities: ServerCapabilities;
  serverInfo: ServerInfo;
  instructions?: string;
}

// =============================================================================
// Zod Schemas for Validation
// =============================================================================

export const InitializeParamsSchema = z.object({
  protocolVersion: z.string().min(1),
  capabilities: z.record(z.unknown()).default({}),
  clientInfo: z
    .object({
      name: z.string(),
      version: z.string(),
    })
    .optional(),
});

export type InitializeParams = z.infer<typeof InitializeParamsSchema>;

// =============================================================================
// Server Configuration
// =============================================================================

export interface ServerDescription {
  name: string;
  version: string;
  instructions?: string;
}

export const DEFAULT_SERVER_DESCRIPTION: ServerDescription = {
  name: 'weather-trace-server',
  version: '1.0.0',
  instructions:
    'This server provides weather tools. Tools: get_weather (get current weather for a location), ' +
    'get_forecast (get weather forecast for multiple days).',
};

export function getDefaultServerCapabilities(): ServerCapabilities {
  return {
    tools: {
      listChanged: false,
    },
  };
}

// =============================================================================
// Negotiation
// =============================================================================

export function isSupportedProtocolVersion(version: string): version is ProtocolVersion {
  return SUPPORTED_PROTOCOL_VERSIONS.some((supported) => supported === version);
}

/**
 * Echo the client's version when we speak it, otherwise offer our latest.
 */
export function negotiateProtocolVersion(requested: string): ProtocolVersion {
  return isSupportedProtocolVersion(requested) ? requested : LATEST_PROTOCOL_VERSION;
}

/**
 * Validate `initialize` params and build the result.
 *
 * @throws InvalidParamsError when params are missing or malformed
 */
export function handleInitialize(params: unknown, server: ServerDescription): InitializeResult {
  const parsed = InitializeParamsSchema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new InvalidParamsError('Invalid initialize params', parsed.error.format());
  }

  const result: InitializeResult = {
    protocolVersion: negotiateProtocolVersion(parsed.data.protocolVersion),
    capabilities: getDefaultServerCapabilities(),
    serverInfo: {
      name: server.name,
      version: server.version,
    },
  };

  if (server.instructions) {
    result.instructions = server.instructions;
  }

  return result;
}
