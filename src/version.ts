// This module centralizes server identity values so protocol metadata and logs stay in sync.

export const SERVER_NAME = 'toolgate';
export const SERVER_VERSION = '0.3.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';
