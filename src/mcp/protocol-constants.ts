// MCP protocol revisions this gateway answers `initialize` with.

export const LATEST_PROTOCOL_VERSION = '2025-06-18';

export const SUPPORTED_PROTOCOL_VERSIONS = [
  '2025-06-18',
  '2025-03-26',
  '2024-11-05',
  '2024-10-07'
] as const;

export const SERVER_INFO = {
  name: 'gael-tools-gateway',
  version: '0.1.0'
} as const;

export const USER_AGENT = `${SERVER_INFO.name}/${SERVER_INFO.version}`;

export function negotiateProtocolVersion(requested: unknown): string {
  const supported: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS;
  return typeof requested === 'string' && supported.includes(requested) ? requested : LATEST_PROTOCOL_VERSION;
}
