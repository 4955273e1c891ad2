/**
 * Communication mechanism a server is reached through.
 */
export const TransportTypes = {
  STDIO: 'stdio',
  HTTP: 'http',
  HTTPS: 'https',
  WEBSOCKET: 'websocket',
} as const;

export type TransportType = (typeof TransportTypes)[keyof typeof TransportTypes];

const TRANSPORT_VALUES: readonly string[] = Object.values(TransportTypes);

/**
 * Exact, case-sensitive membership check against the transport literals.
 * @param value - Raw value read from a registry document
 */
export function isTransportType(value: unknown): value is TransportType {
  return typeof value === 'string' && TRANSPORT_VALUES.includes(value);
}

/**
 * True for the transports that are addressed by URL over HTTP(S).
 */
export function isHttpTransport(transport: TransportType): boolean {
  return transport === TransportTypes.HTTP || transport === TransportTypes.HTTPS;
}
