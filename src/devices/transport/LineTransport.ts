/**
 * Where a device listens
 */
export interface NetworkAddress {
  host: string;
  port: number;
}

export function formatAddress(address: NetworkAddress): string {
  return `${address.host}:${address.port}`;
}

/**
 * Transport Error Types
 */
export enum TransportErrorType {
  CONNECT_FAILED = 'CONNECT_FAILED',
  CONNECT_TIMEOUT = 'CONNECT_TIMEOUT',
  READ_TIMEOUT = 'READ_TIMEOUT',
  PEER_CLOSED = 'PEER_CLOSED',
  WRITE_FAILED = 'WRITE_FAILED',
  BUSY = 'BUSY'
}

export class TransportError extends Error {
  constructor(
    public readonly type: TransportErrorType,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }

  get duringConnect(): boolean {
    return this.type === TransportErrorType.CONNECT_FAILED || this.type === TransportErrorType.CONNECT_TIMEOUT;
  }
}

/**
 * One open, line-oriented connection. Lines are terminated by a single
 * terminator character; readLine returns the line including it, or the
 * partial text if the peer closed mid-line.
 */
export interface LineTransport {
  readonly endpoint: string;
  readonly closed: boolean;
  write(line: string): Promise<void>;
  readLine(timeoutMs: number): Promise<string>;
  close(): void;
}

/**
 * Opens transports. The TCP implementation is the default; anything that can
 * move a line to an address and a line back can stand in.
 */
export interface TransportFactory {
  open(address: NetworkAddress, connectTimeoutMs: number): Promise<LineTransport>;
}
