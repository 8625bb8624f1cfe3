import * as net from 'net';
import {
  LineTransport,
  NetworkAddress,
  TransportError,
  TransportErrorType,
  TransportFactory,
  formatAddress
} from './LineTransport';
import { PJLINK_MAX_LINE, PJLINK_TERMINATOR } from '../protocol/PJLinkCodec';

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Line transport over a plain TCP socket
 */
export class TcpLineTransport implements LineTransport {
  readonly endpoint: string;
  private buffer = '';
  private pending?: PendingRead;
  private isClosed = false;
  private lastError?: Error;

  private constructor(private readonly socket: net.Socket, address: NetworkAddress) {
    this.endpoint = formatAddress(address);
    this.setupSocketHandlers();
  }

  /**
   * Connect with a bounded wait
   */
  static connect(address: NetworkAddress, connectTimeoutMs: number): Promise<TcpLineTransport> {
    return new Promise<TcpLineTransport>((resolve, reject) => {
      const socket = new net.Socket();
      socket.setNoDelay(true);

      const timeout = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new TransportError(
          TransportErrorType.CONNECT_TIMEOUT,
          `Connection to ${formatAddress(address)} timed out after ${connectTimeoutMs}ms`
        ));
      }, connectTimeoutMs);

      const cleanup = () => {
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
        clearTimeout(timeout);
      };

      const onConnect = () => {
        cleanup();
        resolve(new TcpLineTransport(socket, address));
      };

      const onError = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(new TransportError(
          TransportErrorType.CONNECT_FAILED,
          `Connection to ${formatAddress(address)} failed: ${error.message}`,
          error
        ));
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
      socket.connect({ host: address.host, port: address.port });
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  write(line: string): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new TransportError(TransportErrorType.PEER_CLOSED, `Connection to ${this.endpoint} is closed`));
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.write(line, 'ascii', error => {
        if (error) {
          reject(new TransportError(
            TransportErrorType.WRITE_FAILED,
            `Write to ${this.endpoint} failed: ${error.message}`,
            error
          ));
        } else {
          resolve();
        }
      });
    });
  }

  readLine(timeoutMs: number): Promise<string> {
    if (this.pending) {
      return Promise.reject(new TransportError(TransportErrorType.BUSY, `A read is already pending on ${this.endpoint}`));
    }

    const ready = this.takeLine();
    if (ready !== undefined) {
      return Promise.resolve(ready);
    }
    if (this.isClosed) {
      return Promise.reject(this.closedError());
    }

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        reject(new TransportError(
          TransportErrorType.READ_TIMEOUT,
          `No reply from ${this.endpoint} within ${timeoutMs}ms`
        ));
      }, timeoutMs);

      this.pending = { resolve, reject, timer };
    });
  }

  close(): void {
    if (!this.isClosed) {
      this.isClosed = true;
      this.socket.destroy();
    }
    this.settle();
  }

  /**
   * Setup socket event handlers
   */
  private setupSocketHandlers(): void {
    this.socket.on('data', (data: Buffer) => {
      this.buffer += data.toString('ascii');
      this.settle();
    });

    this.socket.on('error', (error: Error) => {
      this.lastError = error;
    });

    this.socket.on('close', () => {
      this.isClosed = true;
      this.settle();
    });
  }

  /**
   * Next complete line, or the partial remainder once the peer is gone or
   * the buffer has grown past any valid line.
   */
  private takeLine(): string | undefined {
    const index = this.buffer.indexOf(PJLINK_TERMINATOR);
    if (index >= 0) {
      const line = this.buffer.slice(0, index + PJLINK_TERMINATOR.length);
      this.buffer = this.buffer.slice(index + PJLINK_TERMINATOR.length);
      return line;
    }

    if (this.buffer.length > 0 && (this.isClosed || this.buffer.length > PJLINK_MAX_LINE)) {
      const partial = this.buffer;
      this.buffer = '';
      return partial;
    }

    return undefined;
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    const line = this.takeLine();
    if (line !== undefined) {
      this.pending = undefined;
      clearTimeout(pending.timer);
      pending.resolve(line);
    } else if (this.isClosed) {
      this.pending = undefined;
      clearTimeout(pending.timer);
      pending.reject(this.closedError());
    }
  }

  private closedError(): TransportError {
    const reason = this.lastError ? `: ${this.lastError.message}` : '';
    return new TransportError(
      TransportErrorType.PEER_CLOSED,
      `Connection to ${this.endpoint} closed${reason}`,
      this.lastError
    );
  }
}

/**
 * Default factory: a fresh TCP connection per handle
 */
export class TcpTransportFactory implements TransportFactory {
  open(address: NetworkAddress, connectTimeoutMs: number): Promise<LineTransport> {
    return TcpLineTransport.connect(address, connectTimeoutMs);
  }
}
