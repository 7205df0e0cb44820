import { WebSocket } from 'ws';
import type { Transport } from './channel-handler';

export class ChannelNotWritableError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'ChannelNotWritableError';
  }
}

/** `ws` socket as a live channel transport. */
export class WsTransport implements Transport {
  constructor(
    private readonly socket: WebSocket,
    private readonly maxBufferedBytes: number,
  ) {}

  send(text: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ChannelNotWritableError('socket is not open'));
    }
    if (this.socket.bufferedAmount > this.maxBufferedBytes) {
      return Promise.reject(
        new ChannelNotWritableError(`send buffer over ${this.maxBufferedBytes} bytes`),
      );
    }
    return new Promise((resolve, reject) => {
      this.socket.send(text, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}
