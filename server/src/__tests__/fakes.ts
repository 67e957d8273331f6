import type { Peer } from '../connections';

/** In-process stand-in for a WebSocket peer. */
export class FakePeer implements Peer {
  readyState = 1;
  readonly sent: string[] = [];
  failNext: Error | null = null;
  throwOnSend = false;

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.throwOnSend) throw new Error('socket gone');
    if (this.failNext) {
      const err = this.failNext;
      this.failNext = null;
      cb?.(err);
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  messages(): unknown[] {
    return this.sent.map((raw): unknown => JSON.parse(raw));
  }

  last(): unknown {
    const raw = this.sent[this.sent.length - 1];
    return raw === undefined ? undefined : JSON.parse(raw);
  }
}
