/**
 * One-directional byte pump with backpressure and byte accounting.
 *
 * Chunks are written to the destination exactly as read. When the destination
 * buffers past its high-water mark the source is paused until 'drain'; Node's
 * stream layer retries short writes until the whole chunk is sent.
 */

import type * as net from 'node:net';

export interface BytePumpOptions {
  /** Called for every chunk before it is written */
  onChunk?: (chunk: Buffer) => void;
}

export class BytePump {
  private bytesRelayed = 0;
  private waitingForDrain = false;
  private running = false;

  constructor(
    private readonly source: net.Socket,
    private readonly destination: net.Socket,
    private readonly options: BytePumpOptions = {},
  ) {}

  /** Bytes handed to the destination so far */
  get bytes(): number {
    return this.bytesRelayed;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.source.on('data', this.handleData);
    if (!this.waitingForDrain) {
      this.source.resume();
    }
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.source.off('data', this.handleData);
    this.destination.off('drain', this.handleDrain);
    this.source.pause();
  }

  /**
   * Relay bytes that were read before the pump started (e.g. after a header block).
   */
  inject(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.handleData(chunk);
  }

  private readonly handleData = (chunk: Buffer): void => {
    if (this.destination.destroyed) return;

    this.options.onChunk?.(chunk);
    this.bytesRelayed += chunk.length;

    if (!this.destination.write(chunk) && !this.waitingForDrain) {
      this.waitingForDrain = true;
      this.source.pause();
      this.destination.once('drain', this.handleDrain);
    }
  };

  private readonly handleDrain = (): void => {
    this.waitingForDrain = false;
    if (this.running) {
      this.source.resume();
    }
  };
}
