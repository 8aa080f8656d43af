import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

export class FakeCommand extends EventEmitter {
  public readonly killedSignals: NodeJS.Signals[] = [];
  public readonly stream: PassThrough;
  public pipeCalls = 0;
  public exitOnTerm = false;

  constructor() {
    super();
    this.stream = new PassThrough();
  }

  pipe() {
    this.pipeCalls += 1;
    return this.stream;
  }

  kill(signal: NodeJS.Signals) {
    this.killedSignals.push(signal);
    if (this.exitOnTerm && signal === 'SIGTERM') {
      this.emitClose(null, 'SIGTERM');
    }
    return this;
  }

  pushFrame(frame: Buffer) {
    this.stream.write(frame);
  }

  emitClose(code: number | null, signal: NodeJS.Signals | null = null) {
    this.emit('close', code, signal);
  }
}

export function jpegFrame(marker: number, size = 4): Buffer {
  const body = Buffer.alloc(size, marker);
  return Buffer.concat([Buffer.from([0xff, 0xd8]), body, Buffer.from([0xff, 0xd9])]);
}

export function flushIo(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export async function waitFor(predicate: () => boolean, timeoutMs = 1000) {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('Timed out waiting for predicate');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}
