import { ExecChannel } from '../types';
import { Command } from './Command';

/**
 * Read cursor over a fixed byte buffer
 */
export class ByteReader {
  private cursor = 0;

  constructor(private readonly data: Buffer) {}

  /** Fractional counts round down; negative and non-finite counts read nothing */
  read(count: number): Buffer {
    const wanted = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
    const end = Math.min(this.data.length, this.cursor + wanted);
    const chunk = Buffer.from(this.data.subarray(this.cursor, end));
    this.cursor = end;
    return chunk;
  }

  get remaining(): number {
    return this.data.length - this.cursor;
  }
}

/**
 * Scripted stand-in for one command-execution channel.
 *
 * Replays the Command's stdout/stderr and exit status and captures stdin.
 * Every method is a jest mock, so tests can assert on the calls made.
 */
export class MockChannel implements ExecChannel {
  private readonly stdout: ByteReader;
  private readonly stderr: ByteReader;
  private readonly stdinChunks: Buffer[] = [];
  private polls = 0;

  readonly exec = jest.fn((_command: string): Promise<void> => Promise.resolve());

  readonly recv = jest.fn((count: number): Buffer => this.stdout.read(count));

  readonly recvStderr = jest.fn((count: number): Buffer => this.stderr.read(count));

  readonly sendall = jest.fn((data: Buffer | string): number => {
    const bytes = typeof data === 'string' ? Buffer.from(data) : Buffer.from(data);
    this.stdinChunks.push(bytes);
    return bytes.length;
  });

  readonly shutdownWrite = jest.fn((): void => undefined);

  readonly exitStatusReady = jest.fn((): boolean => {
    const ready = this.polls >= this.command.waits;
    this.polls++;
    return ready;
  });

  readonly recvExitStatus = jest.fn((): number => this.command.exit);

  readonly close = jest.fn((): void => undefined);

  constructor(public readonly command: Command) {
    this.stdout = new ByteReader(command.out);
    this.stderr = new ByteReader(command.err);
  }

  /** Everything written to stdin so far */
  get stdin(): Buffer {
    return Buffer.concat(this.stdinChunks);
  }

  get pollCount(): number {
    return this.polls;
  }
}
