import type { Duplex } from 'stream';
import { ServerLineDecoder, type ServerLine } from '../net/protocol';

export interface ClientIO {
  print(text: string): void;
  ask(prompt: string): Promise<string>;
}

export type ClientOutcome = 'finished' | 'rejected';

/**
 * Presentation loop for one human: prints messages, answers input prompts,
 * and stops on an error line or when the server hangs up.
 */
export class TerminalClient {
  private readonly decoder = new ServerLineDecoder();
  private queue: Promise<void> = Promise.resolve();
  private rejected = false;

  constructor(private readonly socket: Duplex, private readonly io: ClientIO) {}

  run(name: string): Promise<ClientOutcome> {
    return new Promise((resolve, reject) => {
      let ended = false;
      const end = () => {
        if (ended) return;
        ended = true;
        this.queue.then(() => {
          if (!this.rejected) this.io.print('Game over!');
          resolve(this.rejected ? 'rejected' : 'finished');
        }, reject);
      };

      this.socket.on('data', (chunk: Buffer | string) => {
        let lines: ServerLine[];
        try {
          lines = this.decoder.push(chunk.toString());
        } catch (err) {
          this.socket.destroy();
          reject(err);
          return;
        }
        for (const line of lines) this.queue = this.queue.then(() => this.handle(line));
      });
      this.socket.on('end', end);
      this.socket.on('close', end);
      this.socket.on('error', err => {
        if (ended) return;
        ended = true;
        reject(err);
      });

      this.socket.write(name);
    });
  }

  private async handle(line: ServerLine) {
    if (this.rejected) return;
    switch (line.kind) {
      case 'message':
        this.io.print(line.text);
        break;
      case 'error':
        this.rejected = true;
        this.io.print(line.text);
        this.socket.end();
        break;
      case 'input': {
        const answer = await this.io.ask(line.text);
        this.socket.write(answer);
        break;
      }
    }
  }
}
