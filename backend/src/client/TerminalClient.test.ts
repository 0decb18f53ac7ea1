import { describe, it, expect } from 'vitest';
import { Duplex } from 'stream';
import { TerminalClient } from './TerminalClient';

class MemorySocket extends Duplex {
  readonly written: string[] = [];

  _read() {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.written.push(chunk.toString());
    callback();
  }
}

function scriptedIO(answers: string[]) {
  const printed: string[] = [];
  const asked: string[] = [];
  return {
    printed,
    asked,
    io: {
      print: (text: string) => {
        printed.push(text);
      },
      ask: async (prompt: string) => {
        asked.push(prompt);
        return answers.shift() ?? '';
      },
    },
  };
}

describe('TerminalClient', () => {
  it('sends its name, prints messages and answers prompts', async () => {
    const socket = new MemorySocket();
    const { io, printed, asked } = scriptedIO(['2']);
    const done = new TerminalClient(socket, io).run('Henry');

    socket.push('{"message":"Start Card: 5 RED"}\n{"input":"Select your card: "}\n');
    socket.push('{"message":"Henry won!"}\n');
    socket.push(null);

    await expect(done).resolves.toBe('finished');
    expect(socket.written).toEqual(['Henry', '2']);
    expect(asked).toEqual(['Select your card: ']);
    expect(printed).toEqual(['Start Card: 5 RED', 'Henry won!', 'Game over!']);
  });

  it('stops quietly after an error line', async () => {
    const socket = new MemorySocket();
    const { io, printed } = scriptedIO([]);
    const done = new TerminalClient(socket, io).run('Henry');

    socket.push('{"error":"You didn\'t send a name in time!"}\n');
    socket.push(null);

    await expect(done).resolves.toBe('rejected');
    expect(printed).toEqual(["You didn't send a name in time!"]);
  });

  it('gives up on a line it cannot read', async () => {
    const socket = new MemorySocket();
    const { io } = scriptedIO([]);
    const done = new TerminalClient(socket, io).run('Henry');

    socket.push('not json\n');

    await expect(done).rejects.toThrow('Not a JSON line: not json');
  });
});
