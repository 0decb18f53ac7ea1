import { encodeLine, type Connection } from './protocol';

export type StatusLog = (line: string) => void;

export const consoleStatusLog: StatusLog = line => console.log(line);

/**
 * Outbound side of the table: fan-out to everyone (mirrored on the server
 * console) and one-to-one prompts.
 */
export class Notifier {
  constructor(private readonly log: StatusLog = consoleStatusLog) {}

  broadcast(targets: Iterable<Connection>, text: string) {
    this.log(text);
    const line = encodeLine('message', text);
    for (const t of targets) t.send(line);
  }

  sendUser(target: Connection, text: string) {
    target.send(encodeLine('message', text));
  }

  sendError(target: Connection, text: string) {
    target.send(encodeLine('error', text));
  }

  /** Sends an input line and waits for that one peer's raw answer. */
  sendInput(target: Connection, prompt: string): Promise<string> {
    target.send(encodeLine('input', prompt));
    return target.read();
  }
}
