import { connect } from 'net';
import { createInterface } from 'readline/promises';
import { TerminalClient } from './TerminalClient';

// usage: uno-client <name>   (HOST / PORT pick the table, default localhost:5555)
async function main() {
  const name = process.argv[2] ?? 'Henry';
  const host = process.env.HOST ?? 'localhost';
  const port = parseInt(process.env.PORT ?? '5555', 10);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const socket = connect({ host, port });

  const client = new TerminalClient(socket, {
    print: text => console.log(text),
    ask: prompt => rl.question(prompt),
  });

  try {
    const outcome = await client.run(name);
    if (outcome === 'rejected') process.exitCode = 1;
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
