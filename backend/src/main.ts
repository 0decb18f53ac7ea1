import { loadConfig } from './config';
import { runGame } from './server';

async function main() {
  const config = loadConfig();
  console.log(`Uno table listening on ${config.host}:${config.port} (status API on :${config.statusPort})`);
  const winner = await runGame(config);
  console.log(`Game over, ${winner} won`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
