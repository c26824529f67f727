#!/usr/bin/env node
const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

(async () => {
  const { main } = await import('./cli.js');
  process.exitCode = await main(process.argv.slice(2), { signal: controller.signal });
})().catch((err) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 2;
});
