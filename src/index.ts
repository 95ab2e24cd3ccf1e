import { runCli } from "./cli";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`platmap-crawler: fatal: ${message}`);
  process.exitCode = 1;
});
