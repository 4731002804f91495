import { getLogger, loadConfig } from '@hostwatch/shared';
import { MonitorEngine } from './Engine.js';

async function main(): Promise<void> {
  const config = loadConfig();
  getLogger().level = config.logLevel;

  const engine = new MonitorEngine(config);

  engine.installSignalHandlers();

  await engine.start();
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`hostwatch failed to start: ${message}\n`);
  process.exit(1);
});
