import 'dotenv/config';
import { ConfigError, loadSettings } from './config/settings.js';
import { Relay } from './relay.js';

async function main() {
  const settings = loadSettings();
  const relay = await Relay.create(settings);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[studio-relay] ${signal} received`);
    relay
      .shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[studio-relay] Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  await relay.start();
  console.log(`[studio-relay] ${relay.library.size} playlist(s) loaded, ${relay.presets.list().length} preset(s)`);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`[studio-relay] ${err.message}`);
  } else {
    console.error('[studio-relay] Fatal error:', err);
  }
  process.exit(1);
});
