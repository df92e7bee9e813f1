import { RendererApp } from './renderer/RendererApp';
import { createLogger } from './utils/log';

async function main(): Promise<void> {
  const app = new RendererApp();
  await app.init();
}

main().catch((err: unknown) => {
  createLogger('main').error('failed to start', { error: String(err) });
});
