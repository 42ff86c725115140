import { createApp } from './app';
import { ChainAuditScheduler } from './scheduler';
import { loadConfig, DEFAULT_ADMIN_KEY } from '../config';
import { createContextFromConfig } from '../context';

async function main() {
  const config = loadConfig();
  const ctx = await createContextFromConfig(config);

  const entries = await ctx.ledger.load();
  console.log(`Ledger restored: ${entries.length} entries, tip ${(await ctx.ledger.tip()).slice(0, 12)}`);

  const app = createApp(ctx, { adminKey: config.adminKey });

  let scheduler: ChainAuditScheduler | undefined;
  if (config.chainAudit.enabled) {
    scheduler = new ChainAuditScheduler(ctx.ledger, config.chainAudit);
    scheduler.start();
  }

  const server = app.listen(config.port, () => {
    console.log(`Registration ledger API running on port ${config.port}`);
    console.log(`Store backend: ${config.storeBackend}`);
    console.log(`Signing backend: ${config.signingBackend}${ctx.externalIdentity ? '' : ' (no external identity)'}`);
    console.log(`Admin key: ${config.adminKey === DEFAULT_ADMIN_KEY ? 'test-admin-key (default)' : '[SET]'}`);
    if (scheduler) console.log('Chain audit: enabled');
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    scheduler?.stop();
    server.close(() => {
      ctx.close();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  console.error('Startup failed:', err);
  process.exit(1);
});
