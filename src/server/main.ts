/**
 * API SERVER STARTUP SCRIPT
 *
 * Run this with: npm start
 */
import {makeAppEffects, loadConfigFromEnv, ManagedEffects} from '../effects/EffectsFactory';
import {createApp} from './app';

let running: ManagedEffects | undefined;

async function main() {
  console.log('🚀 Starting retail ordering API...\n');

  try {
    const config = loadConfigFromEnv();

    console.log('📋 Configuration:');
    console.log('   - Storage:', config.storage);
    if (config.storage === 'postgres') {
      console.log('   - Database:', `${config.database.host}:${config.database.port}/${config.database.database}`);
    } else {
      console.log('   - Seed file:', config.seedFile);
    }
    console.log('');

    running = await makeAppEffects(config);
    const app = createApp(running);

    app.listen(config.apiPort, () => {
      console.log(`🌐 API server started on port ${config.apiPort}`);
      console.log(`   - Catalog: GET http://localhost:${config.apiPort}/api/catalog`);
      console.log(`   - Cart: GET http://localhost:${config.apiPort}/api/customers/:email/cart`);
      console.log(`   - Checkout: POST http://localhost:${config.apiPort}/api/customers/:email/checkout`);
      console.log(`   - Health check: GET http://localhost:${config.apiPort}/health`);
      console.log('');
    });
  } catch (error) {
    console.error('❌ Failed to start API server:', error);
    process.exit(1);
  }
}

async function shutdown(signal: string) {
  console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
  try {
    await running?.close();
  } catch (error) {
    console.error('❌ Failed to close connections:', error);
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
