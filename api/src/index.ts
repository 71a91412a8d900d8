import 'dotenv/config';
import app from './app.js';
import { config } from './config/index.js';
import { pool } from './lib/db.js';

async function main() {
  // Test database connection
  if (config.ledger.store === 'postgres') {
    try {
      await pool.query('SELECT 1');
      console.log('✅ Database connected');
    } catch (error) {
      console.error('❌ Database connection failed:', error);
      process.exit(1);
    }
  } else {
    console.log('⚠️  Using in-memory wallet ledger; balances are lost on restart');
  }

  // Start server
  app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}`);
    console.log(`📝 Environment: ${config.nodeEnv}`);
  });
}

async function shutdown() {
  console.log('\n🛑 Shutting down...');
  await pool.end();
  process.exit(0);
}

// Graceful shutdown
function onSignal() {
  shutdown().catch((error) => {
    console.error('❌ Shutdown failed:', error);
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((error) => {
  console.error('❌ Startup failed:', error);
  process.exit(1);
});
